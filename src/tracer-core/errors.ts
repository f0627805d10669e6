export type MalformedTraceReason =
  | "bad-root-depth"
  | "depth-skip"
  | "multiple-roots"
  | "returns-exhausted"
  | "returns-left-over"
  | "gas-overflow";

/**
 * Raised when the call and return sequences of a transaction cannot describe a
 * well-nested call tree. No partial tree accompanies it.
 */
export class MalformedTraceError extends Error {
  override name = "MalformedTraceError";

  constructor(
    public readonly reason: MalformedTraceReason,
    message: string,
    public readonly eventIndex?: number
  ) {
    super(`Malformed trace (${reason}): ${message}`);
  }
}

export class TraceTooLargeError extends Error {
  override name = "TraceTooLargeError";

  constructor(public readonly calls: number, public readonly limit: number) {
    super(`Trace has ${calls} internal calls, limit is ${limit}`);
  }
}

export class TransactionDumpError extends Error {
  override name = "TransactionDumpError";

  constructor(public readonly source: string, public readonly issues: string[]) {
    super(`Invalid transaction dump ${source}:\n${issues.join("\n")}`);
  }
}
