import type { ReceiptAPI } from "./api/receipt-api";
import type { Hash } from "./evm/types";
import { MalformedTraceError, TraceTooLargeError } from "./tracer-core/errors";
import { traceTree } from "./tracer-core/trace-tree";
import { bigintToBytes32String } from "./utils/converter";
import type { Logger } from "./utils/logger";

export interface ReportOptions {
  api: ReceiptAPI;
  logger: Logger;
  colored?: boolean;
  write?: (text: string) => void;
}

/**
 * Prints the call tree and receipt of each transaction. A trace that is refused or
 * malformed is logged and skipped; returns the number of transactions printed.
 */
export const printTransactions = async (hashes: readonly Hash[], options: ReportOptions) => {
  const { api, logger, colored = true, write = console.log } = options;
  let printed = 0;

  for (const hash of hashes) {
    const transactionHash = bigintToBytes32String(hash);
    try {
      const root = await api.getCallTree(hash);
      const receipt = await api.getTransactionReceipt(hash);
      logger.info(`Traces of ${transactionHash}:`);
      write(traceTree(root ?? undefined, { colored, showPaths: true }));
      write(JSON.stringify(receipt, null, 2));
      printed++;
    } catch (e) {
      if (!(e instanceof TraceTooLargeError || e instanceof MalformedTraceError)) throw e;
      logger.error(`${transactionHash}: ${e.message}`);
    }
  }

  return printed;
};
