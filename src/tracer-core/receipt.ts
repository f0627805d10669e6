import type { CallEvent, CallNode, CallStackJSON, InternalTransaction, LabeledCall, ReturnEvent } from "../evm/types";
import { bigintToAddressString, toQuantity, uint8ArrayToHex } from "../utils/converter";
import { buildCallTree } from "./call-tree";
import { labelCallPaths } from "./call-path";
import { MalformedTraceError } from "./errors";

export const gasUsed = (node: CallNode): bigint => {
  if (node.gas === undefined) return 0n;
  if (node.gasLeft > node.gas) {
    throw new MalformedTraceError("gas-overflow", `gas left ${node.gasLeft} exceeds gas at entry ${node.gas}`);
  }
  return node.gas - node.gasLeft;
};

export const toInternalTransaction = ({ path, node }: LabeledCall): InternalTransaction => ({
  callPath: path,
  from: bigintToAddressString(node.from),
  to: bigintToAddressString(node.to),
  ...(node.gas !== undefined ? { gas: toQuantity(node.gas) } : {}),
  value: toQuantity(node.value ?? 0n),
  input: uint8ArrayToHex(node.input),
  status: toQuantity(node.status),
  gasUsed: toQuantity(gasUsed(node)),
  output: uint8ArrayToHex(node.output),
});

export const toInternalTransactions = (labeled: readonly LabeledCall[]): InternalTransaction[] => {
  return labeled.map(toInternalTransaction);
};

const toGasLeftNumber = (gasLeft: bigint): number => {
  if (gasLeft > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw new RangeError(`gas left ${gasLeft} does not fit a JSON number`);
  }
  return Number(gasLeft);
};

/** Nested call stack, children in execution order and `Calls: null` on leaves. */
export const toCallStack = (root: CallNode): CallStackJSON => {
  const converted = new Map<CallNode, CallStackJSON>();
  const pending: { node: CallNode; visited: boolean }[] = [{ node: root, visited: false }];

  for (let item = pending.pop(); item; item = pending.pop()) {
    const { node, visited } = item;
    if (!visited) {
      pending.push({ node, visited: true });
      for (const child of node.calls) pending.push({ node: child, visited: false });
      continue;
    }

    const calls = node.calls.map((child) => {
      const json = converted.get(child);
      if (!json) throw new Error("child call converted out of order");
      return json;
    });
    converted.set(node, {
      From: bigintToAddressString(node.from),
      To: bigintToAddressString(node.to),
      Input: uint8ArrayToHex(node.input),
      Output: uint8ArrayToHex(node.output),
      StatusCode: node.status,
      GasLeft: toGasLeftNumber(node.gasLeft),
      Calls: calls.length > 0 ? calls : null,
    });
  }

  const json = converted.get(root);
  if (!json) throw new Error("call stack has no root");
  return json;
};

export const buildInternalTransactions = (
  calls: readonly CallEvent[],
  returns: readonly ReturnEvent[]
): InternalTransaction[] => {
  return toInternalTransactions(labelCallPaths(buildCallTree(calls, returns)));
};

export const buildCallStack = (calls: readonly CallEvent[], returns: readonly ReturnEvent[]): CallStackJSON | null => {
  const root = buildCallTree(calls, returns);
  return root ? toCallStack(root) : null;
};
