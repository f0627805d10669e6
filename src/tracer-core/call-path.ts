import type { CallKind, CallNode, LabeledCall } from "../evm/types";

export type CallPathPrefix = "call" | "staticcall";

export interface ParsedCallPath {
  prefix: CallPathPrefix;
  ordinals: number[];
}

const CALL_PATH_PATTERN = /^(call|staticcall)((?:_\d+)+)$/;

export const callPathPrefix = (kind: CallKind): CallPathPrefix => (kind === "staticcall" ? "staticcall" : "call");

export const formatCallPath = (prefix: CallPathPrefix, ordinals: readonly number[]) => {
  return `${prefix}_${ordinals.join("_")}`;
};

export const parseCallPath = (path: string): ParsedCallPath => {
  const match = CALL_PATH_PATTERN.exec(path);
  if (!match) throw new Error(`Invalid call path: ${path}`);
  const prefix: CallPathPrefix = match[1] === "staticcall" ? "staticcall" : "call";
  return { prefix, ordinals: match[2].slice(1).split("_").map(Number) };
};

/**
 * Assigns every call a path in pre-order. The root is always `call_0`; a child at
 * position `i` under a parent whose ordinal chain is `0_1` becomes `call_0_1_i`, or
 * `staticcall_0_1_i` when the child itself is read-only.
 */
export const labelCallPaths = (root: CallNode | undefined): LabeledCall[] => {
  if (!root) return [];

  const labeled: LabeledCall[] = [];
  const pending: { node: CallNode; ordinals: number[] }[] = [{ node: root, ordinals: [0] }];

  for (let item = pending.pop(); item; item = pending.pop()) {
    const { node, ordinals } = item;
    const prefix = node === root ? "call" : callPathPrefix(node.kind);
    labeled.push({ path: formatCallPath(prefix, ordinals), node });

    for (let i = node.calls.length - 1; i >= 0; i--) {
      pending.push({ node: node.calls[i], ordinals: [...ordinals, i] });
    }
  }

  return labeled;
};
