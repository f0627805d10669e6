import type { CallEvent, CallNode, ReturnEvent } from "../evm/types";
import { MalformedTraceError } from "./errors";

interface Frame {
  call: CallEvent;
  calls: Frame[];
  result?: ReturnEvent;
}

class ReturnQueue {
  private cursor = 0;

  constructor(private returns: readonly ReturnEvent[]) {}

  get remaining() {
    return this.returns.length - this.cursor;
  }

  shift(eventIndex: number): ReturnEvent {
    const ret = this.returns[this.cursor];
    if (!ret) {
      throw new MalformedTraceError(
        "returns-exhausted",
        `no return event left to close a call (after ${this.cursor} returns)`,
        eventIndex
      );
    }
    this.cursor++;
    return ret;
  }
}

const closeFrame = (stack: Frame[], queue: ReturnQueue, eventIndex: number) => {
  const frame = stack.pop();
  if (frame) frame.result = queue.shift(eventIndex);
};

/**
 * Rebuilds the nesting of a transaction's internal calls from its call events and
 * return events, both in execution order. Returns are consumed as calls close out,
 * innermost first. Yields `undefined` for a transaction without internal calls.
 */
export const buildCallTree = (
  calls: readonly CallEvent[],
  returns: readonly ReturnEvent[]
): CallNode | undefined => {
  const queue = new ReturnQueue(returns);
  if (calls.length === 0) {
    if (queue.remaining > 0) {
      throw new MalformedTraceError("returns-left-over", `${queue.remaining} return events without any call`);
    }
    return undefined;
  }

  const frames: Frame[] = []; // creation order, i.e. pre-order
  const stack: Frame[] = [];

  for (const [i, call] of calls.entries()) {
    const frame: Frame = { call, calls: [] };

    if (i === 0) {
      if (call.depth !== 0) {
        throw new MalformedTraceError("bad-root-depth", `first call has depth ${call.depth}`, i);
      }
      frames.push(frame);
      stack.push(frame);
      continue;
    }

    let top = stack[stack.length - 1];
    if (call.depth > top.call.depth + 1) {
      throw new MalformedTraceError(
        "depth-skip",
        `call #${i} at depth ${call.depth} inside a call at depth ${top.call.depth}`,
        i
      );
    }

    while (call.depth <= top.call.depth) {
      closeFrame(stack, queue, i);
      const next = stack[stack.length - 1];
      if (!next) {
        throw new MalformedTraceError("multiple-roots", `call #${i} opens a second top-level call`, i);
      }
      top = next;
    }

    top.calls.push(frame);
    frames.push(frame);
    stack.push(frame);
  }

  while (stack.length > 0) closeFrame(stack, queue, calls.length);

  if (queue.remaining > 0) {
    throw new MalformedTraceError("returns-left-over", `${queue.remaining} return events were never consumed`);
  }

  return resolveFrames(frames);
};

// children are always created after their parent, so walking backwards resolves them first
const resolveFrames = (frames: Frame[]): CallNode => {
  const resolved = new Map<Frame, CallNode>();

  for (let i = frames.length - 1; i >= 0; i--) {
    const frame = frames[i];
    const { call, result } = frame;
    if (!result) {
      throw new MalformedTraceError("returns-exhausted", `call #${i} was never closed`, i);
    }

    const node: CallNode = {
      depth: call.depth,
      kind: call.kind,
      from: call.from,
      to: call.to,
      input: call.input,
      output: result.output,
      status: result.status,
      gasLeft: result.gasLeft,
      calls: frame.calls.map((child) => {
        const childNode = resolved.get(child);
        if (!childNode) throw new Error(`call #${i} has an unresolved child`);
        return childNode;
      }),
    };
    if (call.gas !== undefined) node.gas = call.gas;
    if (call.value !== undefined) node.value = call.value;

    resolved.set(frame, node);
  }

  const root = resolved.get(frames[0]);
  if (!root) throw new Error("call tree has no root");
  return root;
};

/** Number of nodes in a tree, counted without recursion. */
export const countCalls = (root: CallNode | undefined): number => {
  if (!root) return 0;
  let count = 0;
  const pending: CallNode[] = [root];
  for (let node = pending.pop(); node; node = pending.pop()) {
    count++;
    for (const child of node.calls) pending.push(child);
  }
  return count;
};

/** Nodes in pre-order (a node, then each child subtree in execution order). */
export const preOrder = (root: CallNode | undefined): CallNode[] => {
  if (!root) return [];
  const out: CallNode[] = [];
  const pending: CallNode[] = [root];
  for (let node = pending.pop(); node; node = pending.pop()) {
    out.push(node);
    for (let i = node.calls.length - 1; i >= 0; i--) pending.push(node.calls[i]);
  }
  return out;
};
