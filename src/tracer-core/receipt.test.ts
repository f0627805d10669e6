import { describe, expect, it } from "vitest";
import fixture from "../__fixtures__/transactions.json";
import { parseTransactionDump } from "../evm/loader";
import type { CallNode } from "../evm/types";
import { buildCallTree } from "./call-tree";
import { labelCallPaths } from "./call-path";
import { MalformedTraceError } from "./errors";
import { buildCallStack, buildInternalTransactions, gasUsed, toCallStack, toInternalTransactions } from "./receipt";

const [nested, plain, failed] = parseTransactionDump(fixture);

const EOA = "0x1000000000000000000000000000000000000001";
const A = "0xaaaa000000000000000000000000000000000001";
const B = "0xbbbb000000000000000000000000000000000002";
const C = "0xcccc000000000000000000000000000000000003";

describe("toInternalTransactions", () => {
  it("projects the nested fixture in pre-order", () => {
    const records = buildInternalTransactions(nested.internalTxCalls, nested.internalTxReturns);

    expect(records).toEqual([
      { callPath: "call_0", from: EOA, to: A, gas: "0x30000", value: "0x0", input: "0x11111111", status: "0x0", gasUsed: "0x20000", output: "0x07" },
      { callPath: "call_0_0", from: A, to: B, gas: "0x20000", value: "0x0", input: "0x22222222", status: "0x0", gasUsed: "0x6000", output: "0x03" },
      { callPath: "call_0_0_0", from: B, to: C, gas: "0x10000", value: "0x0", input: "0x33333333", status: "0x0", gasUsed: "0x1000", output: "0x01" },
      { callPath: "staticcall_0_0_1", from: B, to: C, gas: "0xf000", value: "0x0", input: "0x44444444", status: "0x0", gasUsed: "0x200", output: "0x02" },
      { callPath: "call_0_1", from: A, to: B, gas: "0x18000", value: "0x0", input: "0x22222222", status: "0x0", gasUsed: "0x3000", output: "0x06" },
      { callPath: "call_0_1_0", from: B, to: C, gas: "0x8000", value: "0x0", input: "0x33333333", status: "0x0", gasUsed: "0x800", output: "0x04" },
      { callPath: "staticcall_0_1_1", from: B, to: C, gas: "0x7000", value: "0x0", input: "0x44444444", status: "0x0", gasUsed: "0x100", output: "0x05" },
    ]);
  });

  it("keeps the receipt key order", () => {
    const [first] = buildInternalTransactions(nested.internalTxCalls, nested.internalTxReturns);
    expect(Object.keys(first)).toEqual(["callPath", "from", "to", "gas", "value", "input", "status", "gasUsed", "output"]);
  });

  it("reports gas used as entry gas minus gas left", () => {
    const root = buildCallTree(nested.internalTxCalls, nested.internalTxReturns);
    for (const { node } of labelCallPaths(root)) {
      expect(gasUsed(node)).toBe((node.gas ?? 0n) - node.gasLeft);
    }
  });

  it("omits gas when entry gas was not tracked", () => {
    const records = buildInternalTransactions(failed.internalTxCalls, failed.internalTxReturns);

    expect(records).toEqual([
      { callPath: "call_0", from: EOA, to: A, value: "0x5", input: "0x55555555", status: "0x2", gasUsed: "0x0", output: "0x" },
      { callPath: "call_0_0", from: A, to: C, value: "0x0", input: "0x66666666", status: "0x2", gasUsed: "0x0", output: "0x" },
    ]);
    expect(records[0]).not.toHaveProperty("gas");
  });

  it("yields an empty list for a transaction without internal calls", () => {
    expect(buildInternalTransactions(plain.internalTxCalls, plain.internalTxReturns)).toEqual([]);
    expect(toInternalTransactions([])).toEqual([]);
  });

  it("rejects gas left above the entry gas", () => {
    const node: CallNode = {
      depth: 0,
      kind: "call",
      from: 1n,
      to: 2n,
      input: new Uint8Array(),
      gas: 10n,
      output: new Uint8Array(),
      status: 0,
      gasLeft: 20n,
      calls: [],
    };
    expect(() => gasUsed(node)).toThrow(MalformedTraceError);
  });
});

describe("toCallStack", () => {
  it("nests calls with null on leaves", () => {
    const stack = buildCallStack(nested.internalTxCalls, nested.internalTxReturns);

    expect(stack?.From).toBe(EOA);
    expect(stack?.To).toBe(A);
    expect(stack?.Input).toBe("0x11111111");
    expect(stack?.Output).toBe("0x07");
    expect(stack?.StatusCode).toBe(0);
    expect(stack?.GasLeft).toBe(65536);
    expect(stack?.Calls).toHaveLength(2);
    expect(stack?.Calls?.[0].GasLeft).toBe(106496);
    expect(stack?.Calls?.[0].Calls?.[1]).toEqual({
      From: B,
      To: C,
      Input: "0x44444444",
      Output: "0x02",
      StatusCode: 0,
      GasLeft: 60928,
      Calls: null,
    });
    expect(stack?.Calls?.[1].Calls?.map((c) => c.Output)).toEqual(["0x04", "0x05"]);
  });

  it("serializes to JSON with the call stack keys", () => {
    const root = buildCallTree(failed.internalTxCalls, failed.internalTxReturns);
    if (!root) throw new Error("expected a root");

    expect(JSON.parse(JSON.stringify(toCallStack(root)))).toEqual({
      From: EOA,
      To: A,
      Input: "0x55555555",
      Output: "0x",
      StatusCode: 2,
      GasLeft: 0,
      Calls: [{ From: A, To: C, Input: "0x66666666", Output: "0x", StatusCode: 2, GasLeft: 0, Calls: null }],
    });
  });

  it("yields null for a transaction without internal calls", () => {
    expect(buildCallStack([], [])).toBeNull();
  });

  it("refuses gas left that a JSON number cannot hold exactly", () => {
    const node = (gasLeft: bigint): CallNode => ({
      depth: 0,
      kind: "call",
      from: 1n,
      to: 2n,
      input: new Uint8Array(),
      output: new Uint8Array(),
      status: 0,
      gasLeft,
      calls: [],
    });

    expect(toCallStack(node(2n ** 53n - 1n)).GasLeft).toBe(9007199254740991);
    expect(() => toCallStack(node(2n ** 53n + 1n))).toThrow(RangeError);
  });
});
