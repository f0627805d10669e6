import { describe, expect, it } from "vitest";
import type { CallNode } from "../evm/types";
import { traceTree } from "./trace-tree";

const A = 0xaaaa000000000000000000000000000000000001n;
const B = 0xbbbb000000000000000000000000000000000002n;

const tree = (): CallNode => ({
  depth: 0,
  kind: "call",
  from: 1n,
  to: A,
  input: Uint8Array.of(0x11, 0x11, 0x11, 0x11, 0x00, 0xff),
  output: Uint8Array.of(0x07),
  status: 0,
  gasLeft: 0n,
  calls: [
    {
      depth: 1,
      kind: "staticcall",
      from: A,
      to: B,
      input: new Uint8Array(),
      output: new Uint8Array(),
      status: 1,
      gasLeft: 0n,
      calls: [],
    },
  ],
});

describe("traceTree", () => {
  it("renders calls and their results", () => {
    expect(traceTree(tree(), { colored: false })).toBe(
      "├─ 0xaaaa000000000000000000000000000000000001::0x11111111(0x00ff) [call]\n" +
        "│  ├─ 0xbbbb000000000000000000000000000000000002::fallback() [staticcall]\n" +
        "│  │  └─ ← EvmError: status 1\n" +
        "│  └─ ← 0x07\n"
    );
  });

  it("shows call paths, values and labels", () => {
    const root = { ...tree(), value: 5n };
    const labels = new Map([[B, "Oracle"]]);
    const lines = traceTree(root, { colored: false, showPaths: true, labels }).split("\n");

    expect(lines[0]).toBe("├─ [call_0] 0xaaaa000000000000000000000000000000000001::0x11111111{value:5}(0x00ff) [call]");
    expect(lines[1]).toBe("│  ├─ [staticcall_0_0] Oracle::fallback() [staticcall]");
  });

  it("renders nothing without a root", () => {
    expect(traceTree(undefined)).toBe("");
  });
});
