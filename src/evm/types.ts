import type { Hex } from "viem";

export type Address = bigint;
export type Hash = bigint;
export type Calldata = Uint8Array;
export type ReturnedData = Uint8Array;

export const CALL_KINDS = ["call", "staticcall", "delegatecall", "callcode", "create", "create2"] as const;

export type CallKind = (typeof CALL_KINDS)[number];

export const STATUS_SUCCESS = 0;

// emitted by the engine when a frame opens
export interface CallEvent {
  depth: number;
  kind: CallKind;
  from: Address;
  to: Address;
  input: Calldata;
  gas?: bigint;
  value?: bigint;
}

// emitted by the engine when a frame closes, in close-out order
export interface ReturnEvent {
  output: ReturnedData;
  status: number;
  gasLeft: bigint;
}

export interface CallNode {
  depth: number;
  kind: CallKind;
  from: Address;
  to: Address;
  input: Calldata;
  gas?: bigint;
  value?: bigint;
  output: ReturnedData;
  status: number;
  gasLeft: bigint;
  calls: CallNode[];
}

export interface LabeledCall {
  path: string;
  node: CallNode;
}

export interface Log {
  address: Address;
  topics: bigint[];
  data: Uint8Array;
  logIndex: number;
}

export interface Transaction {
  hash: Hash;
  blockNumber: bigint;
  blockHash: Hash;
  index: number;
  from: Address;
  to: Address | null;
  contractAddress?: Address;
  gasUsed: bigint;
  cumulativeGasUsed: bigint;
  status: number;
  logs: Log[];
  internalTxCalls: CallEvent[];
  internalTxReturns: ReturnEvent[];
}

export interface InternalTransaction {
  callPath: string;
  from: Hex;
  to: Hex;
  gas?: Hex;
  value: Hex;
  input: Hex;
  status: Hex;
  gasUsed: Hex;
  output: Hex;
}

export interface CallStackJSON {
  From: Hex;
  To: Hex;
  Input: Hex;
  Output: Hex;
  StatusCode: number;
  GasLeft: number;
  Calls: CallStackJSON[] | null;
}

export interface ReceiptLog {
  address: Hex;
  topics: Hex[];
  data: Hex;
  blockNumber: Hex;
  transactionHash: Hex;
  transactionIndex: Hex;
  blockHash: Hex;
  logIndex: Hex;
  removed: boolean;
}

export interface TransactionReceipt {
  transactionHash: Hex;
  transactionIndex: Hex;
  blockHash: Hex;
  blockNumber: Hex;
  from: Hex;
  to: Hex | null;
  cumulativeGasUsed: Hex;
  gasUsed: Hex;
  contractAddress: Hex | null;
  logs: ReceiptLog[];
  status: Hex;
  internalTransactions: InternalTransaction[];
}
