import { z } from "zod";
import { normalizeAddress, normalizeHex, normalizeQuantity } from "../utils/normalizer";
import { CALL_KINDS, type CallEvent, type Log, type ReturnEvent, type Transaction } from "./types";

// Schemas for transaction dumps written by the execution engine (hex encoded JSON).

const hexString = z.string().regex(/^0x([0-9a-fA-F]{2})*$/, "expected 0x-prefixed even-length hex");
const quantity = z
  .string()
  .regex(/^0x[0-9a-fA-F]+$/, "expected 0x-prefixed hex quantity")
  .transform(normalizeQuantity);
const address = z
  .string()
  .regex(/^0x[0-9a-fA-F]{40}$/, "expected 20-byte address")
  .transform((value) => normalizeAddress(value));
const bytes32 = z
  .string()
  .regex(/^0x[0-9a-fA-F]{64}$/, "expected 32-byte hash")
  .transform(normalizeQuantity);
const data = hexString.transform((value) => normalizeHex(value));

export const callEventSchema = z
  .object({
    depth: z.number().int().nonnegative(),
    kind: z.enum(CALL_KINDS),
    from: address,
    to: address,
    input: data,
    gas: quantity.optional(),
    value: quantity.optional(),
  })
  .transform((call): CallEvent => {
    const { gas, value, ...rest } = call;
    return { ...rest, ...(gas !== undefined ? { gas } : {}), ...(value !== undefined ? { value } : {}) };
  });

export const returnEventSchema = z
  .object({
    output: data,
    status: z.number().int().nonnegative(),
    gasLeft: quantity,
  })
  .transform((ret): ReturnEvent => ret);

export const logSchema = z
  .object({
    address,
    topics: z.array(bytes32).max(4),
    data,
    logIndex: z.number().int().nonnegative(),
  })
  .transform((log): Log => log);

export const transactionSchema = z
  .object({
    hash: bytes32,
    blockNumber: quantity,
    blockHash: bytes32,
    index: z.number().int().nonnegative(),
    from: address,
    to: address.nullable().default(null),
    contractAddress: address.optional(),
    gasUsed: quantity,
    cumulativeGasUsed: quantity,
    status: z.number().int().nonnegative(),
    logs: z.array(logSchema).default([]),
    internalTxCalls: z.array(callEventSchema).default([]),
    internalTxReturns: z.array(returnEventSchema).default([]),
  })
  .transform((tx): Transaction => {
    const { contractAddress, ...rest } = tx;
    return { ...rest, ...(contractAddress !== undefined ? { contractAddress } : {}) };
  });

export const transactionDumpSchema = z.object({
  transactions: z.array(transactionSchema),
});

export type TransactionDumpInput = z.input<typeof transactionDumpSchema>;
