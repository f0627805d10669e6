import { promises as fs } from "fs";
import { TransactionDumpError } from "../tracer-core/errors";
import { transactionDumpSchema } from "./schema";
import type { Hash, Transaction } from "./types";

export interface TransactionLoader {
  getLatestBlockNumber(): Promise<bigint>;
  getTransactionByHash(hash: Hash): Promise<Transaction | null>;
  getTransactionsByHeight(height: bigint): Promise<Transaction[]>;
}

export class MemoryLoader implements TransactionLoader {
  private byHash = new Map<Hash, Transaction>();
  private byHeight = new Map<bigint, Transaction[]>();

  constructor(transactions: Transaction[] = []) {
    for (const tx of transactions) this.add(tx);
  }

  add(tx: Transaction) {
    if (this.byHash.has(tx.hash)) throw new Error(`Duplicate transaction 0x${tx.hash.toString(16)}`);
    this.byHash.set(tx.hash, tx);
    const block = this.byHeight.get(tx.blockNumber) || [];
    block.push(tx);
    block.sort((a, b) => a.index - b.index);
    this.byHeight.set(tx.blockNumber, block);
  }

  async getLatestBlockNumber(): Promise<bigint> {
    let latest = 0n;
    for (const height of this.byHeight.keys()) if (height > latest) latest = height;
    return latest;
  }

  async getTransactionByHash(hash: Hash): Promise<Transaction | null> {
    return this.byHash.get(hash) ?? null;
  }

  async getTransactionsByHeight(height: bigint): Promise<Transaction[]> {
    return [...(this.byHeight.get(height) || [])];
  }
}

export const parseTransactionDump = (json: unknown, source = "<memory>"): Transaction[] => {
  const parsed = transactionDumpSchema.safeParse(json);
  if (!parsed.success) {
    throw new TransactionDumpError(
      source,
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
    );
  }
  return parsed.data.transactions;
};

export class JSONFileLoader extends MemoryLoader {
  private constructor(public readonly path: string, transactions: Transaction[]) {
    super(transactions);
  }

  static async load(path: string): Promise<JSONFileLoader> {
    const text = await fs.readFile(path, "utf8");
    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (e) {
      throw new TransactionDumpError(path, [`not valid JSON: ${e instanceof Error ? e.message : String(e)}`]);
    }
    return new JSONFileLoader(path, parseTransactionDump(json, path));
  }
}
