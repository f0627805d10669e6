import type { TransactionLoader } from "../evm/loader";
import type { CallNode, Hash, Log, ReceiptLog, Transaction, TransactionReceipt } from "../evm/types";
import { MalformedTraceError, TraceTooLargeError } from "../tracer-core/errors";
import { buildCallTree } from "../tracer-core/call-tree";
import { labelCallPaths } from "../tracer-core/call-path";
import { toInternalTransactions } from "../tracer-core/receipt";
import { bigintToAddressString, bigintToBytes32String, toQuantity, uint8ArrayToHex } from "../utils/converter";
import { type Logger, silentLogger } from "../utils/logger";
import { DEFAULT_MAX_INTERNAL_CALLS } from "../config";

export type BlockTag = bigint | "latest";

export interface ReceiptAPIOptions {
  loader: TransactionLoader;
  logger?: Logger;
  maxInternalCalls?: number;
}

export class ReceiptAPI {
  private loader: TransactionLoader;
  private logger: Logger;
  private maxInternalCalls: number;

  constructor(options: ReceiptAPIOptions) {
    this.loader = options.loader;
    this.logger = options.logger || silentLogger;
    this.maxInternalCalls = options.maxInternalCalls ?? DEFAULT_MAX_INTERNAL_CALLS;
  }

  async getTransactionReceipt(hash: Hash): Promise<TransactionReceipt | null> {
    this.logger.debug("getTransactionReceipt", bigintToBytes32String(hash));
    const tx = await this.loader.getTransactionByHash(hash);
    if (!tx) return null;
    return this._toReceipt(tx);
  }

  /** Call tree of a transaction, `null` when the hash is unknown or nothing was called. */
  async getCallTree(hash: Hash): Promise<CallNode | null> {
    const transactionHash = bigintToBytes32String(hash);
    this.logger.debug("getCallTree", transactionHash);
    const tx = await this.loader.getTransactionByHash(hash);
    if (!tx) return null;
    return this._callTree(tx, transactionHash) ?? null;
  }

  async getTxListByHeight(height: BlockTag): Promise<TransactionReceipt[]> {
    const blockNumber = height === "latest" ? await this.loader.getLatestBlockNumber() : height;
    this.logger.debug("getTxListByHeight", toQuantity(blockNumber));
    const txs = await this.loader.getTransactionsByHeight(blockNumber);
    return txs.map((tx) => this._toReceipt(tx));
  }

  private _toReceipt(tx: Transaction): TransactionReceipt {
    const transactionHash = bigintToBytes32String(tx.hash);
    return {
      transactionHash,
      transactionIndex: toQuantity(tx.index),
      blockHash: bigintToBytes32String(tx.blockHash),
      blockNumber: toQuantity(tx.blockNumber),
      from: bigintToAddressString(tx.from),
      to: tx.contractAddress !== undefined || tx.to === null ? null : bigintToAddressString(tx.to),
      cumulativeGasUsed: toQuantity(tx.cumulativeGasUsed),
      gasUsed: toQuantity(tx.gasUsed),
      contractAddress: tx.contractAddress !== undefined ? bigintToAddressString(tx.contractAddress) : null,
      logs: tx.logs.map((log) => this._toReceiptLog(tx, log)),
      status: toQuantity(tx.status),
      internalTransactions: this._internalTransactions(tx, transactionHash),
    };
  }

  private _toReceiptLog(tx: Transaction, log: Log): ReceiptLog {
    return {
      address: bigintToAddressString(log.address),
      topics: log.topics.map(bigintToBytes32String),
      data: uint8ArrayToHex(log.data),
      blockNumber: toQuantity(tx.blockNumber),
      transactionHash: bigintToBytes32String(tx.hash),
      transactionIndex: toQuantity(tx.index),
      blockHash: bigintToBytes32String(tx.blockHash),
      logIndex: toQuantity(log.logIndex),
      removed: false,
    };
  }

  private _internalTransactions(tx: Transaction, transactionHash: string) {
    const root = this._callTree(tx, transactionHash);
    return this._reportMalformed(transactionHash, () => toInternalTransactions(labelCallPaths(root)));
  }

  private _callTree(tx: Transaction, transactionHash: string) {
    const size = tx.internalTxCalls.length;
    if (size > this.maxInternalCalls) {
      this.logger.warn(`refusing to rebuild ${size} internal calls of ${transactionHash}`);
      throw new TraceTooLargeError(size, this.maxInternalCalls);
    }
    return this._reportMalformed(transactionHash, () => buildCallTree(tx.internalTxCalls, tx.internalTxReturns));
  }

  private _reportMalformed<T>(transactionHash: string, fn: () => T): T {
    try {
      return fn();
    } catch (e) {
      if (e instanceof MalformedTraceError) this.logger.warn(`${transactionHash}: ${e.message}`);
      throw e;
    }
  }
}
