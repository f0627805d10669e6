import dotenv from "dotenv";
import { loadConfig } from "./config";
import { JSONFileLoader } from "./evm/loader";
import { ReceiptAPI } from "./api/receipt-api";
import { printTransactions } from "./report";
import { createLogger } from "./utils/logger";

dotenv.config();

const config = loadConfig();
const logger = createLogger({ level: config.logLevel, colored: config.colored, name: "receipts" });

const loader = await JSONFileLoader.load(config.traceFile);
const api = new ReceiptAPI({ loader, logger, maxInternalCalls: config.maxInternalCalls });

const txs = config.txHash
  ? [await loader.getTransactionByHash(config.txHash)].flatMap((tx) => (tx ? [tx] : []))
  : await loader.getTransactionsByHeight(await loader.getLatestBlockNumber());

if (txs.length === 0) logger.warn(`no transactions found in ${config.traceFile}`);

const printed = await printTransactions(
  txs.map((tx) => tx.hash),
  { api, logger, colored: config.colored }
);
if (printed < txs.length) process.exitCode = 1;
