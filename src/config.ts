import { LOG_LEVELS, type LogLevel } from "./utils/logger";

export interface Config {
  traceFile: string;
  txHash?: bigint;
  maxInternalCalls: number;
  logLevel: LogLevel;
  colored: boolean;
}

export const DEFAULT_TRACE_FILE = "transactions.json";
export const DEFAULT_MAX_INTERNAL_CALLS = 10_000;

const isLogLevel = (value: string): value is LogLevel => LOG_LEVELS.some((level) => level === value);

const parsePositiveInt = (name: string, value: string): number => {
  const n = Number(value);
  if (!Number.isSafeInteger(n) || n <= 0) throw new Error(`${name} must be a positive integer, got "${value}"`);
  return n;
};

const parseHash = (name: string, value: string): bigint => {
  if (!/^0x[0-9a-fA-F]{64}$/.test(value)) throw new Error(`${name} must be a 32-byte 0x-prefixed hash, got "${value}"`);
  return BigInt(value);
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): Config => {
  const logLevel = env.LOG_LEVEL || "info";
  if (!isLogLevel(logLevel)) throw new Error(`LOG_LEVEL must be one of ${LOG_LEVELS.join(", ")}, got "${logLevel}"`);

  return {
    traceFile: env.TRACE_FILE || DEFAULT_TRACE_FILE,
    ...(env.TX_HASH ? { txHash: parseHash("TX_HASH", env.TX_HASH) } : {}),
    maxInternalCalls: env.MAX_INTERNAL_CALLS
      ? parsePositiveInt("MAX_INTERNAL_CALLS", env.MAX_INTERNAL_CALLS)
      : DEFAULT_MAX_INTERNAL_CALLS,
    logLevel,
    colored: !env.NO_COLOR,
  };
};
