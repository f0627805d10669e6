import chalk from "chalk";
import { type Colorizer, optionalChalk } from "./color";

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  colored?: boolean;
  name?: string;
}

type Sink = (...args: unknown[]) => void;

export const createLogger = (options: LoggerOptions = {}): Logger => {
  const { level = "info", colored = true, name } = options;
  const threshold = LOG_LEVELS.indexOf(level);

  const write = (lvl: Exclude<LogLevel, "silent">, color: Colorizer, sink: Sink) => {
    if (LOG_LEVELS.indexOf(lvl) < threshold) return () => {};
    const tag = optionalChalk(color, colored)(lvl.toUpperCase().padEnd(5));
    const prefix = name ? `${tag} ${optionalChalk(chalk.gray, colored)(`[${name}]`)}` : tag;
    return (message: string, ...args: unknown[]) => sink(`${prefix} ${message}`, ...args);
  };

  return {
    debug: write("debug", chalk.gray, console.debug),
    info: write("info", chalk.cyan, console.log),
    warn: write("warn", chalk.yellow, console.warn),
    error: write("error", chalk.red, console.error),
  };
};

export const silentLogger: Logger = createLogger({ level: "silent" });
