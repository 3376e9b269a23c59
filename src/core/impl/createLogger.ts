import { pino, type DestinationStream, type Logger, type LoggerOptions } from "pino";
import { loadConfig, type LogLevel } from "../../config.js";

export interface CreateLoggerOptions {
  /** Defaults to `TRIE_LOG_LEVEL`, see `loadConfig`. */
  level?: LogLevel;
  destination?: DestinationStream;
}

/** pino logger scoped to the trie component. */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const pinoOptions: LoggerOptions = { level: options.level ?? loadConfig().logLevel };
  const base = options.destination ? pino(pinoOptions, options.destination) : pino(pinoOptions);
  return base.child({ component: "trie" });
}
