import type { Logger as PinoLogger } from "pino";

/**
 * The slice of pino's logger the trie writes to. Any pino logger (or child)
 * satisfies it; callers may also pass a stand-in with the same methods.
 */
export type Logger = Pick<PinoLogger, "debug" | "info" | "warn" | "error">;
