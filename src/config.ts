import type { LevelWithSilent } from "pino";

export type LogLevel = LevelWithSilent;

export interface TrieConfig {
  logLevel: LogLevel;
}

const LOG_LEVELS: readonly LogLevel[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];
const DEFAULT_LOG_LEVEL: LogLevel = "warn";

export function isLogLevel(v: string): v is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(v);
}

/** Reads package defaults from the environment (`TRIE_LOG_LEVEL`). */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): TrieConfig {
  const raw = (env.TRIE_LOG_LEVEL ?? "").trim().toLowerCase();
  return {
    logLevel: isLogLevel(raw) ? raw : DEFAULT_LOG_LEVEL,
  };
}
