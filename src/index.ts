export type { Token, TokenizeFn, DetokenizeFn, TokenizerKind, TokenizerConfig } from "./core/types.js";
export type { Tokenizer } from "./core/tokenizer.js";
export type { Trie, TrieNodeView, TrieNodeMut } from "./core/trie.js";
export type { Logger } from "./core/logger.js";
export { TrieError, invalidArgument, type FieldError, type TrieErrorCode } from "./core/errors.js";
export { validateTokenizerConfig } from "./core/validation.js";
export { loadConfig, isLogLevel, type LogLevel, type TrieConfig } from "./config.js";
export * from "./core/impl/index.js";
