export { createLogger, type CreateLoggerOptions } from "./createLogger.js";
export { CustomTokenizer } from "./customTokenizer.js";
export { DelimiterTokenizer } from "./delimiterTokenizer.js";
export { SliceTokenizer } from "./sliceTokenizer.js";
export { createTokenizer } from "./createTokenizer.js";
export { TrieNode, TrieNodeHandle } from "./trieNode.js";
export { MemoryTrie, type MemoryTrieOptions } from "./memoryTrie.js";
