import type { Token, TokenizerConfig } from "./types.js";

/**
 * Turns a key into the ordered tokens that make up its path through a trie, and back.
 *
 * Contract notes:
 * - must be deterministic and must not change after construction
 * - `detokenize(tokenize(k)) === k` for every key a trie holds
 * - built-in implementations never split a grapheme cluster
 */
export interface Tokenizer {
  readonly config: TokenizerConfig;

  tokenize(key: string): Token[];
  detokenize(tokens: readonly Token[]): string;
}
