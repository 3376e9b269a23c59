import type { DetokenizeFn, Token, TokenizeFn, TokenizerConfig } from "../types.js";
import type { Tokenizer } from "../tokenizer.js";
import { assertTokenizerConfig } from "../validation.js";

/**
 * Wraps a caller-supplied function pair. The functions are held by reference
 * and shared by every trie built from this tokenizer.
 *
 * The caller guarantees `detokenize(tokenize(k)) === k`. Nothing here checks it;
 * when it does not hold, keys reconstructed by trie queries are unspecified.
 */
export class CustomTokenizer implements Tokenizer {
  readonly config: TokenizerConfig;

  constructor(
    private readonly tokenizeFn: TokenizeFn,
    private readonly detokenizeFn: DetokenizeFn,
  ) {
    this.config = { kind: "custom", tokenize: tokenizeFn, detokenize: detokenizeFn };
    assertTokenizerConfig(this.config);
  }

  tokenize(key: string): Token[] {
    return this.tokenizeFn(key);
  }

  detokenize(tokens: readonly Token[]): string {
    // copy so the caller's function cannot mutate trie-owned paths
    return this.detokenizeFn([...tokens]);
  }
}
