import type { Token, TokenizerConfig } from "../types.js";
import type { Tokenizer } from "../tokenizer.js";
import { assertTokenizerConfig } from "../validation.js";
import { graphemes } from "./graphemes.js";

/**
 * Fixed-width tokenizer:
 * - segments the key into grapheme clusters (user-perceived characters)
 * - groups them `length` at a time, last token may be shorter
 * - detokenize is plain concatenation
 */
export class SliceTokenizer implements Tokenizer {
  readonly config: TokenizerConfig;

  constructor(readonly length: number = 1) {
    this.config = { kind: "slice", length };
    assertTokenizerConfig(this.config);
  }

  tokenize(key: string): Token[] {
    const out: Token[] = [];
    let current = "";
    let count = 0;

    for (const { segment } of graphemes.segment(key)) {
      current += segment;
      count++;
      if (count === this.length) {
        out.push(current);
        current = "";
        count = 0;
      }
    }

    if (count > 0) out.push(current);
    return out;
  }

  detokenize(tokens: readonly Token[]): string {
    return tokens.join("");
  }
}
