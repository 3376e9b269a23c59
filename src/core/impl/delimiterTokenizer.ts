import type { Token, TokenizerConfig } from "../types.js";
import type { Tokenizer } from "../tokenizer.js";
import { assertTokenizerConfig } from "../validation.js";
import { graphemeBoundaries } from "./graphemes.js";

/**
 * Splits keys on a literal delimiter. Tokens never contain the delimiter;
 * empty segments (leading, trailing or doubled delimiters) are kept so that
 * detokenize restores the key exactly.
 *
 * A match only counts when it starts and ends on grapheme boundaries, so a
 * delimiter such as a ZWJ or a combining mark never cuts a cluster apart.
 */
export class DelimiterTokenizer implements Tokenizer {
  readonly config: TokenizerConfig;

  constructor(readonly delimiter: string) {
    this.config = { kind: "delimiter", delimiter };
    assertTokenizerConfig(this.config);
  }

  tokenize(key: string): Token[] {
    // the empty key has no tokens
    if (key.length === 0) return [];

    const d = this.delimiter;
    const boundaries = graphemeBoundaries(key);
    const out: Token[] = [];
    let start = 0;
    let from = 0;

    while (from <= key.length - d.length) {
      const at = key.indexOf(d, from);
      if (at < 0) break;
      if (boundaries.has(at) && boundaries.has(at + d.length)) {
        out.push(key.slice(start, at));
        start = at + d.length;
        from = start;
      } else {
        from = at + 1;
      }
    }

    out.push(key.slice(start));
    return out;
  }

  detokenize(tokens: readonly Token[]): string {
    return tokens.join(this.delimiter);
  }
}
