import type { TokenizerConfig } from "../types.js";
import type { Tokenizer } from "../tokenizer.js";
import { SliceTokenizer } from "./sliceTokenizer.js";
import { DelimiterTokenizer } from "./delimiterTokenizer.js";
import { CustomTokenizer } from "./customTokenizer.js";

export function createTokenizer(config: TokenizerConfig): Tokenizer {
  switch (config.kind) {
    case "slice":
      return new SliceTokenizer(config.length);
    case "delimiter":
      return new DelimiterTokenizer(config.delimiter);
    case "custom":
      return new CustomTokenizer(config.tokenize, config.detokenize);
  }
}
