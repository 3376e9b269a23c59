/** Shared core types used by module contracts. */

export type Token = string;

export type TokenizeFn = (key: string) => Token[];
export type DetokenizeFn = (tokens: Token[]) => string;

/** Inspectable description of the strategy a tokenizer implements. */
export type TokenizerConfig =
  | { readonly kind: "slice"; readonly length: number }
  | { readonly kind: "delimiter"; readonly delimiter: string }
  | { readonly kind: "custom"; readonly tokenize: TokenizeFn; readonly detokenize: DetokenizeFn };

export type TokenizerKind = TokenizerConfig["kind"];
