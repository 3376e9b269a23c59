import type { TokenizerConfig, TokenizerKind } from "./types.js";
import { invalidArgument, type FieldError } from "./errors.js";

/** Field errors for a tokenizer configuration; empty when it is usable. */
export function validateTokenizerConfig(config: TokenizerConfig): FieldError[] {
  const errors: FieldError[] = [];

  switch (config.kind) {
    case "slice":
      if (!Number.isInteger(config.length)) errors.push({ path: "$.length", message: "must be an integer" });
      else if (config.length < 1) errors.push({ path: "$.length", message: "must be at least 1" });
      break;
    case "delimiter":
      if (typeof config.delimiter !== "string") errors.push({ path: "$.delimiter", message: "must be a string" });
      else if (config.delimiter.length === 0) errors.push({ path: "$.delimiter", message: "must be non-empty" });
      break;
    case "custom":
      if (typeof config.tokenize !== "function") errors.push({ path: "$.tokenize", message: "must be a function" });
      if (typeof config.detokenize !== "function") errors.push({ path: "$.detokenize", message: "must be a function" });
      break;
  }

  return errors;
}

export function assertTokenizerConfig(config: TokenizerConfig): void {
  const errors = validateTokenizerConfig(config);
  if (errors.length) throw invalidArgument(describe(config.kind), errors);
}

function describe(kind: TokenizerKind): string {
  return `invalid ${kind} tokenizer`;
}
