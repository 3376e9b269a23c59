export interface FieldError {
  path: string;
  message: string;
}

export type TrieErrorCode = "INVALID_ARGUMENT";

export interface TrieErrorParams {
  code: TrieErrorCode;
  detail: string;
  errors?: FieldError[];
}

/**
 * Thrown for contract violations at construction time (degenerate tokenizer configuration).
 * Absent keys and empty query results are never reported through this type.
 */
export class TrieError extends Error {
  readonly code: TrieErrorCode;
  readonly title: string;
  readonly detail: string;
  readonly errors: FieldError[];

  constructor(params: TrieErrorParams) {
    super(formatMessage(params));
    this.name = "TrieError";
    this.code = params.code;
    this.title = codeToTitle(params.code);
    this.detail = params.detail;
    this.errors = params.errors ?? [];
  }
}

export function invalidArgument(detail: string, errors?: FieldError[]): TrieError {
  return new TrieError({ code: "INVALID_ARGUMENT", detail, errors });
}

function formatMessage(params: TrieErrorParams): string {
  const title = codeToTitle(params.code);
  const fields = (params.errors ?? []).map((e) => `${e.path} ${e.message}`);
  return fields.length ? `${title}: ${params.detail} (${fields.join("; ")})` : `${title}: ${params.detail}`;
}

function codeToTitle(code: TrieErrorCode): string {
  switch (code) {
    case "INVALID_ARGUMENT":
      return "Invalid argument";
  }
}
