export class KeywordError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'KeywordError';
  }
}

/** A referenced file, sheet, section, key or field does not exist. */
export class NotFoundError extends KeywordError {
  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}

/** Malformed directive parameters or cell references. */
export class FormatError extends KeywordError {
  constructor(message: string) {
    super(message);
    this.name = 'FormatError';
  }
}

export class UnsupportedError extends KeywordError {
  constructor(message: string) {
    super(message);
    this.name = 'UnsupportedError';
  }
}

/** A collaborator (workbook, summarizer, document reader) failed. */
export class BackendError extends KeywordError {
  constructor(message: string) {
    super(message);
    this.name = 'BackendError';
  }
}

export class RecursionLimitError extends KeywordError {
  constructor(public readonly depth: number) {
    super(`Keyword nesting exceeds ${depth} levels`);
    this.name = 'RecursionLimitError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
