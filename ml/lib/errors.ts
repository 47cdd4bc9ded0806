export class WordVectorError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * The embedding table could not be opened or read.
 */
export class IOError extends WordVectorError {
  constructor(public path: string, public cause?: unknown) {
    super(`Could not read word vectors from ${path}${cause instanceof Error ? `: ${cause.message}` : ''}`);
  }
}

/**
 * A row of the embedding table is malformed. `lineNumber` is 1-based.
 */
export class ParseError extends WordVectorError {
  constructor(public lineNumber: number, public reason: string) {
    super(`Line ${lineNumber}: ${reason}`);
  }
}

export class DimensionMismatchError extends WordVectorError {
  constructor(public expected: number, public actual: number) {
    super(`Vector dimensions differ: expected ${expected}, got ${actual}`);
  }
}

export class EmptyInputError extends WordVectorError {
  constructor(operation: string) {
    super(`Cannot compute ${operation} of no vectors`);
  }
}

export class UsageError extends WordVectorError { }
