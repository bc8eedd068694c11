type ErrorDetails = {
  cause?: unknown;
  status?: number;
};

export class PdfQaError extends Error {
  constructor(message: string, options: ErrorDetails = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
  }
}

/** Bad data directory, or a PDF that cannot be read or parsed. */
export class LoadError extends PdfQaError {
  readonly source?: string;

  constructor(message: string, options: ErrorDetails & { source?: string } = {}) {
    super(message, options);
    this.source = options.source;
  }
}

export class EmbeddingServiceError extends PdfQaError {
  readonly status?: number;

  constructor(message: string, options: ErrorDetails = {}) {
    super(message, options);
    this.status = options.status;
  }
}

export class GenerationError extends PdfQaError {
  readonly status?: number;

  constructor(message: string, options: ErrorDetails = {}) {
    super(message, options);
    this.status = options.status;
  }
}

export type StorageFailure = 'missing' | 'unreadable' | 'corrupt' | 'write' | 'mismatch';

/** Missing or corrupt index snapshot, or a failed write. */
export class StorageError extends PdfQaError {
  readonly path?: string;

  readonly reason: StorageFailure;

  constructor(message: string, options: ErrorDetails & { path?: string; reason?: StorageFailure } = {}) {
    super(message, options);
    this.path = options.path;
    this.reason = options.reason ?? 'corrupt';
  }
}

export class DimensionMismatchError extends PdfQaError {
  readonly expected: number;

  readonly actual: number;

  constructor(expected: number, actual: number, context = 'vector') {
    super(`Expected ${context} of dimension ${expected}, received ${actual}.`);
    this.expected = expected;
    this.actual = actual;
  }
}

export class ConfigError extends PdfQaError {}

export const describeError = (error: unknown): string => {
  if (error instanceof Error && error.message) {
    return error.message;
  }

  return typeof error === 'string' ? error : 'Unknown error';
};
