export type ExtractionFailureCode = 'FETCH_ERROR' | 'EXTRACT_ERROR';

export class ExtractionFailure extends Error {
  readonly code: ExtractionFailureCode;

  constructor(code: ExtractionFailureCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ExtractionFailure';
    this.code = code;
  }
}

/** The raw document bytes could not be fetched from the object store. */
export class FetchError extends ExtractionFailure {
  constructor(message: string, options?: { cause?: unknown }) {
    super('FETCH_ERROR', message, options);
    this.name = 'FetchError';
  }
}

/** The bytes were fetched but no usable text came out of them. */
export class ExtractError extends ExtractionFailure {
  constructor(message: string, options?: { cause?: unknown }) {
    super('EXTRACT_ERROR', message, options);
    this.name = 'ExtractError';
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class RunCancelledError extends Error {
  constructor(message = 'Concept run was cancelled.') {
    super(message);
    this.name = 'RunCancelledError';
  }
}
