export type AnalysisErrorCode = 'EMPTY_INPUT' | 'INVALID_ARGUMENT' | 'MISSING_SOURCE';

export class AnalysisError extends Error {
  constructor(readonly code: AnalysisErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A statistic was requested over a collection with no values for its metric. */
export class EmptyInputError extends AnalysisError {
  constructor(message = 'Statistic is undefined for an empty collection') {
    super('EMPTY_INPUT', message);
  }
}

export class InvalidArgumentError extends AnalysisError {
  constructor(message: string) {
    super('INVALID_ARGUMENT', message);
  }
}

/** The row source could not supply any data. Fatal for the whole parse. */
export class MissingSourceError extends AnalysisError {
  constructor(message: string, cause?: unknown) {
    super('MISSING_SOURCE', message, cause === undefined ? undefined : { cause });
  }
}
