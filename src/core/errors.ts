export type FeedErrorCode =
  | 'NOT_FOUND'
  | 'DATA_INTEGRITY'
  | 'CONNECTION'
  | 'STALE_CREDENTIAL'
  | 'INSTRUMENT_PARSE';

export class FeedError extends Error {
  public readonly code: FeedErrorCode;

  constructor(message: string, code: FeedErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    this.name = 'FeedError';
  }
}

/** Symbol, expiry or instrument absent. */
export class NotFoundError extends FeedError {
  constructor(message: string) {
    super(message, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

/** More than one instrument row for a filter tuple. */
export class DataIntegrityError extends FeedError {
  public readonly matches: number;

  constructor(message: string, matches: number) {
    super(message, 'DATA_INTEGRITY');
    this.matches = matches;
    this.name = 'DataIntegrityError';
  }
}

export class ConnectionError extends FeedError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'CONNECTION', options);
    this.name = 'ConnectionError';
  }
}

export class StaleCredentialError extends FeedError {
  constructor(message: string) {
    super(message, 'STALE_CREDENTIAL');
    this.name = 'StaleCredentialError';
  }
}

/** A master-table row that cannot be indexed. Fatal during setup. */
export class InstrumentParseError extends FeedError {
  public readonly line: number;

  constructor(message: string, line: number) {
    super(`${message} (line ${line})`, 'INSTRUMENT_PARSE');
    this.line = line;
    this.name = 'InstrumentParseError';
  }
}
