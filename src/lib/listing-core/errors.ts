/**
 * Errors raised or reported by the listing core.
 *
 * Only `InvalidRequestError` is ever thrown. Pattern problems are returned as
 * `PatternError` values so one bad rule cannot abort detection.
 */

export class InvalidRequestError extends Error {
  readonly code = 'INVALID_REQUEST';

  constructor(message: string) {
    super(message);
    this.name = 'InvalidRequestError';
  }
}

export class PatternError extends Error {
  readonly code = 'INVALID_PATTERN';

  constructor(
    readonly key: string,
    readonly pattern: string,
    message: string
  ) {
    super(`Pattern "${key}" (${pattern}) is invalid: ${message}`);
    this.name = 'PatternError';
  }
}
