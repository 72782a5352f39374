/** Error codes raised by the normalizer core. */
export type NormalizerErrorCode =
  | 'INVALID_INPUT_TYPE'
  | 'CONSISTENCY_VIOLATION'
  | 'SEARCH_LIMIT_EXCEEDED';

/**
 * Base class for errors raised by the normalizer core.
 */
export class NormalizerError extends Error {
  constructor(
    message: string,
    public readonly code: NormalizerErrorCode,
  ) {
    super(message);
    this.name = 'NormalizerError';
  }
}

/**
 * An attribute-set or FD argument has a shape that cannot be normalized.
 */
export class InvalidInputTypeError extends NormalizerError {
  constructor(message: string) {
    super(message, 'INVALID_INPUT_TYPE');
    this.name = 'InvalidInputTypeError';
  }
}

/**
 * A decomposition split failed to shrink its schema. Only reachable through
 * a defect in the violation search, never through user input.
 */
export class ConsistencyViolationError extends NormalizerError {
  constructor(message: string) {
    super(message, 'CONSISTENCY_VIOLATION');
    this.name = 'ConsistencyViolationError';
  }
}

/**
 * An exhaustive subset search was refused because the attribute set is
 * larger than the configured limit.
 */
export class SearchLimitExceededError extends NormalizerError {
  constructor(
    message: string,
    public readonly limit: number,
    public readonly attributeCount: number,
  ) {
    super(message, 'SEARCH_LIMIT_EXCEEDED');
    this.name = 'SearchLimitExceededError';
  }
}
