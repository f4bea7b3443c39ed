/**
 * Raised before any simulation runs when a plan input is missing or out of range.
 */
export class InputValidationError extends Error {
  public readonly field: string;

  constructor(field: string, message: string) {
    super(message);
    this.name = 'InputValidationError';
    this.field = field;
  }
}

/**
 * Raised when a background job id is unknown or its result is not ready yet.
 */
export class NotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}
