/**
 * Raised when a caller hands the scanner, an indicator or a data helper something it
 * cannot work with: bad parameters, a series that is too short, an unreadable CSV.
 */
export class InvalidInputError extends Error {
  readonly field?: string;

  constructor(message: string, field?: string) {
    super(field ? `${field}: ${message}` : message);
    this.name = 'InvalidInputError';
    this.field = field;
    Object.setPrototypeOf(this, InvalidInputError.prototype);
  }
}
