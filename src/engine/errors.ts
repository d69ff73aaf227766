export enum SieveErrorKind {
  NOT_POPULATED = 'NotPopulated',
  OUT_OF_BOUNDS = 'OutOfBounds',
}

/**
 * Base class for the expected failures of a sieve query
 */
export abstract class SieveError extends Error {
  abstract readonly kind: SieveErrorKind;

  protected constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Raised when a sieve is queried before `fill()` has run.
 * Recoverable: populate the sieve and retry.
 */
export class NotPopulatedError extends SieveError {
  readonly kind = SieveErrorKind.NOT_POPULATED;

  constructor() {
    super('Sieve not populated!');
  }
}

/**
 * Raised when the queried value is not an index of the table: above the
 * limit, negative, or not an integer. A larger sieve is needed.
 */
export class OutOfBoundsError extends SieveError {
  readonly kind = SieveErrorKind.OUT_OF_BOUNDS;

  constructor(readonly target: number, readonly limit: number) {
    super(`${target} is out of this sieve's bounds (max ${limit})`);
  }
}
