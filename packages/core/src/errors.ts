/**
 * Raised when a product specification breaks a structural invariant
 * (negative mass, rate outside [0, 1], end-of-life split not summing to 1).
 * Always thrown before any phase is calculated.
 */
export class InvariantViolationError extends Error {
  readonly field: string;

  constructor(field: string, message: string) {
    super(`${field} ${message}`);
    this.name = "InvariantViolation";
    this.field = field;
  }
}

export const isInvariantViolation = (error: unknown): error is InvariantViolationError =>
  error instanceof InvariantViolationError;
