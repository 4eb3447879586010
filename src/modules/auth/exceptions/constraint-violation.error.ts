export type UniqueConstraint = 'email' | 'username' | 'external_identity';

/**
 * Raised by an AccountStore when a save would break one of the live-row
 * uniqueness rules. Stores never surface raw driver errors for this case.
 */
export class ConstraintViolationError extends Error {
  readonly constraint: UniqueConstraint;

  constructor(constraint: UniqueConstraint) {
    super(`Unique constraint violated: ${constraint}`);
    this.name = 'ConstraintViolationError';
    this.constraint = constraint;
  }
}
