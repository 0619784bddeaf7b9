/**
 * Field whose uniqueness constraint was violated
 */
export type IdentityConflictField = 'email' | 'provider';

/**
 * Raised by identity storage when a create or update would break the
 * uniqueness of `email` or of `(provider, subjectId)`
 */
export class IdentityConflictError extends Error {
  public readonly field: IdentityConflictField;

  constructor(field: IdentityConflictField, options?: { cause?: unknown }) {
    super(`Identity with the same ${field === 'email' ? 'email' : 'provider identity'} already exists`);
    this.name = 'IdentityConflictError';
    this.field = field;
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/**
 * Raised by identity storage when a create would produce a record with
 * neither a credential digest nor a provider identity
 */
export class IdentityInvariantError extends Error {
  constructor(message = 'Identity must have a credential digest or a provider identity') {
    super(message);
    this.name = 'IdentityInvariantError';
  }
}
