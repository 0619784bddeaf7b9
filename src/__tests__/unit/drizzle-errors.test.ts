import { describe, it, expect } from 'vitest';
import { uniqueViolationConstraint } from '../../storage/drizzle/client.js';
import { toConflictError } from '../../storage/drizzle/repositories/identity-repository.js';
import { IDENTITIES_EMAIL_UNIQUE, IDENTITIES_PROVIDER_UNIQUE } from '../../storage/drizzle/schema.js';
import { IdentityConflictError } from '../../errors/storage-error.js';

/**
 * Shape of the errors postgres.js raises for failed statements
 */
class PostgresLikeError extends Error {
  constructor(
    public readonly code: string,
    public readonly constraint_name?: string
  ) {
    super(`postgres error ${code}`);
  }
}

function wrapped(cause: unknown): Error {
  return new Error('Failed query', { cause });
}

describe('uniqueViolationConstraint', () => {
  it('should return the constraint of a unique violation', () => {
    const error = new PostgresLikeError('23505', IDENTITIES_EMAIL_UNIQUE);

    expect(uniqueViolationConstraint(error)).toBe(IDENTITIES_EMAIL_UNIQUE);
  });

  it('should follow the cause chain', () => {
    const error = wrapped(new PostgresLikeError('23505', IDENTITIES_EMAIL_UNIQUE));

    expect(uniqueViolationConstraint(error)).toBe(IDENTITIES_EMAIL_UNIQUE);
  });

  it('should return an empty name when the constraint is not reported', () => {
    expect(uniqueViolationConstraint(new PostgresLikeError('23505'))).toBe('');
  });

  it('should ignore other errors', () => {
    expect(uniqueViolationConstraint(new PostgresLikeError('23503', 'identities_fk'))).toBeUndefined();
    expect(uniqueViolationConstraint(new Error('connection reset'))).toBeUndefined();
    expect(uniqueViolationConstraint('23505')).toBeUndefined();
  });
});

describe('toConflictError', () => {
  it('should map the email constraint to an email conflict', () => {
    const cause = new PostgresLikeError('23505', IDENTITIES_EMAIL_UNIQUE);

    const error = toConflictError(cause);

    expect(error).toBeInstanceOf(IdentityConflictError);
    expect(error instanceof IdentityConflictError ? error.field : undefined).toBe('email');
    expect(error instanceof Error ? error.cause : undefined).toBe(cause);
  });

  it('should map the provider constraint to a provider conflict', () => {
    const error = toConflictError(wrapped(new PostgresLikeError('23505', IDENTITIES_PROVIDER_UNIQUE)));

    expect(error instanceof IdentityConflictError ? error.field : undefined).toBe('provider');
  });

  it('should pass through violations of other constraints', () => {
    const original = new PostgresLikeError('23505', 'identities_pkey');

    expect(toConflictError(original)).toBe(original);
  });

  it('should pass through errors that are not unique violations', () => {
    const original = wrapped(new PostgresLikeError('40001'));

    expect(toConflictError(original)).toBe(original);
  });
});
