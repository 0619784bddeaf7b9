import type { IdentityRecord, CreateIdentityInput, UpdateIdentityInput } from '../../types/identity.js';

/**
 * Storage interface for identity records
 *
 * Implementations must enforce uniqueness of `email` and of
 * `(provider, subjectId)`, reporting violations as `IdentityConflictError`
 * so callers can re-resolve after losing a race.
 */
export interface IIdentityStorage {
  /**
   * Create a new identity record
   * The store assigns the id and timestamps
   */
  create(input: CreateIdentityInput): Promise<IdentityRecord>;

  /**
   * Find an identity by its id
   */
  findById(id: number): Promise<IdentityRecord | null>;

  /**
   * Find an identity by normalized email
   */
  findByEmail(email: string): Promise<IdentityRecord | null>;

  /**
   * Find the identity holding a provider identity
   */
  findByProvider(provider: string, subjectId: string): Promise<IdentityRecord | null>;

  /**
   * Update an identity in place; advances `updatedAt`
   */
  update(id: number, input: UpdateIdentityInput): Promise<IdentityRecord>;
}
