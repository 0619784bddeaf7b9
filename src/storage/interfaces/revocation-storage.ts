/**
 * Storage interface for bearer-token revocation
 *
 * Entries are keyed by a hash of the token string and carry the token's
 * expiry so they can be pruned once the token could no longer verify.
 */
export interface IRevocationStorage {
  /**
   * Mark a token hash as revoked. Idempotent.
   */
  revoke(tokenHash: string, expiresAt: Date): Promise<void>;

  /**
   * Check if a token hash has been revoked
   */
  isRevoked(tokenHash: string): Promise<boolean>;

  /**
   * Delete entries whose token has expired (cleanup)
   */
  deleteExpired(now?: Date): Promise<number>;
}
