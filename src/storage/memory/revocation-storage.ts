import type { RevokedToken } from '../../types/token.js';
import type { IRevocationStorage } from '../interfaces/revocation-storage.js';

/**
 * In-memory revocation storage implementation
 * Suitable for single-process deployments
 */
export class MemoryRevocationStorage implements IRevocationStorage {
  private revokedTokens = new Map<string, RevokedToken>(); // tokenHash -> record
  private readonly now: () => Date;

  constructor(options: { now?: () => Date } = {}) {
    this.now = options.now ?? (() => new Date());
  }

  async revoke(tokenHash: string, expiresAt: Date): Promise<void> {
    const now = this.now();

    // Lazy pruning keeps the set bounded by the number of live revoked tokens
    this.pruneExpired(now);

    if (this.revokedTokens.has(tokenHash)) {
      return;
    }

    this.revokedTokens.set(tokenHash, {
      tokenHash,
      expiresAt,
      revokedAt: now,
    });
  }

  async isRevoked(tokenHash: string): Promise<boolean> {
    return this.revokedTokens.has(tokenHash);
  }

  async deleteExpired(now: Date = this.now()): Promise<number> {
    return this.pruneExpired(now);
  }

  /**
   * Number of entries currently held
   */
  get size(): number {
    return this.revokedTokens.size;
  }

  private pruneExpired(now: Date): number {
    let deleted = 0;

    for (const [tokenHash, token] of this.revokedTokens) {
      if (token.expiresAt <= now) {
        this.revokedTokens.delete(tokenHash);
        deleted++;
      }
    }

    return deleted;
  }
}
