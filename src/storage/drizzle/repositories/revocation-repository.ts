import { eq, lte } from 'drizzle-orm';
import type { IRevocationStorage } from '../../interfaces/revocation-storage.js';
import { revokedTokens } from '../schema.js';
import { getDatabase, type Database } from '../client.js';

/**
 * Drizzle revocation storage implementation (PostgreSQL)
 */
export class DrizzleRevocationStorage implements IRevocationStorage {
  private readonly db: Database;

  constructor(options: { db?: Database } = {}) {
    this.db = options.db ?? getDatabase();
  }

  async revoke(tokenHash: string, expiresAt: Date): Promise<void> {
    await this.db
      .insert(revokedTokens)
      .values({ tokenHash, expiresAt })
      .onConflictDoNothing({ target: revokedTokens.tokenHash });
  }

  async isRevoked(tokenHash: string): Promise<boolean> {
    const [row] = await this.db
      .select({ tokenHash: revokedTokens.tokenHash })
      .from(revokedTokens)
      .where(eq(revokedTokens.tokenHash, tokenHash))
      .limit(1);
    return row !== undefined;
  }

  async deleteExpired(now: Date = new Date()): Promise<number> {
    const deleted = await this.db
      .delete(revokedTokens)
      .where(lte(revokedTokens.expiresAt, now))
      .returning({ tokenHash: revokedTokens.tokenHash });
    return deleted.length;
  }
}
