import { and, eq } from 'drizzle-orm';
import type {
  IdentityRecord,
  CreateIdentityInput,
  UpdateIdentityInput,
} from '../../../types/identity.js';
import type { IIdentityStorage } from '../../interfaces/identity-storage.js';
import { IdentityConflictError, IdentityInvariantError } from '../../../errors/storage-error.js';
import { encrypt, decrypt } from '../../../crypto/encrypt.js';
import {
  identities,
  IDENTITIES_EMAIL_UNIQUE,
  IDENTITIES_PROVIDER_UNIQUE,
  type IdentityRow,
  type NewIdentityRow,
} from '../schema.js';
import { getDatabase, uniqueViolationConstraint, type Database } from '../client.js';

/**
 * Translate a unique violation into the storage-level conflict error
 */
export function toConflictError(error: unknown): unknown {
  const constraint = uniqueViolationConstraint(error);
  if (constraint === undefined) {
    return error;
  }
  if (constraint === IDENTITIES_PROVIDER_UNIQUE) {
    return new IdentityConflictError('provider', { cause: error });
  }
  if (constraint === IDENTITIES_EMAIL_UNIQUE) {
    return new IdentityConflictError('email', { cause: error });
  }
  return error;
}

/**
 * Drizzle identity storage implementation (PostgreSQL)
 */
export class DrizzleIdentityStorage implements IIdentityStorage {
  private readonly db: Database;
  private readonly encryptionKey: string;

  constructor(options: { encryptionKey: string; db?: Database }) {
    this.db = options.db ?? getDatabase();
    this.encryptionKey = options.encryptionKey;
  }

  async create(input: CreateIdentityInput): Promise<IdentityRecord> {
    if (!input.credentialDigest && !input.providerIdentity) {
      throw new IdentityInvariantError();
    }

    const values: NewIdentityRow = {
      email: input.email,
      credentialDigest: input.credentialDigest ?? null,
      providerName: input.providerIdentity?.provider ?? null,
      providerSubjectId: input.providerIdentity?.subjectId ?? null,
      providerAccessToken: input.providerTokens
        ? encrypt(input.providerTokens.accessToken, this.encryptionKey)
        : null,
      providerRefreshToken: input.providerTokens?.refreshToken
        ? encrypt(input.providerTokens.refreshToken, this.encryptionKey)
        : null,
      displayName: input.displayName ?? null,
      pictureUrl: input.pictureUrl ?? null,
    };

    let rows: IdentityRow[];
    try {
      rows = await this.db.insert(identities).values(values).returning();
    } catch (error) {
      throw toConflictError(error);
    }

    const [row] = rows;
    if (!row) {
      throw new Error('Identity insert returned no row');
    }
    return this.rowToIdentity(row);
  }

  async findById(id: number): Promise<IdentityRecord | null> {
    const [row] = await this.db.select().from(identities).where(eq(identities.id, id)).limit(1);
    return row ? this.rowToIdentity(row) : null;
  }

  async findByEmail(email: string): Promise<IdentityRecord | null> {
    const [row] = await this.db
      .select()
      .from(identities)
      .where(eq(identities.email, email))
      .limit(1);
    return row ? this.rowToIdentity(row) : null;
  }

  async findByProvider(provider: string, subjectId: string): Promise<IdentityRecord | null> {
    const [row] = await this.db
      .select()
      .from(identities)
      .where(
        and(eq(identities.providerName, provider), eq(identities.providerSubjectId, subjectId))
      )
      .limit(1);
    return row ? this.rowToIdentity(row) : null;
  }

  async update(id: number, input: UpdateIdentityInput): Promise<IdentityRecord> {
    const changes: Partial<NewIdentityRow> = {
      updatedAt: new Date(),
    };

    if (input.credentialDigest !== undefined) {
      changes.credentialDigest = input.credentialDigest;
    }
    if (input.providerIdentity) {
      changes.providerName = input.providerIdentity.provider;
      changes.providerSubjectId = input.providerIdentity.subjectId;
    }
    if (input.providerTokens) {
      changes.providerAccessToken = encrypt(input.providerTokens.accessToken, this.encryptionKey);
      changes.providerRefreshToken = input.providerTokens.refreshToken
        ? encrypt(input.providerTokens.refreshToken, this.encryptionKey)
        : null;
    }
    if (input.displayName !== undefined) {
      changes.displayName = input.displayName;
    }
    if (input.pictureUrl !== undefined) {
      changes.pictureUrl = input.pictureUrl;
    }

    let rows: IdentityRow[];
    try {
      rows = await this.db
        .update(identities)
        .set(changes)
        .where(eq(identities.id, id))
        .returning();
    } catch (error) {
      throw toConflictError(error);
    }

    const [row] = rows;
    if (!row) {
      throw new Error(`Identity not found: ${id}`);
    }
    return this.rowToIdentity(row);
  }

  private rowToIdentity(row: IdentityRow): IdentityRecord {
    return {
      id: row.id,
      email: row.email,
      credentialDigest: row.credentialDigest ?? undefined,
      providerIdentity:
        row.providerName && row.providerSubjectId
          ? { provider: row.providerName, subjectId: row.providerSubjectId }
          : undefined,
      providerTokens: row.providerAccessToken
        ? {
            accessToken: decrypt(row.providerAccessToken, this.encryptionKey),
            refreshToken: row.providerRefreshToken
              ? decrypt(row.providerRefreshToken, this.encryptionKey)
              : undefined,
          }
        : undefined,
      displayName: row.displayName ?? undefined,
      pictureUrl: row.pictureUrl ?? undefined,
      createdAt: row.createdAt,
      updatedAt: row.updatedAt,
    };
  }
}
