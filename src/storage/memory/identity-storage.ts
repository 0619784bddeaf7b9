import type {
  IdentityRecord,
  CreateIdentityInput,
  UpdateIdentityInput,
  ProviderIdentity,
} from '../../types/identity.js';
import type { IIdentityStorage } from '../interfaces/identity-storage.js';
import { IdentityConflictError, IdentityInvariantError } from '../../errors/storage-error.js';

function providerKey(identity: ProviderIdentity): string {
  return `${identity.provider}:${identity.subjectId}`;
}

function clone(record: IdentityRecord): IdentityRecord {
  return {
    ...record,
    providerIdentity: record.providerIdentity ? { ...record.providerIdentity } : undefined,
    providerTokens: record.providerTokens ? { ...record.providerTokens } : undefined,
  };
}

/**
 * In-memory identity storage implementation
 *
 * Check-and-insert runs without an await in between, so uniqueness holds
 * under concurrent callers on the same event loop.
 */
export class MemoryIdentityStorage implements IIdentityStorage {
  private identities = new Map<number, IdentityRecord>();
  private emailIndex = new Map<string, number>(); // email -> id
  private providerIndex = new Map<string, number>(); // `${provider}:${subjectId}` -> id
  private nextId = 1;

  async create(input: CreateIdentityInput): Promise<IdentityRecord> {
    if (!input.credentialDigest && !input.providerIdentity) {
      throw new IdentityInvariantError();
    }

    if (this.emailIndex.has(input.email)) {
      throw new IdentityConflictError('email');
    }
    if (input.providerIdentity && this.providerIndex.has(providerKey(input.providerIdentity))) {
      throw new IdentityConflictError('provider');
    }

    const id = this.nextId++;
    const now = new Date();

    const record: IdentityRecord = {
      id,
      email: input.email,
      credentialDigest: input.credentialDigest,
      providerIdentity: input.providerIdentity ? { ...input.providerIdentity } : undefined,
      providerTokens: input.providerTokens ? { ...input.providerTokens } : undefined,
      displayName: input.displayName,
      pictureUrl: input.pictureUrl,
      createdAt: now,
      updatedAt: now,
    };

    this.identities.set(id, record);
    this.emailIndex.set(record.email, id);
    if (record.providerIdentity) {
      this.providerIndex.set(providerKey(record.providerIdentity), id);
    }

    return clone(record);
  }

  async findById(id: number): Promise<IdentityRecord | null> {
    const record = this.identities.get(id);
    return record ? clone(record) : null;
  }

  async findByEmail(email: string): Promise<IdentityRecord | null> {
    const id = this.emailIndex.get(email);
    if (id === undefined) return null;
    return this.findById(id);
  }

  async findByProvider(provider: string, subjectId: string): Promise<IdentityRecord | null> {
    const id = this.providerIndex.get(providerKey({ provider, subjectId }));
    if (id === undefined) return null;
    return this.findById(id);
  }

  async update(id: number, input: UpdateIdentityInput): Promise<IdentityRecord> {
    const record = this.identities.get(id);
    if (!record) {
      throw new Error(`Identity not found: ${id}`);
    }

    if (input.providerIdentity) {
      const holder = this.providerIndex.get(providerKey(input.providerIdentity));
      if (holder !== undefined && holder !== id) {
        throw new IdentityConflictError('provider');
      }
    }

    const updated: IdentityRecord = {
      ...record,
      credentialDigest: input.credentialDigest ?? record.credentialDigest,
      providerIdentity: input.providerIdentity
        ? { ...input.providerIdentity }
        : record.providerIdentity,
      providerTokens: input.providerTokens ? { ...input.providerTokens } : record.providerTokens,
      displayName: input.displayName ?? record.displayName,
      pictureUrl: input.pictureUrl ?? record.pictureUrl,
      updatedAt: new Date(Math.max(Date.now(), record.updatedAt.getTime() + 1)),
    };

    if (record.providerIdentity && input.providerIdentity) {
      this.providerIndex.delete(providerKey(record.providerIdentity));
    }
    if (updated.providerIdentity) {
      this.providerIndex.set(providerKey(updated.providerIdentity), id);
    }

    this.identities.set(id, updated);
    return clone(updated);
  }
}
