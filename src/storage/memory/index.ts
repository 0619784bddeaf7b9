import type { IStorage } from '../interfaces/index.js';
import { MemoryIdentityStorage } from './identity-storage.js';
import { MemoryRevocationStorage } from './revocation-storage.js';

export { MemoryIdentityStorage } from './identity-storage.js';
export { MemoryRevocationStorage } from './revocation-storage.js';

/**
 * Create a complete in-memory storage implementation
 */
export function createMemoryStorage(options: { now?: () => Date } = {}): IStorage {
  return {
    identities: new MemoryIdentityStorage(),
    revocations: new MemoryRevocationStorage({ now: options.now }),
    close: async () => {},
  };
}
