export * from './identity-storage.js';
export * from './revocation-storage.js';

import type { IIdentityStorage } from './identity-storage.js';
import type { IRevocationStorage } from './revocation-storage.js';

/**
 * Complete storage interface for the authentication service
 */
export interface IStorage {
  identities: IIdentityStorage;
  revocations: IRevocationStorage;
  /**
   * Release connections (no-op for memory storage)
   */
  close(): Promise<void>;
}
