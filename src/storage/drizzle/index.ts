import type { IStorage } from '../interfaces/index.js';
import { initializeDatabase, closeDatabase } from './client.js';
import { DrizzleIdentityStorage } from './repositories/identity-repository.js';
import { DrizzleRevocationStorage } from './repositories/revocation-repository.js';

export { initializeDatabase, getDatabase, closeDatabase, uniqueViolationConstraint } from './client.js';
export type { Database } from './client.js';
export { DrizzleIdentityStorage } from './repositories/identity-repository.js';
export { DrizzleRevocationStorage } from './repositories/revocation-repository.js';
export * as schema from './schema.js';

export interface DrizzleStorageOptions {
  url: string;
  /**
   * Key for provider tokens encrypted at rest
   */
  encryptionKey: string;
}

/**
 * Create a complete PostgreSQL storage implementation
 */
export function createDrizzleStorage(options: DrizzleStorageOptions): IStorage {
  const db = initializeDatabase(options.url);

  return {
    identities: new DrizzleIdentityStorage({ db, encryptionKey: options.encryptionKey }),
    revocations: new DrizzleRevocationStorage({ db }),
    close: closeDatabase,
  };
}
