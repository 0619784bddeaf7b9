import type { IIdentityStorage } from '../storage/interfaces/identity-storage.js';
import type { ICredentialHasher } from '../crypto/hash.js';
import type { TokenService } from './token-service.js';
import { normalizeEmail } from '../types/identity.js';
import { AuthError } from '../errors/auth-error.js';
import { IdentityConflictError } from '../errors/storage-error.js';
import { createLogger, type Logger } from '../logging/logger.js';

export interface LocalAuthServiceOptions {
  identities: IIdentityStorage;
  hasher: ICredentialHasher;
  tokens: TokenService;
  logger?: Logger;
}

/**
 * Email/password accounts
 */
export class LocalAuthService {
  private readonly identities: IIdentityStorage;
  private readonly hasher: ICredentialHasher;
  private readonly tokens: TokenService;
  private readonly logger: Logger;
  private dummyDigest: Promise<string> | null = null;

  constructor(options: LocalAuthServiceOptions) {
    this.identities = options.identities;
    this.hasher = options.hasher;
    this.tokens = options.tokens;
    this.logger = options.logger ?? createLogger('local-auth');
  }

  /**
   * Create an account and return a bearer token for it
   */
  async register(email: string, secret: string): Promise<string> {
    const normalizedEmail = normalizeEmail(email);
    if (!normalizedEmail || !secret) {
      throw AuthError.invalidInput('Email and password are required.');
    }

    if (await this.identities.findByEmail(normalizedEmail)) {
      throw AuthError.conflict();
    }

    const credentialDigest = await this.hasher.hash(secret);

    let identityId: number;
    try {
      const created = await this.identities.create({ email: normalizedEmail, credentialDigest });
      identityId = created.id;
    } catch (err) {
      if (err instanceof IdentityConflictError) {
        throw AuthError.conflict();
      }
      throw err;
    }

    this.logger.info({ identityId }, 'identity registered');
    return this.tokens.issue(identityId);
  }

  /**
   * Check credentials and return a bearer token
   *
   * Unknown email, an account without a password and a wrong password all
   * fail with the same error.
   */
  async login(email: string, secret: string): Promise<string> {
    const normalizedEmail = normalizeEmail(email);
    if (!normalizedEmail || !secret) {
      throw AuthError.invalidInput('Email and password are required.');
    }

    const identity = await this.identities.findByEmail(normalizedEmail);

    if (!identity?.credentialDigest) {
      // Same hashing work as a real check so timing does not reveal the account
      await this.hasher.verify(secret, await this.getDummyDigest());
      throw AuthError.invalidCredentials();
    }

    const valid = await this.hasher.verify(secret, identity.credentialDigest);
    if (!valid) {
      this.logger.info({ identityId: identity.id }, 'login rejected');
      throw AuthError.invalidCredentials();
    }

    return this.tokens.issue(identity.id);
  }

  /**
   * Revoke a token. The token must still verify.
   */
  async logout(token: string): Promise<void> {
    try {
      await this.tokens.verify(token);
    } catch (err) {
      if (err instanceof AuthError) {
        throw AuthError.unauthenticated();
      }
      throw err;
    }

    await this.tokens.revoke(token);
  }

  private getDummyDigest(): Promise<string> {
    if (!this.dummyDigest) {
      this.dummyDigest = this.hasher.hash('dummy-password-for-timing');
    }
    return this.dummyDigest;
  }
}
