import type { IIdentityStorage } from '../storage/interfaces/identity-storage.js';
import type { MappedProfile } from '../types/oauth.js';
import type { LinkPolicy } from '../config/index.js';
import { normalizeEmail } from '../types/identity.js';
import { AuthError } from '../errors/auth-error.js';
import { IdentityConflictError } from '../errors/storage-error.js';
import { IDENTITY_RESOLVE_MAX_ATTEMPTS } from '../config/constants.js';
import { createLogger, type Logger } from '../logging/logger.js';

export type ResolutionOutcome = 'existing' | 'linked' | 'created';

export interface ResolutionResult {
  identityId: number;
  outcome: ResolutionOutcome;
}

export interface IdentityResolverOptions {
  identities: IIdentityStorage;
  linkPolicy?: LinkPolicy;
  logger?: Logger;
}

/**
 * Maps a provider identity onto a local identity record
 *
 * 1. The provider identity is already held by a record: log in to it.
 * 2. The email matches a record: attach the provider identity to it
 *    (replacing any previous one), unless the link policy forbids it.
 * 3. Otherwise create a record without a credential digest.
 */
export class IdentityResolver {
  private readonly identities: IIdentityStorage;
  private readonly linkPolicy: LinkPolicy;
  private readonly logger: Logger;

  constructor(options: IdentityResolverOptions) {
    this.identities = options.identities;
    this.linkPolicy = options.linkPolicy ?? 'email';
    this.logger = options.logger ?? createLogger('identity-resolver');
  }

  async resolve(
    provider: string,
    subjectId: string,
    email: string | undefined,
    profile: Pick<MappedProfile, 'name' | 'picture'> = {}
  ): Promise<ResolutionResult> {
    const normalizedEmail = email ? normalizeEmail(email) : '';

    for (let attempt = 1; ; attempt++) {
      try {
        return await this.resolveOnce(provider, subjectId, normalizedEmail, profile);
      } catch (err) {
        // A concurrent callback created or linked first; the next pass finds its record
        if (err instanceof IdentityConflictError && attempt < IDENTITY_RESOLVE_MAX_ATTEMPTS) {
          this.logger.debug({ provider, attempt, field: err.field }, 'identity race, retrying');
          continue;
        }
        if (err instanceof IdentityConflictError) {
          throw AuthError.conflict('The account is being modified concurrently; try again.');
        }
        throw err;
      }
    }
  }

  private async resolveOnce(
    provider: string,
    subjectId: string,
    email: string,
    profile: Pick<MappedProfile, 'name' | 'picture'>
  ): Promise<ResolutionResult> {
    const existing = await this.identities.findByProvider(provider, subjectId);
    if (existing) {
      return { identityId: existing.id, outcome: 'existing' };
    }

    if (email) {
      const byEmail = await this.identities.findByEmail(email);
      if (byEmail) {
        if (this.linkPolicy === 'never') {
          throw AuthError.conflict(
            'An account with this email already exists; sign in with its original method.'
          );
        }
        await this.identities.update(byEmail.id, {
          providerIdentity: { provider, subjectId },
        });
        this.logger.info({ identityId: byEmail.id, provider }, 'provider identity linked');
        return { identityId: byEmail.id, outcome: 'linked' };
      }
    }

    if (!email) {
      throw AuthError.missingEmail();
    }

    const created = await this.identities.create({
      email,
      providerIdentity: { provider, subjectId },
      displayName: profile.name,
      pictureUrl: profile.picture,
    });
    this.logger.info({ identityId: created.id, provider }, 'identity created');
    return { identityId: created.id, outcome: 'created' };
  }
}
