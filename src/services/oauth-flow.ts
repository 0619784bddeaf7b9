import type { CsrfFlowState, ProviderTokenSet } from '../types/oauth.js';
import type { IIdentityStorage } from '../storage/interfaces/identity-storage.js';
import type { IProviderClient } from '../federation/provider-client.js';
import type { TokenService } from './token-service.js';
import type { IdentityResolver, ResolutionOutcome } from './identity-resolver.js';
import { AuthError } from '../errors/auth-error.js';
import { constantTimeCompare } from '../crypto/hash.js';
import { generateOAuthState } from '../crypto/random.js';
import {
  buildAuthorizationUrl,
  getProviderConfig,
  mapProviderProfile,
  providerDefinitions,
  type ProviderCredentialsMap,
  type ProviderRegistry,
} from '../federation/providers.js';
import { createLogger, type Logger } from '../logging/logger.js';

export interface OAuthFlowServiceOptions {
  credentials: ProviderCredentialsMap;
  registry?: ProviderRegistry;
  providerClient: IProviderClient;
  resolver: IdentityResolver;
  tokens: TokenService;
  identities: IIdentityStorage;
  logger?: Logger;
}

export interface InitiateResult {
  authorizationUrl: string;
  /**
   * Value the caller keeps in the browser session until the callback
   */
  flowState: CsrfFlowState;
}

export interface CallbackParams {
  provider: string;
  receivedState?: string;
  /**
   * State saved by `initiate`, read back from the browser session
   */
  expected?: CsrfFlowState;
  code?: string;
  error?: string;
  errorDescription?: string;
}

export interface CallbackResult {
  token: string;
  identityId: number;
  outcome: ResolutionOutcome;
}

/**
 * Authorization-code flow against a registered provider
 *
 * Pure over explicit inputs: the caller stores `flowState` between the
 * two steps and discards it when the callback arrives.
 */
export class OAuthFlowService {
  private readonly credentials: ProviderCredentialsMap;
  private readonly registry: ProviderRegistry;
  private readonly providerClient: IProviderClient;
  private readonly resolver: IdentityResolver;
  private readonly tokens: TokenService;
  private readonly identities: IIdentityStorage;
  private readonly logger: Logger;

  constructor(options: OAuthFlowServiceOptions) {
    this.credentials = options.credentials;
    this.registry = options.registry ?? providerDefinitions;
    this.providerClient = options.providerClient;
    this.resolver = options.resolver;
    this.tokens = options.tokens;
    this.identities = options.identities;
    this.logger = options.logger ?? createLogger('oauth-flow');
  }

  initiate(provider: string): InitiateResult {
    const config = getProviderConfig(provider, this.credentials, this.registry);
    const state = generateOAuthState();

    return {
      authorizationUrl: buildAuthorizationUrl(config, state),
      flowState: { state, provider },
    };
  }

  async callback(params: CallbackParams): Promise<CallbackResult> {
    const { provider, receivedState, expected, code, error, errorDescription } = params;

    if (
      !receivedState ||
      !expected ||
      !constantTimeCompare(receivedState, expected.state) ||
      expected.provider !== provider
    ) {
      throw AuthError.csrfMismatch();
    }

    if (error) {
      throw AuthError.providerDenied(error, errorDescription);
    }

    if (!code) {
      throw AuthError.missingCode();
    }

    const config = getProviderConfig(provider, this.credentials, this.registry);

    const providerTokens = await this.providerClient.exchangeCode(config, code);
    const rawProfile = await this.providerClient.fetchProfile(config, providerTokens.accessToken);
    const profile = mapProviderProfile(config.attributeMapping, rawProfile);

    if (!profile.subjectId) {
      throw AuthError.missingSubjectId();
    }

    const { identityId, outcome } = await this.resolver.resolve(
      provider,
      profile.subjectId,
      profile.email,
      { name: profile.name, picture: profile.picture }
    );

    await this.storeProviderTokens(identityId, provider, providerTokens);

    const token = await this.tokens.issue(identityId);
    this.logger.info({ identityId, provider, outcome }, 'oauth login completed');

    return { token, identityId, outcome };
  }

  /**
   * Keep provider tokens for later provider API calls. Best-effort.
   */
  private async storeProviderTokens(
    identityId: number,
    provider: string,
    providerTokens: ProviderTokenSet
  ): Promise<void> {
    try {
      await this.identities.update(identityId, {
        providerTokens: {
          accessToken: providerTokens.accessToken,
          refreshToken: providerTokens.refreshToken,
        },
      });
    } catch (err) {
      this.logger.warn({ identityId, provider, err }, 'failed to store provider tokens');
    }
  }
}
