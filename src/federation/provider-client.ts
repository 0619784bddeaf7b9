import type { ProviderConfig, ProviderTokenSet } from '../types/oauth.js';
import { AuthError } from '../errors/auth-error.js';
import { extractAttribute, isRecord } from './providers.js';
import { createLogger, type Logger } from '../logging/logger.js';
import { DEFAULT_PROVIDER_TIMEOUT_MS } from '../config/constants.js';

/**
 * HTTP client for a provider's token and profile endpoints
 */
export interface IProviderClient {
  /**
   * Exchange an authorization code for provider tokens
   * Throws `token_exchange_failed`
   */
  exchangeCode(config: ProviderConfig, code: string): Promise<ProviderTokenSet>;

  /**
   * Fetch the raw profile JSON with a provider access token
   * Throws `profile_fetch_failed`
   */
  fetchProfile(config: ProviderConfig, accessToken: string): Promise<Record<string, unknown>>;
}

export interface FetchProviderClientOptions {
  timeoutMs?: number;
  fetch?: typeof fetch;
  logger?: Logger;
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/**
 * Parse a token endpoint body. Some providers (like GitHub) answer
 * form-urlencoded unless asked otherwise.
 */
function parseTokenBody(contentType: string, text: string): Record<string, unknown> {
  if (contentType.includes('application/json')) {
    const parsed: unknown = JSON.parse(text);
    if (!isRecord(parsed)) {
      throw new Error('Token response is not a JSON object');
    }
    return parsed;
  }
  return Object.fromEntries(new URLSearchParams(text));
}

/**
 * Provider client over the global fetch, each call bounded by a timeout
 */
export class FetchProviderClient implements IProviderClient {
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: Logger;

  constructor(options: FetchProviderClientOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_PROVIDER_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? fetch;
    this.logger = options.logger ?? createLogger('provider-client');
  }

  async exchangeCode(config: ProviderConfig, code: string): Promise<ProviderTokenSet> {
    const tokenParams = new URLSearchParams();
    tokenParams.set('grant_type', 'authorization_code');
    tokenParams.set('code', code);
    tokenParams.set('redirect_uri', config.redirectUri);
    tokenParams.set('client_id', config.clientId);
    tokenParams.set('client_secret', config.clientSecret);

    let body: Record<string, unknown>;
    try {
      const response = await this.fetchImpl(config.tokenUrl, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          Accept: 'application/json',
        },
        body: tokenParams.toString(),
        signal: AbortSignal.timeout(this.timeoutMs),
      });

      const text = await response.text();
      if (!response.ok) {
        this.logger.warn(
          { provider: config.name, status: response.status },
          'token exchange rejected'
        );
        throw AuthError.tokenExchangeFailed();
      }

      body = parseTokenBody(response.headers.get('content-type') ?? '', text);
    } catch (err) {
      if (err instanceof AuthError) throw err;
      this.logger.warn({ provider: config.name, err }, 'token exchange error');
      throw AuthError.tokenExchangeFailed(undefined, err);
    }

    // GitHub reports a bad code with 200 and an `error` field
    const providerError = optionalString(body['error']);
    if (providerError) {
      this.logger.warn({ provider: config.name, error: providerError }, 'token exchange refused');
      throw AuthError.tokenExchangeFailed();
    }

    const accessToken = optionalString(body['access_token']);
    if (!accessToken) {
      throw AuthError.tokenExchangeFailed('No access token in provider response.');
    }

    return {
      accessToken,
      refreshToken: optionalString(body['refresh_token']),
      tokenType: optionalString(body['token_type']),
      scope: optionalString(body['scope']),
    };
  }

  async fetchProfile(config: ProviderConfig, accessToken: string): Promise<Record<string, unknown>> {
    let profile: Record<string, unknown>;
    try {
      const parsed = await this.getJson(config.profileUrl, accessToken);
      if (!isRecord(parsed)) {
        throw new Error('Profile response is not a JSON object');
      }
      profile = parsed;
    } catch (err) {
      if (err instanceof AuthError) throw err;
      this.logger.warn({ provider: config.name, err }, 'profile fetch error');
      throw AuthError.profileFetchFailed(undefined, err);
    }

    const emailPath = config.attributeMapping.email;
    if (config.emailsUrl && !optionalString(extractAttribute(profile, emailPath))) {
      const email = await this.fetchPrimaryEmail(config, config.emailsUrl, accessToken);
      if (email) {
        profile = { ...profile, [emailPath]: email };
      }
    }

    return profile;
  }

  /**
   * Primary verified address from the provider's emails endpoint.
   * Best-effort: failures are logged and yield undefined.
   */
  private async fetchPrimaryEmail(
    config: ProviderConfig,
    emailsUrl: string,
    accessToken: string
  ): Promise<string | undefined> {
    try {
      const emails = await this.getJson(emailsUrl, accessToken);
      if (!Array.isArray(emails)) {
        return undefined;
      }
      const primary = emails.find(
        (entry) => isRecord(entry) && entry['primary'] === true && entry['verified'] === true
      );
      return isRecord(primary) ? optionalString(primary['email']) : undefined;
    } catch (err) {
      this.logger.warn({ provider: config.name, err }, 'email lookup failed');
      return undefined;
    }
  }

  private async getJson(url: string, accessToken: string): Promise<unknown> {
    const response = await this.fetchImpl(url, {
      headers: {
        Authorization: `Bearer ${accessToken}`,
        Accept: 'application/json',
        // GitHub rejects requests without a user agent
        'User-Agent': 'auth-core',
      },
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      // Release the connection; the body is not needed
      await response.body?.cancel();
      throw new Error(`${url} answered ${response.status}`);
    }

    const body: unknown = await response.json();
    return body;
  }
}
