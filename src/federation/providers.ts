import type {
  AttributeMapping,
  MappedProfile,
  ProviderConfig,
  ProviderCredentials,
  ProviderDefinition,
} from '../types/oauth.js';
import { AuthError } from '../errors/auth-error.js';

/**
 * Supported providers with pre-configured endpoints and fixed scopes.
 * Adding a provider means adding an entry here and supplying credentials.
 */
export const providerDefinitions = {
  google: {
    authorizeUrl: 'https://accounts.google.com/o/oauth2/v2/auth',
    tokenUrl: 'https://oauth2.googleapis.com/token',
    profileUrl: 'https://www.googleapis.com/oauth2/v2/userinfo',
    scope: 'openid email profile',
    attributeMapping: {
      id: 'id',
      email: 'email',
      name: 'name',
      picture: 'picture',
    },
  },
  github: {
    authorizeUrl: 'https://github.com/login/oauth/authorize',
    tokenUrl: 'https://github.com/login/oauth/access_token',
    profileUrl: 'https://api.github.com/user',
    emailsUrl: 'https://api.github.com/user/emails',
    scope: 'user:email',
    attributeMapping: {
      id: 'id',
      email: 'email',
      name: 'name',
      picture: 'avatar_url',
    },
  },
} satisfies Record<string, ProviderDefinition>;

export type ProviderName = keyof typeof providerDefinitions;

export type ProviderRegistry = Readonly<Record<string, ProviderDefinition>>;

/**
 * Credentials per provider name; a missing entry means "not configured"
 */
export type ProviderCredentialsMap = Readonly<Record<string, ProviderCredentials>>;

/**
 * Names of the providers known to a registry
 */
export function listProviderNames(registry: ProviderRegistry = providerDefinitions): string[] {
  return Object.keys(registry);
}

/**
 * Resolve a provider name to its full configuration
 *
 * Throws `unknown_provider` when the name is not in the registry and
 * `provider_not_configured` when it is known but has no credentials.
 */
export function getProviderConfig(
  name: string,
  credentials: ProviderCredentialsMap,
  registry: ProviderRegistry = providerDefinitions
): ProviderConfig {
  if (!Object.hasOwn(registry, name)) {
    throw AuthError.unknownProvider(name);
  }
  const definition = registry[name];
  if (!definition) {
    throw AuthError.unknownProvider(name);
  }

  const providerCredentials = Object.hasOwn(credentials, name) ? credentials[name] : undefined;
  if (!providerCredentials) {
    throw AuthError.providerNotConfigured(name);
  }

  return {
    name,
    ...definition,
    ...providerCredentials,
  };
}

/**
 * Build the provider authorization URL for a redirect
 */
export function buildAuthorizationUrl(config: ProviderConfig, state: string): string {
  const authUrl = new URL(config.authorizeUrl);
  authUrl.searchParams.set('client_id', config.clientId);
  authUrl.searchParams.set('redirect_uri', config.redirectUri);
  authUrl.searchParams.set('response_type', 'code');
  authUrl.searchParams.set('scope', config.scope);
  authUrl.searchParams.set('state', state);
  return authUrl.toString();
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Extract user attribute using dot notation path
 */
export function extractAttribute(data: Record<string, unknown>, path: string): unknown {
  const parts = path.split('.');
  let value: unknown = data;
  for (const part of parts) {
    if (isRecord(value) && Object.hasOwn(value, part)) {
      value = value[part];
    } else {
      return undefined;
    }
  }
  return value;
}

/**
 * Read an attribute as a non-empty string. Numeric ids (GitHub) are stringified.
 */
function stringAttribute(data: Record<string, unknown>, path: string | undefined): string | undefined {
  if (!path) return undefined;
  const value = extractAttribute(data, path);
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : undefined;
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  return undefined;
}

/**
 * Apply a provider's attribute mapping to its raw profile
 */
export function mapProviderProfile(
  mapping: AttributeMapping,
  profile: Record<string, unknown>
): MappedProfile {
  return {
    subjectId: stringAttribute(profile, mapping.id),
    email: stringAttribute(profile, mapping.email),
    name: stringAttribute(profile, mapping.name),
    picture: stringAttribute(profile, mapping.picture),
  };
}
