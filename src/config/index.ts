import { readFileSync, existsSync } from 'node:fs';
import * as constants from './constants.js';
import { listProviderNames, type ProviderCredentialsMap } from '../federation/providers.js';
import type { ProviderCredentials } from '../types/oauth.js';

/**
 * Raised when configuration is missing or invalid
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

type Env = Record<string, string | undefined>;

/**
 * Read a secret from file (Docker secrets) or environment variable
 * Supports both `VAR_FILE` (path to file) and `VAR` (direct value) patterns
 */
function readSecret(env: Env, envVar: string): string | undefined {
  const filePath = env[`${envVar}_FILE`];

  if (filePath) {
    if (!existsSync(filePath)) {
      throw new ConfigError(`${envVar}_FILE points to a missing file: ${filePath}`);
    }
    return readFileSync(filePath, 'utf-8').trim();
  }

  return env[envVar] || undefined;
}

function parseInteger(env: Env, envVar: string, fallback: number): number {
  const raw = env[envVar];
  if (raw === undefined || raw === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new ConfigError(`${envVar} must be an integer, got "${raw}"`);
  }
  return value;
}

/**
 * Identity linking policy for OAuth profiles whose email matches an
 * existing account:
 * - `email`: trust the provider-asserted email and link automatically
 * - `never`: refuse to link; the collision is reported as a conflict
 */
export type LinkPolicy = 'email' | 'never';

/**
 * Application configuration loaded from environment
 */
export interface Config {
  server: {
    port: number;
    host: string;
    nodeEnv: string;
  };
  database: {
    url: string | undefined;
  };
  secrets: {
    jwtSecretKey: string;
    sessionSecret: string;
    encryptionKey: string;
  };
  logging: {
    level: string;
  };
  tokens: {
    ttlSeconds: number;
  };
  oauth: {
    providers: ProviderCredentialsMap;
    providerTimeoutMs: number;
    successRedirect: string | undefined;
    linkPolicy: LinkPolicy;
  };
}

/**
 * Load credentials for one provider from `OAUTH_<NAME>_*` variables
 *
 * Returns undefined if none are set (provider not configured).
 * Throws if only some are set.
 */
function loadProviderCredentials(env: Env, provider: string): ProviderCredentials | undefined {
  const prefix = `OAUTH_${provider.toUpperCase()}`;
  const values = {
    CLIENT_ID: readSecret(env, `${prefix}_CLIENT_ID`) ?? '',
    CLIENT_SECRET: readSecret(env, `${prefix}_CLIENT_SECRET`) ?? '',
    REDIRECT_URI: env[`${prefix}_REDIRECT_URI`] ?? '',
  };

  const entries = Object.entries(values);
  const missing = entries.filter(([, value]) => !value).map(([key]) => `${prefix}_${key}`);

  if (missing.length === entries.length) {
    return undefined;
  }

  if (missing.length > 0) {
    throw new ConfigError(
      `Incomplete ${provider} OAuth configuration. Missing: ${missing.join(', ')}`
    );
  }

  return {
    clientId: values.CLIENT_ID,
    clientSecret: values.CLIENT_SECRET,
    redirectUri: values.REDIRECT_URI,
  };
}

/**
 * Load credentials for every registered provider and check required ones
 */
export function loadOAuthProviders(env: Env = process.env): ProviderCredentialsMap {
  const providers: Record<string, ProviderCredentials> = {};

  for (const provider of listProviderNames()) {
    const credentials = loadProviderCredentials(env, provider);
    if (credentials) {
      providers[provider] = credentials;
    }
  }

  const required = (env['OAUTH_REQUIRED_PROVIDERS'] ?? '')
    .split(',')
    .map((name) => name.trim().toLowerCase())
    .filter((name) => name.length > 0);

  const missing = required.filter((name) => !providers[name]);
  if (missing.length > 0) {
    throw new ConfigError(
      `Required OAuth provider(s) not configured: ${missing.join(', ')}. ` +
        'Set the corresponding environment variables and restart.'
    );
  }

  return providers;
}

function requireSecret(env: Env, envVar: string, devDefault: string, nodeEnv: string): string {
  const value = readSecret(env, envVar);
  if (value) {
    return value;
  }
  if (nodeEnv === 'production') {
    throw new ConfigError(`${envVar} must be set in production`);
  }
  return devDefault;
}

function parseLinkPolicy(raw: string | undefined): LinkPolicy {
  if (raw === undefined || raw === '' || raw === 'email') {
    return 'email';
  }
  if (raw === 'never') {
    return 'never';
  }
  throw new ConfigError(`OAUTH_LINK_POLICY must be "email" or "never", got "${raw}"`);
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(env: Env = process.env): Config {
  const nodeEnv = env['NODE_ENV'] ?? 'development';

  return {
    server: {
      port: parseInteger(env, 'PORT', 3000),
      host: env['HOST'] ?? '0.0.0.0',
      nodeEnv,
    },
    database: {
      url: env['DATABASE_URL'] || undefined,
    },
    secrets: {
      jwtSecretKey: requireSecret(env, 'JWT_SECRET_KEY', constants.DEV_JWT_SECRET, nodeEnv),
      sessionSecret: requireSecret(env, 'SESSION_SECRET', constants.DEV_SESSION_SECRET, nodeEnv),
      encryptionKey: requireSecret(env, 'ENCRYPTION_KEY', constants.DEV_ENCRYPTION_KEY, nodeEnv),
    },
    logging: {
      level: env['LOG_LEVEL'] ?? 'info',
    },
    tokens: {
      ttlSeconds: parseInteger(env, 'TOKEN_TTL_SECONDS', constants.DEFAULT_ACCESS_TOKEN_TTL),
    },
    oauth: {
      providers: loadOAuthProviders(env),
      providerTimeoutMs: parseInteger(
        env,
        'OAUTH_PROVIDER_TIMEOUT_MS',
        constants.DEFAULT_PROVIDER_TIMEOUT_MS
      ),
      successRedirect: env['OAUTH_SUCCESS_REDIRECT'] || undefined,
      linkPolicy: parseLinkPolicy(env['OAUTH_LINK_POLICY']),
    },
  };
}

// Singleton config instance
let config: Config | null = null;

/**
 * Get the current configuration (loads if not already loaded)
 */
export function getConfig(): Config {
  if (!config) {
    config = loadConfig();
  }
  return config;
}

/**
 * Reset configuration (useful for testing)
 */
export function resetConfig(): void {
  config = null;
}

// Re-export constants
export { constants };
