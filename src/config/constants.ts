/**
 * Authentication constants
 */

// Token types
export const TOKEN_TYPE_BEARER = 'bearer' as const;

// Signing algorithm for bearer tokens (HMAC with a process-wide key)
export const SIGNING_ALGORITHM_HS256 = 'HS256' as const;

// Default TTLs (in seconds)
export const DEFAULT_ACCESS_TOKEN_TTL = 3600; // 1 hour
export const DEFAULT_OAUTH_STATE_TTL = 600; // 10 minutes

// Token/state lengths
export const OAUTH_STATE_LENGTH = 32; // bytes
export const JTI_LENGTH = 16; // bytes

// Provider HTTP calls
export const DEFAULT_PROVIDER_TIMEOUT_MS = 10000;

// Retries when a concurrent callback wins a uniqueness race
export const IDENTITY_RESOLVE_MAX_ATTEMPTS = 3;

// Revocation pruning
export const REVOCATION_PRUNE_INTERVAL_MS = 5 * 60 * 1000;

// Scrypt parameters for credential digests
export const SCRYPT_N = 16384; // CPU/memory cost
export const SCRYPT_R = 8; // Block size
export const SCRYPT_P = 1; // Parallelization
export const SCRYPT_KEY_LENGTH = 64;
export const SCRYPT_SALT_LENGTH = 16;

// Session cookie carrying the OAuth flow state
export const OAUTH_STATE_COOKIE = 'oauth_flow';
export const OAUTH_STATE_COOKIE_PATH = '/auth/oauth';

// Development fallbacks (rejected when NODE_ENV=production)
export const DEV_JWT_SECRET = 'dev-jwt-secret-change-in-production';
export const DEV_SESSION_SECRET = 'dev-session-secret-change-in-production';
export const DEV_ENCRYPTION_KEY = 'dev-encryption-key-change-in-production';

// HTTP headers
export const HEADER_AUTHORIZATION = 'Authorization';
export const HEADER_WWW_AUTHENTICATE = 'WWW-Authenticate';
export const HEADER_CACHE_CONTROL = 'Cache-Control';
export const HEADER_PRAGMA = 'Pragma';

// Cache control for token responses
export const TOKEN_CACHE_CONTROL = 'no-store';
export const TOKEN_PRAGMA = 'no-cache';
