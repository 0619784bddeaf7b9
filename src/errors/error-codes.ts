/**
 * Authentication error codes
 */

// Caller input
export const ERROR_INVALID_INPUT = 'invalid_input' as const;
export const ERROR_CONFLICT = 'conflict' as const;

// Credentials and bearer tokens
export const ERROR_INVALID_CREDENTIALS = 'invalid_credentials' as const;
export const ERROR_UNAUTHENTICATED = 'unauthenticated' as const;
export const ERROR_TOKEN_EXPIRED = 'token_expired' as const;
export const ERROR_TOKEN_REVOKED = 'token_revoked' as const;
export const ERROR_TOKEN_MALFORMED = 'token_malformed' as const;

// OAuth flow
export const ERROR_UNKNOWN_PROVIDER = 'unknown_provider' as const;
export const ERROR_PROVIDER_NOT_CONFIGURED = 'provider_not_configured' as const;
export const ERROR_CSRF_MISMATCH = 'csrf_mismatch' as const;
export const ERROR_PROVIDER_DENIED = 'provider_denied' as const;
export const ERROR_MISSING_CODE = 'missing_code' as const;
export const ERROR_TOKEN_EXCHANGE_FAILED = 'token_exchange_failed' as const;
export const ERROR_PROFILE_FETCH_FAILED = 'profile_fetch_failed' as const;
export const ERROR_MISSING_SUBJECT_ID = 'missing_subject_id' as const;
export const ERROR_MISSING_EMAIL = 'missing_email' as const;

/**
 * All authentication error codes
 */
export type AuthErrorCode =
  | typeof ERROR_INVALID_INPUT
  | typeof ERROR_CONFLICT
  | typeof ERROR_INVALID_CREDENTIALS
  | typeof ERROR_UNAUTHENTICATED
  | typeof ERROR_TOKEN_EXPIRED
  | typeof ERROR_TOKEN_REVOKED
  | typeof ERROR_TOKEN_MALFORMED
  | typeof ERROR_UNKNOWN_PROVIDER
  | typeof ERROR_PROVIDER_NOT_CONFIGURED
  | typeof ERROR_CSRF_MISMATCH
  | typeof ERROR_PROVIDER_DENIED
  | typeof ERROR_MISSING_CODE
  | typeof ERROR_TOKEN_EXCHANGE_FAILED
  | typeof ERROR_PROFILE_FETCH_FAILED
  | typeof ERROR_MISSING_SUBJECT_ID
  | typeof ERROR_MISSING_EMAIL;

/**
 * Who is at fault: the caller's input, the caller's credentials,
 * or an upstream provider
 */
export type AuthErrorCategory = 'client' | 'auth' | 'upstream';

/**
 * HTTP status codes for authentication errors
 */
export const ERROR_STATUS_CODES = {
  [ERROR_INVALID_INPUT]: 400,
  [ERROR_CONFLICT]: 409,
  [ERROR_INVALID_CREDENTIALS]: 401,
  [ERROR_UNAUTHENTICATED]: 401,
  [ERROR_TOKEN_EXPIRED]: 401,
  [ERROR_TOKEN_REVOKED]: 401,
  [ERROR_TOKEN_MALFORMED]: 401,
  [ERROR_UNKNOWN_PROVIDER]: 404,
  [ERROR_PROVIDER_NOT_CONFIGURED]: 404,
  [ERROR_CSRF_MISMATCH]: 400,
  [ERROR_PROVIDER_DENIED]: 502,
  [ERROR_MISSING_CODE]: 400,
  [ERROR_TOKEN_EXCHANGE_FAILED]: 502,
  [ERROR_PROFILE_FETCH_FAILED]: 502,
  [ERROR_MISSING_SUBJECT_ID]: 502,
  [ERROR_MISSING_EMAIL]: 400,
} as const satisfies Record<AuthErrorCode, number>;

export type AuthErrorStatus = (typeof ERROR_STATUS_CODES)[AuthErrorCode];

export const ERROR_CATEGORIES: Record<AuthErrorCode, AuthErrorCategory> = {
  [ERROR_INVALID_INPUT]: 'client',
  [ERROR_CONFLICT]: 'client',
  [ERROR_INVALID_CREDENTIALS]: 'auth',
  [ERROR_UNAUTHENTICATED]: 'auth',
  [ERROR_TOKEN_EXPIRED]: 'auth',
  [ERROR_TOKEN_REVOKED]: 'auth',
  [ERROR_TOKEN_MALFORMED]: 'auth',
  [ERROR_UNKNOWN_PROVIDER]: 'client',
  [ERROR_PROVIDER_NOT_CONFIGURED]: 'client',
  [ERROR_CSRF_MISMATCH]: 'client',
  [ERROR_PROVIDER_DENIED]: 'upstream',
  [ERROR_MISSING_CODE]: 'client',
  [ERROR_TOKEN_EXCHANGE_FAILED]: 'upstream',
  [ERROR_PROFILE_FETCH_FAILED]: 'upstream',
  [ERROR_MISSING_SUBJECT_ID]: 'upstream',
  [ERROR_MISSING_EMAIL]: 'client',
};

/**
 * Default error descriptions
 */
export const ERROR_DESCRIPTIONS: Record<AuthErrorCode, string> = {
  [ERROR_INVALID_INPUT]: 'The request is missing a required field or a field is empty.',
  [ERROR_CONFLICT]: 'An account with this email already exists.',
  [ERROR_INVALID_CREDENTIALS]: 'Invalid email or password.',
  [ERROR_UNAUTHENTICATED]: 'A valid bearer token is required.',
  [ERROR_TOKEN_EXPIRED]: 'The token has expired.',
  [ERROR_TOKEN_REVOKED]: 'The token has been revoked.',
  [ERROR_TOKEN_MALFORMED]: 'The token is malformed or its signature is invalid.',
  [ERROR_UNKNOWN_PROVIDER]: 'Unsupported OAuth provider.',
  [ERROR_PROVIDER_NOT_CONFIGURED]: 'The OAuth provider is not configured.',
  [ERROR_CSRF_MISMATCH]: 'Invalid or missing CSRF state parameter.',
  [ERROR_PROVIDER_DENIED]: 'The OAuth provider returned an error.',
  [ERROR_MISSING_CODE]: 'Missing authorization code.',
  [ERROR_TOKEN_EXCHANGE_FAILED]: 'Failed to exchange authorization code for tokens.',
  [ERROR_PROFILE_FETCH_FAILED]: 'Failed to fetch user profile from provider.',
  [ERROR_MISSING_SUBJECT_ID]: 'The provider profile does not contain a user ID.',
  [ERROR_MISSING_EMAIL]: 'The provider did not supply an email address; cannot create an account.',
};
