/**
 * Bearer token payload
 * Standard claims from RFC 7519
 */
export interface AccessTokenPayload {
  sub: string; // Identity ID as a decimal string
  iat: number; // Issued at
  exp: number; // Expiration time
  jti: string; // JWT ID (unique identifier)
}

/**
 * Token response body returned by login, registration, refresh and OAuth callback
 */
export interface TokenResponse {
  access_token: string;
  token_type: 'bearer';
  expires_in: number;
}

/**
 * Revocation record, keyed by a hash of the token string
 */
export interface RevokedToken {
  tokenHash: string;
  expiresAt: Date;
  revokedAt: Date;
}
