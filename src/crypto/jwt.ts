import * as jose from 'jose';
import type { AccessTokenPayload } from '../types/token.js';
import { SIGNING_ALGORITHM_HS256 } from '../config/constants.js';
import { generateJti } from './random.js';

/**
 * JWT signing and verification utilities using jose library
 */

/**
 * Turn a configured secret into an HMAC key
 */
export function createSigningKey(secret: string): Uint8Array {
  return new TextEncoder().encode(secret);
}

/**
 * Sign a bearer access token
 */
export async function signAccessToken(
  payload: Omit<AccessTokenPayload, 'jti'>,
  key: Uint8Array
): Promise<string> {
  return new jose.SignJWT({ jti: generateJti() })
    .setProtectedHeader({ alg: SIGNING_ALGORITHM_HS256, typ: 'JWT' })
    .setSubject(payload.sub)
    .setIssuedAt(payload.iat)
    .setExpirationTime(payload.exp)
    .sign(key);
}

/**
 * Verify a bearer access token and return its claims
 *
 * Throws jose errors (`JWTExpired`, `JWSSignatureVerificationFailed`,
 * `JWTClaimValidationFailed`, ...) on failure.
 */
export async function verifyAccessToken(
  token: string,
  key: Uint8Array,
  options: { currentDate?: Date } = {}
): Promise<jose.JWTPayload> {
  const { payload } = await jose.jwtVerify(token, key, {
    algorithms: [SIGNING_ALGORITHM_HS256],
    requiredClaims: ['sub', 'iat', 'exp'],
    clockTolerance: 0,
    currentDate: options.currentDate,
  });

  return payload;
}

/**
 * Decode a JWT without verification
 * WARNING: Only use this when the result is not trusted (e.g. revocation bookkeeping)
 */
export function decodeJwt(token: string): jose.JWTPayload | null {
  try {
    return jose.decodeJwt(token);
  } catch {
    return null;
  }
}

export { jose };
