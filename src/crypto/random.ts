import { randomBytes } from 'node:crypto';
import { JTI_LENGTH, OAUTH_STATE_LENGTH } from '../config/constants.js';

/**
 * Generate cryptographically secure random bytes as base64url string
 */
export function generateRandomBase64Url(length: number): string {
  return randomBytes(length)
    .toString('base64')
    .replace(/\+/g, '-')
    .replace(/\//g, '_')
    .replace(/=/g, '');
}

/**
 * Generate a single-use CSRF state value for an OAuth redirect round-trip
 */
export function generateOAuthState(length: number = OAUTH_STATE_LENGTH): string {
  return generateRandomBase64Url(length);
}

/**
 * Generate a unique JWT ID (jti)
 */
export function generateJti(): string {
  return generateRandomBase64Url(JTI_LENGTH);
}
