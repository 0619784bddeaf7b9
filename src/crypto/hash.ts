import { createHash, timingSafeEqual, randomBytes, scrypt as scryptCallback } from 'node:crypto';
import {
  SCRYPT_N,
  SCRYPT_R,
  SCRYPT_P,
  SCRYPT_KEY_LENGTH,
  SCRYPT_SALT_LENGTH,
} from '../config/constants.js';

/**
 * Promisified scrypt function
 */
function scryptAsync(
  secret: string,
  salt: Buffer,
  keyLength: number,
  options: { N: number; r: number; p: number }
): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    scryptCallback(secret, salt, keyLength, options, (err, derivedKey) => {
      if (err) reject(err);
      else resolve(derivedKey);
    });
  });
}

/**
 * Hash a value using SHA-256 (for revocation keys)
 */
export function sha256(value: string): string {
  return createHash('sha256').update(value, 'utf8').digest('hex');
}

/**
 * Compare two strings in constant time to prevent timing attacks
 */
export function constantTimeCompare(a: string, b: string): boolean {
  const bufA = Buffer.from(a, 'utf8');
  const bufB = Buffer.from(b, 'utf8');

  if (bufA.length !== bufB.length) {
    return false;
  }

  return timingSafeEqual(bufA, bufB);
}

/**
 * Hash a secret using scrypt
 * Returns format: $scrypt$N$r$p$salt$hash
 */
export async function hashSecret(secret: string): Promise<string> {
  const salt = randomBytes(SCRYPT_SALT_LENGTH);

  const hash = await scryptAsync(secret, salt, SCRYPT_KEY_LENGTH, {
    N: SCRYPT_N,
    r: SCRYPT_R,
    p: SCRYPT_P,
  });

  return `$scrypt$${SCRYPT_N}$${SCRYPT_R}$${SCRYPT_P}$${salt.toString('base64')}$${hash.toString('base64')}`;
}

/**
 * Verify a secret against its scrypt digest
 */
export async function verifySecret(secret: string, digest: string): Promise<boolean> {
  // Expected format: $scrypt$N$r$p$salt$hash
  const [empty, scheme, nPart, rPart, pPart, saltPart, hashPart, ...rest] = digest.split('$');
  if (
    empty !== '' ||
    scheme !== 'scrypt' ||
    rest.length > 0 ||
    !nPart ||
    !rPart ||
    !pPart ||
    !saltPart ||
    !hashPart
  ) {
    return false;
  }

  const N = parseInt(nPart, 10);
  const r = parseInt(rPart, 10);
  const p = parseInt(pPart, 10);
  if (!Number.isInteger(N) || !Number.isInteger(r) || !Number.isInteger(p)) {
    return false;
  }

  const salt = Buffer.from(saltPart, 'base64');
  const storedHash = Buffer.from(hashPart, 'base64');
  if (storedHash.length === 0) {
    return false;
  }

  const derivedHash = await scryptAsync(secret, salt, storedHash.length, { N, r, p });

  return timingSafeEqual(storedHash, derivedHash);
}

/**
 * Opaque hash/verify capability for account credentials.
 * The digest embeds its salt, so nothing else is stored.
 */
export interface ICredentialHasher {
  hash(secret: string): Promise<string>;
  verify(secret: string, digest: string): Promise<boolean>;
}

/**
 * Credential hasher backed by scrypt
 */
export class ScryptCredentialHasher implements ICredentialHasher {
  hash(secret: string): Promise<string> {
    return hashSecret(secret);
  }

  verify(secret: string, digest: string): Promise<boolean> {
    return verifySecret(secret, digest);
  }
}
