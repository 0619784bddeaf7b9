import { createCipheriv, createDecipheriv, randomBytes, scryptSync } from 'node:crypto';

/**
 * At-rest encryption for provider tokens held in the identity store.
 *
 * Envelope: `v1.` + base64url(salt | iv | tag | ciphertext), AES-256-GCM
 * under a key derived with scrypt from the configured secret and a
 * per-value salt.
 */

const ENVELOPE_VERSION = 'v1';
const CIPHER = 'aes-256-gcm';

const SALT_BYTES = 16;
const IV_BYTES = 12;
const TAG_BYTES = 16;
const KEY_BYTES = 32;
const HEADER_BYTES = SALT_BYTES + IV_BYTES + TAG_BYTES;

export function encrypt(plaintext: string, encryptionKey: string): string {
  const salt = randomBytes(SALT_BYTES);
  const iv = randomBytes(IV_BYTES);

  const cipher = createCipheriv(CIPHER, scryptSync(encryptionKey, salt, KEY_BYTES), iv);
  const body = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()]);

  const sealed = Buffer.concat([salt, iv, cipher.getAuthTag(), body]);
  return `${ENVELOPE_VERSION}.${sealed.toString('base64url')}`;
}

/**
 * Throws on an unknown envelope, a wrong key or a tampered value
 */
export function decrypt(envelope: string, encryptionKey: string): string {
  const separator = envelope.indexOf('.');
  if (separator < 0 || envelope.slice(0, separator) !== ENVELOPE_VERSION) {
    throw new Error('Unsupported encrypted value format');
  }

  const sealed = Buffer.from(envelope.slice(separator + 1), 'base64url');
  if (sealed.length < HEADER_BYTES) {
    throw new Error('Encrypted value is truncated');
  }

  const salt = sealed.subarray(0, SALT_BYTES);
  const iv = sealed.subarray(SALT_BYTES, SALT_BYTES + IV_BYTES);
  const tag = sealed.subarray(SALT_BYTES + IV_BYTES, HEADER_BYTES);

  const decipher = createDecipheriv(CIPHER, scryptSync(encryptionKey, salt, KEY_BYTES), iv);
  decipher.setAuthTag(tag);

  return Buffer.concat([decipher.update(sealed.subarray(HEADER_BYTES)), decipher.final()]).toString(
    'utf8'
  );
}
