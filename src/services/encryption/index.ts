/**
 * @fileoverview AES-256-GCM encryption for secrets stored in SQLite.
 *
 * Covers IMAP app passwords in user_email_configurations and encrypted rows
 * in global_configuration. The serialized form is
 * `base64(iv).base64(authTag).base64(ciphertext)`, with a fresh IV per value.
 */

import crypto from 'crypto';

const ALGORITHM = 'aes-256-gcm';
const IV_LENGTH = 16;
const AUTH_TAG_LENGTH = 16;

/** Decrypt function handed to components that only ever read secrets. */
export type Decryptor = (encrypted: string) => string | null;

function toKey(hexKey: string): Buffer {
  if (!/^[0-9a-fA-F]{64}$/.test(hexKey)) {
    throw new Error('ENCRYPTION_KEY must be a 64-character hex string (32 bytes)');
  }
  return Buffer.from(hexKey, 'hex');
}

export function encryptValue(plaintext: string, hexKey: string): string {
  const iv = crypto.randomBytes(IV_LENGTH);
  const cipher = crypto.createCipheriv(ALGORITHM, toKey(hexKey), iv, { authTagLength: AUTH_TAG_LENGTH });
  const encrypted = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()]);
  const authTag = cipher.getAuthTag();
  return [iv, authTag, encrypted].map((part) => part.toString('base64')).join('.');
}

/**
 * Decrypt a value produced by {@link encryptValue}.
 * Returns null for malformed input, a wrong key or tampered ciphertext.
 */
export function decryptValue(encrypted: string, hexKey: string): string | null {
  const parts = encrypted.split('.');
  if (parts.length !== 3) return null;
  const [iv, authTag, data] = parts.map((part) => Buffer.from(part, 'base64'));
  if (!iv || !authTag || !data || iv.length !== IV_LENGTH || authTag.length !== AUTH_TAG_LENGTH) {
    return null;
  }

  try {
    const decipher = crypto.createDecipheriv(ALGORITHM, toKey(hexKey), iv, { authTagLength: AUTH_TAG_LENGTH });
    decipher.setAuthTag(authTag);
    // Buffer.concat keeps multi-byte UTF-8 intact across update/final boundaries
    return Buffer.concat([decipher.update(data), decipher.final()]).toString('utf8');
  } catch {
    // wrong key or tampered ciphertext
    return null;
  }
}

export function createDecryptor(hexKey: string): Decryptor {
  toKey(hexKey);
  return (encrypted) => decryptValue(encrypted, hexKey);
}
