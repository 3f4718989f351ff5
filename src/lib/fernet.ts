import { createCipheriv, createDecipheriv, createHmac, randomBytes, timingSafeEqual } from 'crypto';
import { DecryptionError } from './errors.js';

/**
 * Fernet symmetric tokens.
 *
 * Key: 32 random bytes, url-safe base64. The first half signs, the second half encrypts.
 * Token: 0x80 | timestamp (u64 BE seconds) | IV (16) | AES-128-CBC ciphertext | HMAC-SHA256 (32),
 * url-safe base64 with padding.
 */

const VERSION = 0x80;
const HEADER_LENGTH = 1 + 8 + 16;
const HMAC_LENGTH = 32;

function toUrlSafeBase64(buffer: Buffer): string {
  return buffer.toString('base64').replace(/\+/g, '-').replace(/\//g, '_');
}

function fromUrlSafeBase64(value: string): Buffer {
  return Buffer.from(value.trim().replace(/-/g, '+').replace(/_/g, '/'), 'base64');
}

export function generateFernetKey(): string {
  return toUrlSafeBase64(randomBytes(32));
}

interface KeyParts {
  signingKey: Buffer;
  encryptionKey: Buffer;
}

function splitKey(key: string): KeyParts {
  const raw = fromUrlSafeBase64(key);
  if (raw.length !== 32) {
    throw new DecryptionError('Fernet key must be 32 url-safe base64-encoded bytes', { keyLength: raw.length });
  }
  return {
    signingKey: raw.subarray(0, 16),
    encryptionKey: raw.subarray(16),
  };
}

export function encryptToken(key: string, plaintext: Buffer, now: Date = new Date()): string {
  const { signingKey, encryptionKey } = splitKey(key);
  const iv = randomBytes(16);

  const header = Buffer.alloc(9);
  header.writeUInt8(VERSION, 0);
  header.writeBigUInt64BE(BigInt(Math.floor(now.getTime() / 1000)), 1);

  const cipher = createCipheriv('aes-128-cbc', encryptionKey, iv);
  const ciphertext = Buffer.concat([cipher.update(plaintext), cipher.final()]);

  const body = Buffer.concat([header, iv, ciphertext]);
  const hmac = createHmac('sha256', signingKey).update(body).digest();

  return toUrlSafeBase64(Buffer.concat([body, hmac]));
}

export function decryptToken(key: string, token: string): Buffer {
  const { signingKey, encryptionKey } = splitKey(key);
  const raw = fromUrlSafeBase64(token);

  if (raw.length < HEADER_LENGTH + 16 + HMAC_LENGTH || raw[0] !== VERSION) {
    throw new DecryptionError('Invalid Fernet token');
  }

  const body = raw.subarray(0, raw.length - HMAC_LENGTH);
  const expected = createHmac('sha256', signingKey).update(body).digest();
  if (!timingSafeEqual(expected, raw.subarray(raw.length - HMAC_LENGTH))) {
    throw new DecryptionError('Fernet token signature mismatch');
  }

  const iv = raw.subarray(9, HEADER_LENGTH);
  const ciphertext = body.subarray(HEADER_LENGTH);

  try {
    const decipher = createDecipheriv('aes-128-cbc', encryptionKey, iv);
    return Buffer.concat([decipher.update(ciphertext), decipher.final()]);
  } catch {
    throw new DecryptionError('Fernet token padding is invalid');
  }
}
