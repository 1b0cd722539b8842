import { createCipheriv, createDecipheriv, createHmac, randomBytes, timingSafeEqual } from 'crypto';
import { CipherError } from '../errors.js';

const VERSION = 0x80;
const KEY_BYTES = 32;
const HALF_KEY_BYTES = 16;
const TIMESTAMP_BYTES = 8;
const IV_BYTES = 16;
const HMAC_BYTES = 32;
const BLOCK_BYTES = 16;
const HEADER_BYTES = 1 + TIMESTAMP_BYTES + IV_BYTES;
const MIN_TOKEN_BYTES = HEADER_BYTES + BLOCK_BYTES + HMAC_BYTES;
const MAX_CLOCK_SKEW_SECONDS = 60;

const URL_SAFE_BASE64 = /^[A-Za-z0-9_-]+={0,2}$/;

const utf8 = new TextDecoder('utf-8', { fatal: true });

export interface DecryptOptions {
  /** Reject tokens older than this many seconds */
  ttlSeconds?: number;
  /** Current time in seconds, for TTL checks */
  now?: number;
}

export interface EncryptOptions {
  iv?: Buffer;
  /** Seconds since the epoch to stamp into the token */
  timestamp?: number;
}

interface FernetKey {
  signingKey: Buffer;
  encryptionKey: Buffer;
}

function decodeUrlSafe(value: string): Buffer | null {
  const trimmed = value.trim();
  if (trimmed.length % 4 !== 0 || !URL_SAFE_BASE64.test(trimmed)) {
    return null;
  }
  return Buffer.from(trimmed, 'base64url');
}

function parseKey(key: string): FernetKey {
  const raw = decodeUrlSafe(key);
  if (!raw || raw.length !== KEY_BYTES) {
    throw new CipherError('INVALID_KEY', 'Invalid Fernet key');
  }
  return {
    signingKey: raw.subarray(0, HALF_KEY_BYTES),
    encryptionKey: raw.subarray(HALF_KEY_BYTES),
  };
}

function sign(signingKey: Buffer, data: Buffer): Buffer {
  return createHmac('sha256', signingKey).update(data).digest();
}

function nowSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

/**
 * Check that a string is a well-formed Fernet key
 */
export function isValidKey(key: string): boolean {
  try {
    parseKey(key);
    return true;
  } catch {
    return false;
  }
}

/**
 * Generate a random Fernet key (url-safe base64, padded)
 */
export function generateKey(): string {
  return randomBytes(KEY_BYTES).toString('base64url') + '=';
}

/**
 * Encrypt a UTF-8 string into a Fernet token
 */
export function encryptToken(key: string, plaintext: string, options: EncryptOptions = {}): string {
  const { signingKey, encryptionKey } = parseKey(key);
  const iv = options.iv ?? randomBytes(IV_BYTES);
  if (iv.length !== IV_BYTES) {
    throw new CipherError('INVALID_TOKEN', `IV must be ${IV_BYTES} bytes, got ${iv.length}`);
  }

  const header = Buffer.alloc(1 + TIMESTAMP_BYTES);
  header.writeUInt8(VERSION, 0);
  header.writeBigUInt64BE(BigInt(options.timestamp ?? nowSeconds()), 1);

  const cipher = createCipheriv('aes-128-cbc', encryptionKey, iv);
  const ciphertext = Buffer.concat([cipher.update(plaintext, 'utf-8'), cipher.final()]);

  const body = Buffer.concat([header, iv, ciphertext]);
  const token = Buffer.concat([body, sign(signingKey, body)]);

  // Fernet tokens keep their base64 padding
  return token.toString('base64').replace(/\+/g, '-').replace(/\//g, '_');
}

/**
 * Decrypt a Fernet token into a UTF-8 string.
 *
 * A well-formed key that does not match the token fails the HMAC check and is reported
 * the same way as a corrupted token.
 */
export function decryptToken(key: string, token: string, options: DecryptOptions = {}): string {
  const { signingKey, encryptionKey } = parseKey(key);

  const raw = decodeUrlSafe(token);
  if (!raw || raw.length < MIN_TOKEN_BYTES || raw[0] !== VERSION) {
    throw new CipherError('INVALID_TOKEN', 'Malformed Fernet token');
  }

  const body = raw.subarray(0, raw.length - HMAC_BYTES);
  const mac = raw.subarray(raw.length - HMAC_BYTES);
  const ciphertext = body.subarray(HEADER_BYTES);
  if (ciphertext.length % BLOCK_BYTES !== 0) {
    throw new CipherError('INVALID_TOKEN', 'Malformed Fernet token');
  }

  if (!timingSafeEqual(sign(signingKey, body), mac)) {
    throw new CipherError('INVALID_TOKEN', 'Decryption failed');
  }

  if (options.ttlSeconds !== undefined) {
    const issuedAt = Number(body.readBigUInt64BE(1));
    const now = options.now ?? nowSeconds();
    if (issuedAt + options.ttlSeconds < now) {
      throw new CipherError('INVALID_TOKEN', 'Fernet token has expired');
    }
    if (issuedAt - MAX_CLOCK_SKEW_SECONDS > now) {
      throw new CipherError('INVALID_TOKEN', 'Fernet token is stamped in the future');
    }
  }

  const iv = body.subarray(1 + TIMESTAMP_BYTES, HEADER_BYTES);
  let plaintext: Buffer;
  try {
    const decipher = createDecipheriv('aes-128-cbc', encryptionKey, iv);
    plaintext = Buffer.concat([decipher.update(ciphertext), decipher.final()]);
  } catch {
    throw new CipherError('INVALID_TOKEN', 'Decryption failed');
  }

  try {
    return utf8.decode(plaintext);
  } catch {
    throw new CipherError('INVALID_UTF8', 'Decrypted bytes were not valid UTF-8');
  } finally {
    plaintext.fill(0);
  }
}
