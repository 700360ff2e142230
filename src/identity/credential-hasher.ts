import { createHash, randomBytes, scrypt, timingSafeEqual } from 'node:crypto';
import { ConfigurationError, ErrorCode, StorewardError } from '../errors.js';

// ── Types ────────────────────────────────────────────────────────

export const AUTH_TYPES = ['plaintext', 'sha1', 'sha512', 'scrypt'] as const;

export type AuthType = (typeof AUTH_TYPES)[number];

export interface CredentialHasher {
  readonly type: AuthType;
  /** Encodes a secret as `<type>:<payload>`. */
  encode(secret: string): Promise<string>;
  /** Whether `secret` matches the stored credentials. Never throws on malformed input. */
  match(secret: string, stored: string): Promise<boolean>;
}

export interface ParsedCredentials {
  readonly type: AuthType;
  readonly payload: string;
}

export function isAuthType(value: string): value is AuthType {
  return AUTH_TYPES.some((type) => type === value);
}

// ── Constants ────────────────────────────────────────────────────

const SALT_BYTES = 16;
const SCRYPT_KEYLEN = 64;
const SCRYPT_COST = 16384; // N = 2^14
const SCRYPT_BLOCK_SIZE = 8;
const SCRYPT_PARALLELIZATION = 1;

// ── Plaintext ────────────────────────────────────────────────────

/** `plaintext:<key>`. Only for compatibility with existing data. */
export class PlaintextHasher implements CredentialHasher {
  readonly type = 'plaintext';

  encode(secret: string): Promise<string> {
    return Promise.resolve(`plaintext:${secret}`);
  }

  match(secret: string, stored: string): Promise<boolean> {
    const parsed = parseCredentials(stored);
    if (parsed === null || parsed.type !== 'plaintext') return Promise.resolve(false);
    return Promise.resolve(safeEqual(sha256(parsed.payload), sha256(secret)));
  }
}

// ── SHA digests ──────────────────────────────────────────────────

/** `<type>:<salt>$<hex(digest(salt + key))>`. */
export class DigestHasher implements CredentialHasher {
  readonly type: 'sha1' | 'sha512';
  readonly #salt: string | null;

  constructor(type: 'sha1' | 'sha512', salt?: string) {
    assertSalt(salt);
    this.type = type;
    this.#salt = salt ?? null;
  }

  encode(secret: string): Promise<string> {
    const salt = this.#salt ?? randomBytes(SALT_BYTES).toString('hex');
    return Promise.resolve(`${this.type}:${salt}$${digestHex(this.type, salt, secret)}`);
  }

  match(secret: string, stored: string): Promise<boolean> {
    const parsed = parseCredentials(stored);
    if (parsed === null || parsed.type !== this.type) return Promise.resolve(false);

    const separator = parsed.payload.indexOf('$');
    if (separator === -1) return Promise.resolve(false);
    const salt = parsed.payload.slice(0, separator);
    const expected = Buffer.from(parsed.payload.slice(separator + 1), 'hex');
    const actual = Buffer.from(digestHex(this.type, salt, secret), 'hex');
    return Promise.resolve(safeEqual(actual, expected));
  }
}

// ── scrypt ───────────────────────────────────────────────────────

/** `scrypt:<N>$<r>$<p>$<salt>$<hash>`, salt and hash in base64. */
export class ScryptHasher implements CredentialHasher {
  readonly type = 'scrypt';
  readonly #salt: Buffer | null;

  constructor(salt?: string) {
    assertSalt(salt);
    this.#salt = salt === undefined ? null : Buffer.from(salt, 'utf8');
  }

  async encode(secret: string): Promise<string> {
    const salt = this.#salt ?? randomBytes(SALT_BYTES);
    const derived = await deriveScrypt(secret, salt, SCRYPT_KEYLEN, {
      N: SCRYPT_COST,
      r: SCRYPT_BLOCK_SIZE,
      p: SCRYPT_PARALLELIZATION,
    });
    const payload = [
      SCRYPT_COST,
      SCRYPT_BLOCK_SIZE,
      SCRYPT_PARALLELIZATION,
      salt.toString('base64'),
      derived.toString('base64'),
    ].join('$');
    return `scrypt:${payload}`;
  }

  async match(secret: string, stored: string): Promise<boolean> {
    const parsed = parseCredentials(stored);
    if (parsed === null || parsed.type !== 'scrypt') return false;

    // payload: N$r$p$salt$hash
    const parts = parsed.payload.split('$');
    if (parts.length !== 5) return false;
    const [n, r, p, salt, hash] = parts;
    const params = { N: Number(n), r: Number(r), p: Number(p) };
    if (!Object.values(params).every((value) => Number.isInteger(value) && value > 0)) {
      return false;
    }
    if (salt === undefined || hash === undefined) return false;

    const expected = Buffer.from(hash, 'base64');
    if (expected.length === 0) return false;

    let derived: Buffer;
    try {
      derived = await deriveScrypt(secret, Buffer.from(salt, 'base64'), expected.length, params);
    } catch {
      // Parameters out of the range node accepts.
      return false;
    }
    return safeEqual(derived, expected);
  }
}

// ── Factory & dispatch ───────────────────────────────────────────

/** Selects the hasher for new credentials. Unknown types are a startup error. */
export function createHasher(type: string, salt?: string): CredentialHasher {
  switch (type) {
    case 'plaintext':
      return new PlaintextHasher();
    case 'sha1':
    case 'sha512':
      return new DigestHasher(type, salt);
    case 'scrypt':
      return new ScryptHasher(salt);
    default:
      throw new ConfigurationError(
        `Unknown auth type "${type}". Expected one of: ${AUTH_TYPES.join(', ')}`,
      );
  }
}

export function parseCredentials(stored: string): ParsedCredentials | null {
  const separator = stored.indexOf(':');
  if (separator <= 0) return null;
  const type = stored.slice(0, separator);
  if (!isAuthType(type)) return null;
  return { type, payload: stored.slice(separator + 1) };
}

/**
 * Checks a secret against stored credentials using the algorithm named
 * by the stored tag, whatever the currently configured type is.
 */
export function verifyCredentials(secret: string, stored: string): Promise<boolean> {
  const parsed = parseCredentials(stored);
  if (parsed === null) return Promise.resolve(false);
  return createHasher(parsed.type).match(secret, stored);
}

/**
 * Validates a pre-hashed key supplied by an administrator and returns
 * it unchanged.
 */
export function validateCredentials(stored: string): string {
  const parsed = parseCredentials(stored);
  const valid =
    parsed !== null &&
    (parsed.type === 'plaintext'
      ? parsed.payload.length > 0
      : parsed.type === 'scrypt'
        ? /^\d+\$\d+\$\d+\$[A-Za-z0-9+/=]+\$[A-Za-z0-9+/=]+$/.test(parsed.payload)
        : /^[^$]*\$[0-9a-f]+$/.test(parsed.payload));
  if (!valid) {
    throw new StorewardError(ErrorCode.VALIDATION_ERROR, 'Malformed credential hash', {
      expected: '<type>:<payload>',
    });
  }
  return stored;
}

// ── Helpers ──────────────────────────────────────────────────────

function assertSalt(salt: string | undefined): void {
  if (salt !== undefined && (salt.length === 0 || salt.includes('$'))) {
    throw new ConfigurationError('authTypeSalt must be non-empty and must not contain "$"');
  }
}

function digestHex(type: 'sha1' | 'sha512', salt: string, secret: string): string {
  return createHash(type).update(salt + secret).digest('hex');
}

function sha256(value: string): Buffer {
  return createHash('sha256').update(value).digest();
}

function safeEqual(a: Buffer, b: Buffer): boolean {
  return a.length === b.length && timingSafeEqual(a, b);
}

function deriveScrypt(
  secret: string,
  salt: Buffer,
  keylen: number,
  params: { N: number; r: number; p: number },
): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    scrypt(secret, salt, keylen, params, (err, derivedKey) => {
      if (err) {
        reject(err);
        return;
      }
      resolve(derivedKey);
    });
  });
}
