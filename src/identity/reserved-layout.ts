import { createHash } from 'node:crypto';
import { ErrorCode, StorewardError } from '../errors.js';

// ── Reserved account layout ──────────────────────────────────────
//
//   <account>                       container, meta account-id
//   <account>/.services             service endpoints (JSON)
//   <account>/<user>                user record (JSON), meta auth-token
//   .account_id/<accountId>         reverse mapping → account name
//   .token_<h>/<sha512(salt:token)> token record (JSON), 16 shards

export const ACCOUNT_ID_CONTAINER = '.account_id';
export const SERVICES_OBJECT = '.services';
export const ACCOUNT_ID_META = 'account-id';
export const USER_TOKEN_META = 'auth-token';

export const TOKEN_SHARD_COUNT = 16;
export const MAX_TOKEN_LENGTH = 256;
export const MAX_NAME_LENGTH = 256;

export interface ObjectLocation {
  readonly container: string;
  readonly name: string;
}

export function tokenShardContainers(): string[] {
  return Array.from({ length: TOKEN_SHARD_COUNT }, (_, i) => `.token_${i.toString(16)}`);
}

/** Where a token's record lives. The raw token never appears in the name. */
export function tokenObjectLocation(token: string, salt: string): ObjectLocation {
  const name = createHash('sha512').update(`${salt}:${token}`).digest('hex');
  return { container: `.token_${name.slice(-1)}`, name };
}

export function isReservedName(name: string): boolean {
  return name.startsWith('.');
}

/** Rejects names that would collide with the reserved layout or user ids. */
export function validateName(kind: 'account' | 'user' | 'group', name: string): void {
  let problem: string | null = null;
  if (name.length === 0) problem = 'must not be empty';
  else if (name.length > MAX_NAME_LENGTH) problem = `must be at most ${MAX_NAME_LENGTH} characters`;
  else if (isReservedName(name)) problem = 'must not start with "."';
  else if (name.includes('/')) problem = 'must not contain "/"';
  else if (name.includes(':')) problem = 'must not contain ":"';

  if (problem !== null) {
    throw new StorewardError(ErrorCode.VALIDATION_ERROR, `Invalid ${kind} name "${name}": ${problem}`, {
      kind,
      name,
    });
  }
}
