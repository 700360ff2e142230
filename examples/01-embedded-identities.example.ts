/**
 * 01: Embedded identities
 *
 * Runs the middleware in front of a storage cluster with identities
 * kept in a local store, creates an account with one admin, and asks
 * for a token.
 *
 * Run (with a storage cluster listening on 127.0.0.1:8080):
 *   npx tsx examples/01-embedded-identities.example.ts
 */

import { Store } from '@hamicek/noex-store';
import { StorewardServer } from '../src/index.js';

const SUPER_ADMIN_KEY = 'example-secret';

async function main(): Promise<void> {
  // ── 1. Start the middleware ─────────────────────────────────────

  const store = await Store.start({ name: 'storeward-example' });
  const server = await StorewardServer.start({
    upstream: 'http://127.0.0.1:8080',
    backend: { kind: 'embedded', store },
    port: 0,
    host: '127.0.0.1',
    superAdminKey: SUPER_ADMIN_KEY,
    provisionAccounts: false,
  });
  const base = `http://127.0.0.1:${server.port}`;
  const superAdmin = { 'x-auth-admin-user': '.super_admin', 'x-auth-admin-key': SUPER_ADMIN_KEY };

  console.log(`Listening on ${base}`);

  // ── 2. Reserved account, then an account and its admin ─────────

  await fetch(`${base}/auth/v2/.prep`, { method: 'POST', headers: superAdmin });

  const account = await fetch(`${base}/auth/v2/demo`, { method: 'PUT', headers: superAdmin });
  console.log('Account id:', account.headers.get('x-account-id'));

  await fetch(`${base}/auth/v2/demo/admin`, {
    method: 'PUT',
    headers: { ...superAdmin, 'x-auth-user-key': 'demo-key', 'x-auth-user-admin': 'true' },
  });

  // ── 3. Token ────────────────────────────────────────────────────

  const login = await fetch(`${base}/auth/v1.0`, {
    headers: { 'x-auth-user': 'demo:admin', 'x-auth-key': 'demo-key' },
  });
  console.log('Token:      ', login.headers.get('x-auth-token'));
  console.log('Storage URL:', login.headers.get('x-storage-url'));

  // ── 4. Cleanup ──────────────────────────────────────────────────

  await server.stop();
  await store.stop();
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
