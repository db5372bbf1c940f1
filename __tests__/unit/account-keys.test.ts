import { describe, it, expect, afterAll, beforeAll } from '@jest/globals';
import { mkdtemp, readFile, rm, stat } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import * as jose from 'jose';

import { importAccountKeys, loadOrCreateAccountKeys } from '../../src/index.js';

describe('account keys', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'acme-dns01-keys-'));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('generates a key on first use and loads the same key afterwards', async () => {
    const path = join(dir, 'nested', 'account.json');

    const created = await loadOrCreateAccountKeys(path);
    const stored: unknown = JSON.parse(await readFile(path, 'utf8'));
    const loaded = await loadOrCreateAccountKeys(path);

    expect(stored).toMatchObject({ kty: 'EC', crv: 'P-256' });
    expect(await jose.calculateJwkThumbprint(await jose.exportJWK(loaded.publicKey))).toBe(
      await jose.calculateJwkThumbprint(await jose.exportJWK(created.publicKey)),
    );
    if (process.platform !== 'win32') {
      expect((await stat(path)).mode & 0o777).toBe(0o600);
    }
  });

  it('refuses keys that are not private P-256 JWKs', async () => {
    const { publicKey } = await loadOrCreateAccountKeys();
    const publicJwk = await jose.exportJWK(publicKey);

    await expect(importAccountKeys(publicJwk)).rejects.toThrow('Account key must be a private P-256 EC JWK');
    await expect(importAccountKeys('not a key')).rejects.toThrow('Account key must be a private P-256 EC JWK');
  });
});
