import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import * as jose from 'jose';

import type { AccountKeys } from '../core/acme-request-signer.js';
import { debugAcme } from '../utils/debug.js';
import { errorCode } from '../utils/logger.js';

const ACCOUNT_KEY_ALGORITHM = { name: 'ECDSA', namedCurve: 'P-256' } as const;

export async function generateAccountKeys(): Promise<AccountKeys> {
  return globalThis.crypto.subtle.generateKey(ACCOUNT_KEY_ALGORITHM, true, ['sign', 'verify']);
}

function isPrivateEcJwk(value: unknown): value is JsonWebKey & { x: string; y: string; d: string } {
  if (typeof value !== 'object' || value === null) return false;
  const { kty, crv, x, y, d } = Object.fromEntries(Object.entries(value));
  return (
    kty === 'EC' &&
    crv === 'P-256' &&
    typeof x === 'string' &&
    typeof y === 'string' &&
    typeof d === 'string'
  );
}

/**
 * Import a private P-256 JWK; the public half is rebuilt from its coordinates
 */
export async function importAccountKeys(jwk: unknown): Promise<AccountKeys> {
  if (!isPrivateEcJwk(jwk)) {
    throw new Error('Account key must be a private P-256 EC JWK');
  }

  const subtle = globalThis.crypto.subtle;
  const privateKey = await subtle.importKey('jwk', jwk, ACCOUNT_KEY_ALGORITHM, true, ['sign']);
  const publicKey = await subtle.importKey(
    'jwk',
    { kty: 'EC', crv: 'P-256', x: jwk.x, y: jwk.y },
    ACCOUNT_KEY_ALGORITHM,
    true,
    ['verify'],
  );
  return { privateKey, publicKey };
}

/**
 * Load the account key from `path`, or generate one and write it there (0600)
 */
export async function loadOrCreateAccountKeys(path?: string): Promise<AccountKeys> {
  if (!path) {
    debugAcme('no account key path, generating an ephemeral account key');
    return generateAccountKeys();
  }

  let raw: string | null = null;
  try {
    raw = await readFile(path, 'utf8');
  } catch (error) {
    if (errorCode(error) !== 'ENOENT') {
      throw error;
    }
  }

  if (raw !== null) {
    debugAcme('loading account key from %s', path);
    return importAccountKeys(JSON.parse(raw));
  }

  const keys = await generateAccountKeys();
  const jwk = await jose.exportJWK(keys.privateKey);
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, JSON.stringify(jwk, null, 2) + '\n', { mode: 0o600 });
  debugAcme('generated account key at %s', path);
  return keys;
}
