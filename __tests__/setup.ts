import { webcrypto } from 'node:crypto';

// @peculiar/x509 binds its crypto provider when the module loads
if (!globalThis.crypto) {
  Object.defineProperty(globalThis, 'crypto', { value: webcrypto, configurable: true });
}

process.env.NODE_ENV = 'test';
