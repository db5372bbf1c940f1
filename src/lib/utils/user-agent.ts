import { readFileSync } from 'node:fs';
import { join } from 'node:path';

export interface PackageInfo {
  name: string;
  version: string;
}

let cachedPkg: PackageInfo | null = null;

/**
 * Load and cache package.json metadata (best-effort).
 * Walks up from this file because it runs both from src/ (tests) and dist/ (bin).
 */
export function getPackageInfo(): PackageInfo {
  if (cachedPkg) return cachedPkg;

  const defaults: PackageInfo = { name: 'acme-dns01-ovh', version: '0.0.0-dev' };

  for (const rel of ['../../..', '../..', '..']) {
    try {
      const raw: unknown = JSON.parse(readFileSync(join(__dirname, rel, 'package.json'), 'utf-8'));
      if (raw && typeof raw === 'object' && 'name' in raw && raw.name === defaults.name) {
        const version = 'version' in raw && typeof raw.version === 'string' ? raw.version : '';
        cachedPkg = { name: defaults.name, version: version || defaults.version };
        return cachedPkg;
      }
    } catch {
      // try the next level up
    }
  }

  cachedPkg = defaults;
  return cachedPkg;
}

/** User-Agent sent with every outbound ACME and DNS provider request */
export function buildUserAgent(): string {
  const { name, version } = getPackageInfo();
  return `${name}/${version} (Node/${process.version.replace(/^v/, '')})`;
}
