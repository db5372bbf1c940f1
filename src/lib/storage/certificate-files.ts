import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import { normalizeDomain } from '../dns/record-mapper.js';

export interface CertificateFiles {
  certificatePath: string;
  privateKeyPath: string;
}

/** `*.example.com` -> `wildcard-example.com` */
export function certificateBaseName(domain: string): string {
  return normalizeDomain(domain).replace(/^\*\./, 'wildcard-');
}

/**
 * Write `<name>.crt` (full chain) and `<name>.key` (mode 0600) under `outputDir`,
 * `<name>` being derived from the first requested domain
 */
export async function writeCertificateFiles(
  outputDir: string,
  domains: readonly string[],
  certificateChain: string,
  privateKeyPem: string,
): Promise<CertificateFiles> {
  const [first] = domains;
  if (first === undefined) {
    throw new Error('At least one domain is required to name the certificate files');
  }

  const name = certificateBaseName(first);
  const certificatePath = join(outputDir, `${name}.crt`);
  const privateKeyPath = join(outputDir, `${name}.key`);

  await mkdir(outputDir, { recursive: true });
  await writeFile(certificatePath, certificateChain);
  await writeFile(privateKeyPath, privateKeyPem, { mode: 0o600 });

  return { certificatePath, privateKeyPath };
}
