import type { CertificateRequestFactory } from '../orchestrator/types.js';
import { CERTIFICATE_ALGORITHMS, createAcmeCsr, exportPrivateKeyPem, type CertificateAlgorithmName } from './csr.js';

/**
 * Fresh certificate key and CSR for every finalization
 */
export function createCsrFactory(algorithm: CertificateAlgorithmName = 'ec-p256'): CertificateRequestFactory {
  return async (domains) => {
    const { derBase64Url, keys } = await createAcmeCsr(domains, CERTIFICATE_ALGORITHMS[algorithm]);
    return {
      csr: derBase64Url,
      privateKeyPem: await exportPrivateKeyPem(keys.privateKey),
    };
  };
}
