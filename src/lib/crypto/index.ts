export {
  generateKeyPair,
  createAcmeCsr,
  exportPrivateKeyPem,
  isCertificateAlgorithmName,
  CERTIFICATE_ALGORITHMS,
  type AcmeEcAlgorithm,
  type AcmeRsaAlgorithm,
  type AcmeCertificateAlgorithm,
  type CertificateAlgorithmName,
  type CreateCsrResult,
} from './csr.js';

export {
  generateAccountKeys,
  importAccountKeys,
  loadOrCreateAccountKeys,
} from './account-keys.js';
export { createCsrFactory } from './certificate-request.js';
