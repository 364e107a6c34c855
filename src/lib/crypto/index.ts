/**
 * Certificate, key and CSR utilities
 */

export {
  parsePemCertificates,
  splitPemCertificates,
  sha384Hex,
  sha1Hex,
  shortSha1Name,
  certificateFileSha384,
  keyMatchesCertificate,
  loadServiceIdentity,
  SHORT_NAME_LENGTH,
  type ServiceIdentity,
} from './certificates.js';

export {
  generateTlsKeyPair,
  createTlsCsr,
  exportPrivateKeyPem,
  parseSanList,
  toGeneralNames,
  signingAlgorithmFor,
  type TlsKeyAlgorithm,
  type EcKeyAlgorithm,
  type RsaKeyAlgorithm,
  type CreateCsrResult,
} from './csr.js';

export { createSelfSignedIdentity, type SelfSignedIdentity } from './self-signed.js';

export { chainsToRoot, isWithinValidity } from './chain.js';
export { hashPassword, verifyPassword } from './password.js';
