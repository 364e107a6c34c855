export {
  TrustStore,
  TRUST_STORE_EXTENSION,
  type TrustedCertificate,
  type AddCertificatesResult,
} from './trust-store.js';
