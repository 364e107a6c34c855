export { JwtCertRefresher, type JwtCertRefresherOptions } from './jwt-cert-refresher.js';
export {
  ALLOWED_ALGORITHMS,
  TokenVerifier,
  type SignerKey,
  type TokenVerifierOptions,
  type VerifiedToken,
} from './token-verifier.js';
export { createAuthMiddleware, extractBearerToken } from './middleware.js';
