/**
 * Outbound HTTPS transport
 */

export {
  TrustedHttpClient,
  type TrustedHttpClientOptions,
  type ParsedResponseData,
} from './http-client.js';
export {
  createCaTrustAgent,
  createPinnedAgent,
  createPinnedConnector,
  normalizeDigest,
} from './dispatchers.js';
