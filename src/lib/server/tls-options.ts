import type { ServerOptions } from 'https';
import type { ServerRuntimeConfig } from '../config/configuration.js';
import type { ServiceIdentity } from '../crypto/certificates.js';

/** TLS 1.2 suites offered, in preference order. TLS 1.3 suites are all AEAD and left at Node's defaults. */
export const TLS_CIPHERS = [
  'ECDHE-ECDSA-AES256-GCM-SHA384',
  'ECDHE-RSA-AES256-GCM-SHA384',
  'ECDHE-ECDSA-AES128-GCM-SHA256',
  'ECDHE-RSA-AES128-GCM-SHA256',
].join(':');

export const TLS_MIN_VERSION = 'TLSv1.2';

export function createTlsServerOptions(
  identity: ServiceIdentity,
  runtime: ServerRuntimeConfig,
): ServerOptions {
  return {
    key: identity.keyPem,
    cert: identity.certPem,
    minVersion: TLS_MIN_VERSION,
    ciphers: TLS_CIPHERS,
    honorCipherOrder: true,
    requestTimeout: runtime.readTimeoutMs,
    headersTimeout: runtime.readHeaderTimeoutMs,
    maxHeaderSize: runtime.maxHeaderBytes,
  };
}
