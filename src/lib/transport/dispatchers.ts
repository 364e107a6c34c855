import { rootCertificates, TLSSocket } from 'tls';
import { Agent, buildConnector } from 'undici';
import { sha384Hex } from '../crypto/certificates.js';
import { PinnedCertificateMismatchError } from '../errors/errors.js';
import { debugHttp } from '../utils/debug.js';

/**
 * Agent whose TLS roots are exactly `caPems` (plus Node's bundled roots when
 * `includeSystemRoots` is set).
 */
export function createCaTrustAgent(caPems: string[], includeSystemRoots = false): Agent {
  const ca = includeSystemRoots ? [...rootCertificates, ...caPems] : caPems;
  return new Agent({ connect: { ca, rejectUnauthorized: true } });
}

/** Lowercase hex without separators, so `AB:CD...` and `abcd...` compare equal. */
export function normalizeDigest(digest: string): string {
  return digest.replace(/[^0-9a-fA-F]/g, '').toLowerCase();
}

/**
 * Connector that accepts the server only if the SHA-384 digest of its leaf
 * certificate equals `expectedSha384`. Chain validation is replaced by the pin,
 * which is how CMS is reached before its root CA is known.
 */
export function createPinnedConnector(expectedSha384: string): buildConnector.connector {
  const connect = buildConnector({ rejectUnauthorized: false });
  const expected = normalizeDigest(expectedSha384);

  return (options, callback) => {
    connect(options, (err, socket) => {
      if (err || !socket) {
        callback(err ?? new Error(`Could not connect to ${options.hostname}`), null);
        return;
      }
      if (!(socket instanceof TLSSocket)) {
        socket.destroy();
        callback(new Error(`Pinned connection to ${options.hostname} is not TLS`), null);
        return;
      }

      const peer = socket.getPeerCertificate();
      const actual = peer.raw ? sha384Hex(peer.raw) : '';
      if (actual !== expected) {
        debugHttp('pinned digest mismatch host=%s actual=%s', options.hostname, actual);
        socket.destroy();
        callback(PinnedCertificateMismatchError.mismatch(options.hostname, expected, actual), null);
        return;
      }
      callback(null, socket);
    });
  };
}

export function createPinnedAgent(expectedSha384: string): Agent {
  return new Agent({ connect: createPinnedConnector(expectedSha384) });
}
