import { coalesceAsync } from 'promise-coalesce';
import { JWT_CERTIFICATES_PATH, PEM_CONTENT_TYPE } from '../constants/defaults.js';
import { JwtCertRefreshError, TrustStoreError } from '../errors/errors.js';
import { createCaTrustAgent } from '../transport/dispatchers.js';
import { TrustedHttpClient } from '../transport/http-client.js';
import type { AddCertificatesResult, TrustStore } from '../trust/trust-store.js';
import { debugAuth } from '../utils/debug.js';
import { bodyText, joinUrl } from '../utils/index.js';

export interface JwtCertRefresherOptions {
  /** Base URL of the authorization service */
  authServiceUrl: string;
  /** Roots for the outbound TLS connection */
  caStore: TrustStore;
  /** Where the fetched signing certificates are stored */
  jwtStore: TrustStore;
  /** Also trust Node's bundled root certificates. Off by default. */
  includeSystemRoots?: boolean;
}

/**
 * Fetches the JWT signing certificates published by the authorization service and
 * adds them to the JWT trust store.
 *
 * Refreshes are not retried; a caller that needs a new attempt calls
 * {@link JwtCertRefresher.refresh} again. Calls made while one is in flight share it.
 */
export class JwtCertRefresher {
  readonly url: string;

  constructor(private readonly opts: JwtCertRefresherOptions) {
    this.url = joinUrl(opts.authServiceUrl, JWT_CERTIFICATES_PATH);
  }

  refresh(): Promise<AddCertificatesResult> {
    return coalesceAsync(`qvs:jwt-certificates:${this.opts.jwtStore.dir}`, () => this.fetchAndStore());
  }

  private async fetchAndStore(): Promise<AddCertificatesResult> {
    let caPems: string[];
    try {
      caPems = await this.opts.caStore.pems();
    } catch (err) {
      throw JwtCertRefreshError.failed(this.url, err);
    }
    if (caPems.length === 0) throw JwtCertRefreshError.noRootCa(this.opts.caStore.dir);

    debugAuth('refreshing JWT signing certificates from %s', this.url);
    const http = new TrustedHttpClient({
      dispatcher: createCaTrustAgent(caPems, this.opts.includeSystemRoots ?? false),
    });

    let body: string;
    try {
      const res = await http.get(this.url, { Accept: PEM_CONTENT_TYPE });
      if (res.statusCode < 200 || res.statusCode > 299) {
        throw JwtCertRefreshError.status(this.url, res.statusCode);
      }
      body = bodyText(res);
    } catch (err) {
      if (err instanceof JwtCertRefreshError) throw err;
      throw JwtCertRefreshError.failed(this.url, err);
    } finally {
      await http.close();
    }

    try {
      const result = await this.opts.jwtStore.addPemBundle(body, this.url);
      debugAuth(
        'JWT signing certificates refreshed added=%d existing=%d',
        result.added.length,
        result.existing.length,
      );
      return result;
    } catch (err) {
      if (err instanceof TrustStoreError) throw JwtCertRefreshError.failed(this.url, err);
      throw err;
    }
  }
}
