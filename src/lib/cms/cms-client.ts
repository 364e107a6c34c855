import { PEM_CONTENT_TYPE, TLS_CERT_TYPE } from '../constants/defaults.js';
import { splitPemCertificates } from '../crypto/certificates.js';
import { CmsRequestError, isServiceOperationError, TrustStoreError } from '../errors/errors.js';
import { createCaTrustAgent, createPinnedAgent } from '../transport/dispatchers.js';
import { TrustedHttpClient, type ParsedResponseData } from '../transport/http-client.js';
import type { TrustStore } from '../trust/trust-store.js';
import { debugCms } from '../utils/debug.js';
import { bodyText, joinUrl } from '../utils/index.js';

export interface CmsClientOptions {
  /** CMS base URL, e.g. `https://cms.example.internal:8445/cms/v1` */
  baseUrl: string;
  /** Hex SHA-384 of the CMS TLS certificate, trusted before the root CA is known */
  tlsCertDigest: string;
  /** Root CA store; issuance requests trust exactly its certificates */
  caStore: TrustStore;
}

/**
 * Client for the certificate management service
 *
 * The root CA bundle is fetched over a connection authenticated by the pinned
 * certificate digest alone. Once the bundle is stored, certificate issuance goes
 * over a connection that trusts only the root CA store.
 */
export class CmsClient {
  constructor(private readonly opts: CmsClientOptions) {}

  /**
   * Download the CMS root CA bundle.
   *
   * @returns the PEM blocks of the bundle, in the order CMS sent them
   * @throws PinnedCertificateMismatchError when CMS presents another certificate
   * @throws CmsRequestError on a non-2xx answer or when the bundle holds no certificate
   */
  async getRootCaCertificates(): Promise<string[]> {
    const url = joinUrl(this.opts.baseUrl, 'ca-certificates');
    const http = new TrustedHttpClient({ dispatcher: createPinnedAgent(this.opts.tlsCertDigest) });
    try {
      const res = await this.call(url, () => http.get(url, { Accept: PEM_CONTENT_TYPE }));
      const pems = splitPemCertificates(bodyText(res));
      if (pems.length === 0) throw CmsRequestError.status(url, res.statusCode, 'no certificate in body');
      debugCms('received %d root CA certificate(s)', pems.length);
      return pems;
    } finally {
      await http.close();
    }
  }

  /**
   * Have CMS sign `csrPem`.
   *
   * @returns the issued certificate chain as PEM, leaf first
   */
  async signCertificate(csrPem: string, bearerToken: string, certType = TLS_CERT_TYPE): Promise<string> {
    const caPems = await this.opts.caStore.pems();
    if (caPems.length === 0) throw TrustStoreError.noCertificates(this.opts.caStore.dir);

    const url = `${joinUrl(this.opts.baseUrl, 'certificates')}?certType=${encodeURIComponent(certType)}`;
    const http = new TrustedHttpClient({ dispatcher: createCaTrustAgent(caPems) });
    try {
      const res = await this.call(url, () =>
        http.post(url, csrPem, {
          Accept: PEM_CONTENT_TYPE,
          'Content-Type': PEM_CONTENT_TYPE,
          Authorization: `Bearer ${bearerToken}`,
        }),
      );
      const chain = splitPemCertificates(bodyText(res));
      if (chain.length === 0) throw CmsRequestError.status(url, res.statusCode, 'no certificate in body');
      debugCms('certificate issued certType=%s chainLength=%d', certType, chain.length);
      return chain.join('');
    } finally {
      await http.close();
    }
  }

  private async call(url: string, send: () => Promise<ParsedResponseData>): Promise<ParsedResponseData> {
    let res: ParsedResponseData;
    try {
      res = await send();
    } catch (err) {
      if (isServiceOperationError(err)) throw err;
      throw CmsRequestError.network(url, err);
    }
    if (res.statusCode < 200 || res.statusCode > 299) {
      throw CmsRequestError.status(url, res.statusCode, bodyText(res));
    }
    return res;
  }
}
