import { request, type Dispatcher } from 'undici';
import { debugHttp } from '../utils/debug.js';
import { buildUserAgent } from '../utils/user-agent.js';

// Extend ResponseData with parsed body
export interface ParsedResponseData extends Omit<Dispatcher.ResponseData, 'body'> {
  body: unknown;
}

export interface TrustedHttpClientOptions {
  /**
   * Dispatcher carrying the TLS trust decision (CA-pinned or digest-pinned agent).
   * Without one undici's global dispatcher and Node's default roots are used.
   */
  dispatcher?: Dispatcher;
}

/**
 * HTTP transport for calls to CMS and the authorization service
 *
 * Features:
 * - Automatic User-Agent injection
 * - Content-type aware body parsing (JSON, PEM/text, binary)
 * - Per-client TLS trust through an undici dispatcher
 * - Debug logging on the `qvs:http` namespace
 */
export class TrustedHttpClient {
  private static userAgent = buildUserAgent();
  private readonly dispatcher?: Dispatcher;

  constructor(opts: TrustedHttpClientOptions = {}) {
    this.dispatcher = opts.dispatcher;
  }

  private ensureUserAgent(headers: Record<string, string>): Record<string, string> {
    const hasUA = Object.keys(headers).some((k) => k.toLowerCase() === 'user-agent');
    if (!hasUA) {
      headers['User-Agent'] = TrustedHttpClient.userAgent;
    }
    return headers;
  }

  async get(url: string, headers: Record<string, string> = {}): Promise<ParsedResponseData> {
    return this.send('GET', url, null, headers);
  }

  async post(
    url: string,
    body: string | Uint8Array,
    headers: Record<string, string> = {},
  ): Promise<ParsedResponseData> {
    return this.send('POST', url, body, headers);
  }

  /** Release the sockets held by the dispatcher. */
  async close(): Promise<void> {
    await this.dispatcher?.close();
  }

  private async send(
    method: 'GET' | 'POST',
    url: string,
    body: string | Uint8Array | null,
    headers: Record<string, string>,
  ): Promise<ParsedResponseData> {
    headers = this.ensureUserAgent({ ...headers });
    debugHttp('%s %s init headers=%j', method, url, redactHeaders(headers));
    const start = Date.now();

    try {
      const res = await request(url, {
        method,
        headers,
        body,
        ...(this.dispatcher && { dispatcher: this.dispatcher }),
      });
      debugHttp(
        '%s %s response status=%d durationMs=%d content-type=%s',
        method,
        url,
        res.statusCode,
        Date.now() - start,
        res.headers['content-type'],
      );

      const data = await this.parseResponseBody(res.headers, res.body);
      return { ...res, body: data };
    } catch (err) {
      debugHttp('%s %s error: %s', method, url, err instanceof Error ? err.message : String(err));
      throw err;
    }
  }

  private async parseResponseBody(
    headers: Record<string, string | string[] | undefined>,
    body: Dispatcher.ResponseData['body'],
  ): Promise<unknown> {
    const rawCt = headers['content-type'];
    const ct = (Array.isArray(rawCt) ? rawCt[0] : rawCt)?.toLowerCase() ?? '';

    if (ct.includes('application/json')) {
      return body.json();
    }
    if (
      ct.startsWith('text/') ||
      ct.includes('application/x-pem-file') ||
      ct.includes('application/pem-certificate-chain')
    ) {
      return body.text();
    }
    // Binary fallback
    const buf = await body.arrayBuffer();
    return Buffer.from(buf);
  }
}

function redactHeaders(headers: Record<string, string>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(headers)) {
    out[k] = k.toLowerCase() === 'authorization' ? '<redacted>' : v;
  }
  return out;
}
