import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach } from '@jest/globals';
import type { IncomingMessage, ServerResponse } from 'http';
import { join } from 'path';
import { JwtCertRefresher } from '../../src/lib/auth/jwt-cert-refresher.js';
import { JwtCertRefreshError } from '../../src/lib/errors/errors.js';
import { TrustStore } from '../../src/lib/trust/trust-store.js';
import {
  createTempDir,
  createTestCa,
  issueCertificate,
  issueServerCertificate,
  startHttpsServer,
  type TestHttpsServer,
  type TestIdentity,
} from '../helpers/pki.js';

describe('JwtCertRefresher', () => {
  let root: TestIdentity;
  let signer: TestIdentity;
  let aas: TestHttpsServer;
  let requests: { url?: string; accept?: string }[];
  let respond: (res: ServerResponse) => void;
  let tmp: { dir: string; cleanup(): Promise<void> };
  let caStore: TrustStore;
  let jwtStore: TrustStore;

  beforeAll(async () => {
    root = await createTestCa('Refresher Root');
    signer = await issueCertificate(root, { commonName: 'JWT Signer' });
    aas = await startHttpsServer(await issueServerCertificate(root), (req: IncomingMessage, res) => {
      requests.push({ url: req.url, accept: req.headers.accept });
      // hold the response briefly so concurrent refreshes overlap
      setTimeout(() => respond(res), 50);
    });
  });

  afterAll(async () => {
    await aas.close();
  });

  beforeEach(async () => {
    requests = [];
    respond = (res) => {
      res.writeHead(200, { 'Content-Type': 'application/x-pem-file' });
      res.end(signer.certPem);
    };
    tmp = await createTempDir();
    caStore = new TrustStore(join(tmp.dir, 'trustedca'));
    jwtStore = new TrustStore(join(tmp.dir, 'trustedjwt'));
    await caStore.addPemBundle(root.certPem);
  });

  afterEach(async () => {
    await tmp.cleanup();
  });

  const refresherFor = (base = `${aas.url}/aas/v1`) =>
    new JwtCertRefresher({ authServiceUrl: base, caStore, jwtStore });

  it('appends the endpoint path to the base URL', () => {
    expect(refresherFor('https://aas.example.internal/aas/v1').url).toBe(
      'https://aas.example.internal/aas/v1/noauth/jwt-certificates',
    );
    expect(refresherFor('https://aas.example.internal/aas/v1/').url).toBe(
      'https://aas.example.internal/aas/v1/noauth/jwt-certificates',
    );
  });

  it('stores the published signing certificates', async () => {
    const result = await refresherFor().refresh();

    expect(result.added).toHaveLength(1);
    expect(requests).toEqual([{ url: '/aas/v1/noauth/jwt-certificates', accept: 'application/x-pem-file' }]);
    expect(await jwtStore.pems()).toHaveLength(1);
  });

  it('treats certificates it already has as no-ops', async () => {
    const refresher = refresherFor();
    await refresher.refresh();
    const again = await refresher.refresh();

    expect(again.added).toEqual([]);
    expect(again.existing).toHaveLength(1);
    expect(await jwtStore.pems()).toHaveLength(1);
  });

  it('shares one request between concurrent refreshes', async () => {
    const refresher = refresherFor();
    const [a, b] = await Promise.all([refresher.refresh(), refresher.refresh()]);

    expect(requests).toHaveLength(1);
    expect(a).toEqual(b);
  });

  it('fails on a non-success status', async () => {
    respond = (res) => {
      res.writeHead(503);
      res.end();
    };
    await expect(refresherFor().refresh()).rejects.toMatchObject({
      code: 'JWT_CERT_REFRESH_ERROR',
      context: { status: 503 },
    });
    await expect(jwtStore.isEmpty()).resolves.toBe(true);
  });

  it('fails when the body holds no certificate', async () => {
    respond = (res) => {
      res.writeHead(200, { 'Content-Type': 'text/plain' });
      res.end('nothing to see');
    };
    await expect(refresherFor().refresh()).rejects.toBeInstanceOf(JwtCertRefreshError);
  });

  it('fails without a root CA to trust', async () => {
    const empty = new TrustStore(join(tmp.dir, 'empty'));
    const refresher = new JwtCertRefresher({ authServiceUrl: aas.url, caStore: empty, jwtStore });

    await expect(refresher.refresh()).rejects.toMatchObject({ message: 'Could not read root CA certificate' });
    expect(requests).toHaveLength(0);
  });

  it('does not trust a server outside the root CA store', async () => {
    const other = new TrustStore(join(tmp.dir, 'other'));
    await other.addPemBundle((await createTestCa('Other Root')).certPem);
    const refresher = new JwtCertRefresher({ authServiceUrl: aas.url, caStore: other, jwtStore });

    const error = await refresher.refresh().catch((e: unknown) => e);
    expect(error).toBeInstanceOf(JwtCertRefreshError);
    expect(error instanceof JwtCertRefreshError ? error.cause : undefined).toBeDefined();
    expect(requests).toHaveLength(0);
  });
});
