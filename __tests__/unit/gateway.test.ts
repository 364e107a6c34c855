import { describe, it, expect, jest, beforeAll, beforeEach, afterEach } from '@jest/globals';
import { X509Certificate } from 'crypto';
import { writeFile } from 'fs/promises';
import * as jose from 'jose';
import { Agent, request } from 'undici';
import { TokenVerifier } from '../../src/lib/auth/token-verifier.js';
import { defaultConfiguration, type Configuration } from '../../src/lib/config/configuration.js';
import { resolveServicePaths } from '../../src/lib/config/paths.js';
import { shortSha1Name } from '../../src/lib/crypto/certificates.js';
import { ServiceIdentityError } from '../../src/lib/errors/errors.js';
import { startGateway, type RunningGateway } from '../../src/lib/server/gateway.js';
import { versionRoutes, type RouteRegistrar } from '../../src/lib/server/routes.js';
import { TrustStore } from '../../src/lib/trust/trust-store.js';
import {
  createTempDir,
  createTestCa,
  issueCertificate,
  issueServerCertificate,
  type TestIdentity,
} from '../helpers/pki.js';

describe('HTTPS gateway', () => {
  let root: TestIdentity;
  let serverIdentity: TestIdentity;
  let signer: TestIdentity;
  let token: string;
  let tmp: { dir: string; cleanup(): Promise<void> };
  let config: Configuration;
  let caStore: TrustStore;
  let jwtStore: TrustStore;
  let client: Agent;
  let gateway: RunningGateway | undefined;
  let handlerStarted: () => void;

  const testRoutes: RouteRegistrar = (router) => {
    router.get('/boom', () => {
      throw new Error('handler exploded');
    });
    router.get('/reject', async () => {
      throw new Error('async failure');
    });
    router.get('/slow', (_req, res) => {
      handlerStarted();
      setTimeout(() => res.json({ ok: true }), 150);
    });
    router.get('/hang', () => {
      handlerStarted();
    });
    router.get('/whoami', (req, res) => {
      res.json({ sub: req.auth?.claims.sub, signer: req.auth?.signer });
    });
  };

  beforeAll(async () => {
    root = await createTestCa('Gateway Root');
    serverIdentity = await issueServerCertificate(root);
    signer = await issueCertificate(root, { commonName: 'Gateway JWT Signer' });
    token = await new jose.SignJWT({ sub: 'gateway-user' })
      .setProtectedHeader({ alg: 'ES256', kid: shortSha1Name(new X509Certificate(signer.certPem)) })
      .setIssuedAt()
      .setExpirationTime('1h')
      .sign(signer.keys.privateKey);
  });

  beforeEach(async () => {
    tmp = await createTempDir();
    const paths = resolveServicePaths({ configDir: tmp.dir, logDir: tmp.dir, homeDir: tmp.dir });
    const defaults = defaultConfiguration(paths);
    config = { ...defaults, server: { ...defaults.server, port: 0 } };
    await writeFile(config.tls.keyFile, serverIdentity.keyPem);
    await writeFile(config.tls.certFile, serverIdentity.certPem);

    caStore = new TrustStore(paths.trustedCaDir);
    jwtStore = new TrustStore(paths.trustedJwtDir);
    await caStore.addPemBundle(root.certPem);
    client = new Agent({ connect: { ca: root.certPem } });
    handlerStarted = () => undefined;
  });

  afterEach(async () => {
    if (gateway) {
      gateway.shutdown();
      await gateway.done;
      gateway = undefined;
    }
    await client.close();
    await tmp.cleanup();
  });

  async function start(verifier = new TokenVerifier({ jwtStore, caStore }), shutdownTimeoutMs = 1000) {
    gateway = await startGateway({
      config,
      verifier,
      registrars: [versionRoutes, testRoutes],
      signals: [],
      shutdownTimeoutMs,
    });
    return gateway;
  }

  function get(path: string, auth: string | null = token) {
    if (!gateway) throw new Error('gateway not started');
    return request(`https://localhost:${gateway.port()}${path}`, {
      dispatcher: client,
      headers: auth ? { authorization: `Bearer ${auth}` } : {},
    });
  }

  describe('authorization', () => {
    it('rejects a request without a bearer token', async () => {
      await jwtStore.addPemBundle(signer.certPem);
      await start();
      const res = await get('/qvs/v1/version', null);

      expect(res.statusCode).toBe(401);
      expect(res.headers['www-authenticate']).toBe('Bearer');
      expect(await res.body.json()).toEqual({ error: 'Unauthorized' });
    });

    it('serves the version to an authorized caller', async () => {
      await jwtStore.addPemBundle(signer.certPem);
      await start();
      const res = await get('/qvs/v1/version');

      expect(res.statusCode).toBe(200);
      expect(await res.body.json()).toEqual({ name: 'qvs', version: '1.0.0' });
    });

    it('exposes the verified claims to handlers', async () => {
      await jwtStore.addPemBundle(signer.certPem);
      await start();
      const res = await get('/qvs/v1/whoami');

      expect(await res.body.json()).toEqual({
        sub: 'gateway-user',
        signer: shortSha1Name(new X509Certificate(signer.certPem)),
      });
    });

    it('rejects a token from an unknown signer, then accepts it once the signer is published', async () => {
      let published = false;
      const refresh = jest.fn(async () => {
        if (published) await jwtStore.addPemBundle(signer.certPem);
      });
      await start(new TokenVerifier({ jwtStore, caStore, refresh }));

      const first = await get('/qvs/v1/version');
      expect(first.statusCode).toBe(401);
      await first.body.dump();
      expect(refresh).toHaveBeenCalledTimes(1);

      published = true;
      const second = await get('/qvs/v1/version');
      expect(second.statusCode).toBe(200);
      await second.body.dump();
      expect(refresh).toHaveBeenCalledTimes(2);

      const third = await get('/qvs/v1/version');
      expect(third.statusCode).toBe(200);
      await third.body.dump();
      expect(refresh).toHaveBeenCalledTimes(2);
    });
  });

  describe('routing', () => {
    beforeEach(async () => {
      await jwtStore.addPemBundle(signer.certPem);
      await start();
    });

    it.each(['/qvs/v1/version/', '/qvs/v1/VERSION', '/qvs/v1/missing'])('answers %s with 404', async (path) => {
      const res = await get(path);
      expect(res.statusCode).toBe(404);
      expect(await res.body.json()).toEqual({ error: 'Not Found' });
    });

    it('answers paths outside the API prefix with 404 without authorization', async () => {
      const res = await get('/other', null);
      expect(res.statusCode).toBe(404);
      await res.body.dump();
    });

    it.each(['/qvs/v1/boom', '/qvs/v1/reject'])('recovers from a failing handler at %s', async (path) => {
      const failed = await get(path);
      expect(failed.statusCode).toBe(500);
      expect(await failed.body.json()).toEqual({ error: 'Internal Server Error' });

      const next = await get('/qvs/v1/version');
      expect(next.statusCode).toBe(200);
      await next.body.dump();
    });
  });

  describe('startup', () => {
    it('refuses to start when the key does not match the certificate', async () => {
      await writeFile(config.tls.keyFile, root.keyPem);
      await expect(start()).rejects.toBeInstanceOf(ServiceIdentityError);
      expect(gateway).toBeUndefined();
    });

    it('shuts down when the listener fails', async () => {
      const first = await start();
      gateway = undefined;
      config = { ...config, server: { ...config.server, port: first.port() } };

      const second = await startGateway({ config, verifier: new TokenVerifier({ jwtStore, caStore }), signals: [] });
      const report = await second.done;
      expect(report.reason).toBe('listener-error');
      expect(report.error).toMatchObject({ code: 'EADDRINUSE' });

      first.shutdown();
      await first.done;
    });
  });

  describe('shutdown', () => {
    beforeEach(async () => {
      await jwtStore.addPemBundle(signer.certPem);
    });

    it('lets in-flight requests finish', async () => {
      const started = new Promise<void>((resolve) => {
        handlerStarted = resolve;
      });
      const running = await start();
      const pending = get('/qvs/v1/slow');
      await started;

      running.shutdown();
      const res = await pending;
      expect(res.statusCode).toBe(200);
      expect(await res.body.json()).toEqual({ ok: true });
      await expect(running.done).resolves.toEqual({ reason: 'requested', outcome: 'drained' });
      gateway = undefined;
    });

    it('drops connections still open at the deadline', async () => {
      const started = new Promise<void>((resolve) => {
        handlerStarted = resolve;
      });
      const running = await start(undefined, 200);
      const pending = get('/qvs/v1/hang').catch((e: unknown) => e);
      await started;

      const begun = Date.now();
      running.shutdown();
      await expect(running.done).resolves.toEqual({ reason: 'requested', outcome: 'deadline' });
      expect(Date.now() - begun).toBeGreaterThanOrEqual(190);
      expect(await pending).toBeInstanceOf(Error);
      gateway = undefined;
    });

    it('stops on a termination signal', async () => {
      const running = await startGateway({
        config,
        verifier: new TokenVerifier({ jwtStore, caStore }),
        signals: ['SIGUSR2'],
      });
      process.emit('SIGUSR2', 'SIGUSR2');

      await expect(running.done).resolves.toEqual({ reason: 'signal', outcome: 'drained' });
      expect(process.listenerCount('SIGUSR2')).toBe(0);
    });
  });
});
