import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals';
import { createHash, X509Certificate } from 'crypto';
import { mkdir, readFile, writeFile } from 'fs/promises';
import { createServer, type Server } from 'net';
import { join } from 'path';
import { runCli } from '../../src/cli/program.js';
import type { CliContext } from '../../src/cli/utils/context.js';
import { loadConfiguration, saveConfiguration, defaultConfiguration } from '../../src/lib/config/configuration.js';
import { resolveServicePaths, type ServicePaths } from '../../src/lib/config/paths.js';
import type { SpawnSyncFn } from '../../src/lib/service/service-control.js';
import { createTempDir, createTestCa, issueServerCertificate } from '../helpers/pki.js';

describe('qvs CLI', () => {
  let tmp: { dir: string; cleanup(): Promise<void> };
  let paths: ServicePaths;
  let stdout: string[];
  let stderr: string[];
  let spawn: jest.Mock<SpawnSyncFn>;

  beforeEach(async () => {
    tmp = await createTempDir();
    paths = resolveServicePaths(
      {
        homeDir: join(tmp.dir, 'home'),
        configDir: join(tmp.dir, 'config'),
        logDir: join(tmp.dir, 'log'),
        runDir: join(tmp.dir, 'run'),
        execLinkPath: join(tmp.dir, 'qvs'),
        systemdUnitPath: join(tmp.dir, 'qvs.service'),
      },
      {},
    );
    stdout = [];
    stderr = [];
    jest.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
      stdout.push(args.join(' '));
    });
    jest.spyOn(console, 'error').mockImplementation((...args: unknown[]) => {
      stderr.push(args.join(' '));
    });
    jest.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
      stdout.push(String(chunk));
      return true;
    });
    jest.spyOn(process.stderr, 'write').mockImplementation((chunk: string | Uint8Array) => {
      stderr.push(String(chunk));
      return true;
    });
    spawn = jest.fn<SpawnSyncFn>(() => ({
      pid: 1,
      output: [],
      stdout: Buffer.alloc(0),
      stderr: Buffer.alloc(0),
      status: 3,
      signal: null,
    }));
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await tmp.cleanup();
  });

  async function context(env: NodeJS.ProcessEnv = {}): Promise<CliContext> {
    const binDir = join(tmp.dir, 'bin');
    await mkdir(binDir, { recursive: true });
    await writeFile(join(binDir, 'systemctl'), '#!/bin/sh\n', { mode: 0o755 });
    return {
      paths,
      env: { QVS_CLI_TEST: '1', ...env },
      setup: { ownership: false },
      service: { pathEnv: binDir, spawn },
      signals: [],
    };
  }

  async function run(argv: string[], env: NodeJS.ProcessEnv = {}): Promise<number> {
    const { exitCode } = await runCli(argv, await context(env));
    return exitCode;
  }

  const errors = () => stderr.join('\n');

  describe('usage', () => {
    it('prints help and exits 0', async () => {
      expect(await run(['--help'])).toBe(0);
      expect(stdout.join('')).toContain('Usage: qvs');
    });

    it('prints the package version', async () => {
      expect(await run(['-v'])).toBe(0);
      expect(stdout.join('')).toBe('1.0.0\n');
    });

    it('exits 1 on an unknown command', async () => {
      expect(await run(['frobnicate'])).toBe(1);
      expect(errors()).toContain("unknown command 'frobnicate'");
    });
  });

  describe('setup', () => {
    it('requires a task name', async () => {
      expect(await run(['setup'])).toBe(1);
      expect(errors()).toContain('Missing required argument: task');
    });

    it('rejects an unknown task', async () => {
      expect(await run(['setup', 'bogus'])).toBe(1);
      expect(errors()).toContain('No such setup task: bogus');
    });

    it('reports a missing input', async () => {
      expect(await run(['setup', 'tls'])).toBe(1);
      expect(errors()).toContain(
        'Insufficient arguments for setup task tls: set QVS_TLS_HOST_NAMES or pass --host-names',
      );
    });

    it('takes inputs from flags and the environment, case-insensitively by task', async () => {
      const code = await run(['setup', 'SERVER', '--port', '12500'], { AAS_API_URL: 'https://aas.test.internal' });

      expect(code).toBe(0);
      const config = await loadConfiguration(paths);
      expect(config.server.port).toBe(12500);
      expect(config.authServiceUrl).toBe('https://aas.test.internal');
    });

    it('names the failing task', async () => {
      const env = {
        CMS_BASE_URL: 'https://localhost:1/cms/v1',
        CMS_TLS_CERT_SHA384: 'ab'.repeat(48),
      };
      expect(await run(['setup', 'download_ca_cert'], env)).toBe(1);
      expect(errors()).toContain('Setup task download_ca_cert failed: CMS request to https://localhost:1/cms/v1/ca-certificates failed');
    });
  });

  describe('service control', () => {
    it.each(['start', 'stop', 'status'])('forwards %s to systemctl', async (action) => {
      expect(await run([action])).toBe(3);
      expect(stdout).toContain(`Forwarding to "systemctl ${action} qvs"`);
      expect(spawn).toHaveBeenCalledWith(join(tmp.dir, 'bin', 'systemctl'), [action, 'qvs']);
    });

    it('uninstalls and exits 0', async () => {
      await mkdir(paths.homeDir, { recursive: true });
      expect(await run(['uninstall'])).toBe(0);
      expect(spawn.mock.calls.map(([, args]) => args[0])).toEqual(['disable', 'stop']);
    });
  });

  describe('tlscertsha384', () => {
    it('prints the digest of the configured certificate', async () => {
      const identity = await issueServerCertificate(await createTestCa());
      await mkdir(paths.configDir, { recursive: true });
      await writeFile(paths.defaultTlsCertFile, identity.certPem);
      const expected = createHash('sha384').update(new X509Certificate(identity.certPem).raw).digest('hex');

      expect(await run(['tlscertsha384'])).toBe(0);
      expect(stdout).toEqual([expected]);
    });

    it('fails without a certificate', async () => {
      expect(await run(['tlscertsha384'])).toBe(1);
    });
  });

  describe('list', () => {
    it('prints every file of the directory', async () => {
      const dir = join(tmp.dir, 'listing');
      await mkdir(dir);
      await writeFile(join(dir, 'one.pem'), 'alpha\n');

      expect(await run(['list', dir])).toBe(0);
      expect(stdout.join('')).toBe('File : 0\nalpha\n');
    });

    it('needs a directory', async () => {
      expect(await run(['list'])).toBe(1);
    });
  });

  describe('run', () => {
    it('fails before binding without a TLS identity', async () => {
      expect(await run(['run'])).toBe(1);
      expect(errors()).toContain('Could not read TLS identity file');
    });

    it('exits 1 when the port is taken', async () => {
      const blocker: Server = createServer();
      await new Promise<void>((resolve) => blocker.listen(0, resolve));
      const address = blocker.address();
      const port = address !== null && typeof address === 'object' ? address.port : 0;

      const identity = await issueServerCertificate(await createTestCa());
      const defaults = defaultConfiguration(paths);
      await saveConfiguration(paths, {
        ...defaults,
        server: { ...defaults.server, port },
        logEnableStdout: false,
      });
      await writeFile(paths.defaultTlsKeyFile, identity.keyPem);
      await writeFile(paths.defaultTlsCertFile, identity.certPem);

      try {
        expect(await run(['run'])).toBe(1);
        expect(await readFile(paths.logFile, 'utf-8')).toContain('listener error');
      } finally {
        await new Promise<void>((resolve) => blocker.close(() => resolve()));
      }
    });
  });
});
