import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdir, readFile, stat, writeFile } from 'fs/promises';
import { join } from 'path';
import {
  defaultConfiguration,
  loadConfiguration,
  mergeConfiguration,
  saveConfiguration,
} from '../../src/lib/config/configuration.js';
import { resolveServicePaths, type ServicePaths } from '../../src/lib/config/paths.js';
import { createTempDir } from '../helpers/pki.js';

describe('resolveServicePaths', () => {
  it('derives the store and file locations from the configuration directory', () => {
    const paths = resolveServicePaths({ configDir: '/srv/qvs/config' }, {});
    expect(paths.configFile).toBe('/srv/qvs/config/config.yml');
    expect(paths.trustedCaDir).toBe('/srv/qvs/config/certs/trustedca');
    expect(paths.trustedJwtDir).toBe('/srv/qvs/config/certs/trustedjwt');
    expect(paths.defaultTlsKeyFile).toBe('/srv/qvs/config/tls.key');
    expect(paths.defaultTlsCertFile).toBe('/srv/qvs/config/tls-cert.pem');
  });

  it('reads the directories from the environment when not overridden', () => {
    const env = { QVS_CONFIG_DIR: '/env/config', QVS_LOG_DIR: '/env/log', QVS_HOME: '/env/home' };
    const paths = resolveServicePaths({ logDir: '/explicit/log' }, env);
    expect(paths.configDir).toBe('/env/config');
    expect(paths.logDir).toBe('/explicit/log');
    expect(paths.homeDir).toBe('/env/home');
  });
});

describe('configuration', () => {
  let tmp: { dir: string; cleanup(): Promise<void> };
  let paths: ServicePaths;

  beforeEach(async () => {
    tmp = await createTempDir();
    paths = resolveServicePaths({ configDir: join(tmp.dir, 'config'), logDir: tmp.dir, homeDir: tmp.dir }, {});
  });

  afterEach(async () => {
    await tmp.cleanup();
  });

  it('falls back to the defaults without a configuration file', async () => {
    const config = await loadConfiguration(paths);
    expect(config).toEqual(defaultConfiguration(paths));
    expect(config.server.port).toBe(12000);
    expect(config.jwtCacheKeyMins).toBe(60);
    expect(config.tls.keyFile).toBe(paths.defaultTlsKeyFile);
  });

  it('persists owner-only and reads back what was saved', async () => {
    const config = {
      ...defaultConfiguration(paths),
      authServiceUrl: 'https://aas.test.internal/aas/v1',
      regHost: { username: 'reg', password: 'test-secret' },
    };
    await saveConfiguration(paths, config);

    expect((await stat(paths.configFile)).mode & 0o777).toBe(0o600);
    expect(await loadConfiguration(paths)).toEqual(config);
  });

  it('reads hand-written YAML over the defaults', async () => {
    await mkdir(paths.configDir, { recursive: true });
    await writeFile(
      paths.configFile,
      ['server:', '  port: 12443', 'logLevel: debug', 'tls:', '  sanList: [qvs.local, 10.0.0.5]', ''].join('\n'),
    );

    const config = await loadConfiguration(paths);
    expect(config.server.port).toBe(12443);
    expect(config.server.readTimeoutMs).toBe(30_000);
    expect(config.logLevel).toBe('debug');
    expect(config.tls.sanList).toEqual(['qvs.local', '10.0.0.5']);
  });

  it('writes YAML a person can edit', async () => {
    await saveConfiguration(paths, defaultConfiguration(paths));
    const text = await readFile(paths.configFile, 'utf-8');
    expect(text).toContain('  port: 12000\n');
    expect(text).toContain('logLevel: info\n');
  });

  describe('mergeConfiguration', () => {
    it('ignores values of the wrong type', () => {
      const defaults = defaultConfiguration(paths);
      const merged = mergeConfiguration(defaults, {
        server: { port: 'twelve' },
        logLevel: 'verbose',
        includeSystemRoots: 'yes',
        tls: { sanList: ['a.test', 7] },
      });

      expect(merged.server.port).toBe(12000);
      expect(merged.logLevel).toBe('info');
      expect(merged.includeSystemRoots).toBe(false);
      expect(merged.tls.sanList).toEqual(['a.test']);
    });

    it('drops incomplete credentials', () => {
      const merged = mergeConfiguration(defaultConfiguration(paths), {
        admin: { username: 'admin' },
        regHost: { username: 'reg', password: '' },
      });
      expect(merged.admin).toBeUndefined();
      expect(merged.regHost).toBeUndefined();
    });

    it('returns the defaults for a document that is not a mapping', () => {
      const defaults = defaultConfiguration(paths);
      expect(mergeConfiguration(defaults, ['port', 1])).toBe(defaults);
      expect(mergeConfiguration(defaults, null)).toBe(defaults);
    });
  });
});
