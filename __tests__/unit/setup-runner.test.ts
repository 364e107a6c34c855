import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals';
import { loadConfiguration } from '../../src/lib/config/configuration.js';
import { resolveServicePaths, type ServicePaths } from '../../src/lib/config/paths.js';
import {
  InsufficientArgumentsError,
  SetupValidationError,
  taskOf,
  UsageError,
} from '../../src/lib/errors/errors.js';
import { TaskInputs } from '../../src/lib/setup/inputs.js';
import { OwnershipTransfer, type ChownFn, type UserLookup } from '../../src/lib/setup/ownership.js';
import { SetupRunner } from '../../src/lib/setup/runner.js';
import type { SetupTask, SetupTaskName, TaskInputSpec } from '../../src/lib/setup/types.js';
import { fileExists } from '../../src/lib/utils/files.js';
import { createTempDir } from '../helpers/pki.js';

interface FakeTaskOptions {
  inputs?: TaskInputSpec[];
  satisfied?: boolean;
  error?: Error;
  validate?: SetupTask['validate'];
  run?: SetupTask['run'];
}

function fakeTask(name: SetupTaskName, log: string[], opts: FakeTaskOptions = {}): SetupTask {
  return {
    name,
    description: `fake ${name}`,
    inputs: opts.inputs ?? [],
    validate: opts.validate,
    isSatisfied: async () => opts.satisfied ?? false,
    run: async (ctx) => {
      log.push(name);
      if (opts.error) throw opts.error;
      await opts.run?.(ctx);
    },
  };
}

const PORT_INPUT: TaskInputSpec = { env: 'QVS_PORT', flag: 'port', required: true, description: 'port' };

describe('TaskInputs', () => {
  const specs: TaskInputSpec[] = [
    PORT_INPUT,
    { env: 'AAS_API_URL', flag: 'aas-api-url', required: false, description: 'aas' },
  ];

  it('prefers the flag over the environment', () => {
    const inputs = TaskInputs.resolve('server', specs, { port: '13000' }, { QVS_PORT: '12000' });
    expect(inputs.get('QVS_PORT')).toBe('13000');
  });

  it('falls back to the environment and trims values', () => {
    const inputs = TaskInputs.resolve('server', specs, {}, { QVS_PORT: ' 12000 ' });
    expect(inputs.get('QVS_PORT')).toBe('12000');
    expect(inputs.get('AAS_API_URL')).toBeUndefined();
  });

  it('treats empty values as absent', () => {
    expect(() => TaskInputs.resolve('server', specs, { port: '' }, { QVS_PORT: '  ' })).toThrow(
      'Insufficient arguments for setup task server: set QVS_PORT or pass --port',
    );
  });

  it('names the flag when an optional input is required later', () => {
    const inputs = TaskInputs.resolve('server', specs, {}, { QVS_PORT: '1' });
    expect(() => inputs.require('AAS_API_URL')).toThrow(InsufficientArgumentsError);
    expect(() => inputs.require('AAS_API_URL')).toThrow('pass --aas-api-url');
  });
});

describe('SetupRunner', () => {
  let tmp: { dir: string; cleanup(): Promise<void> };
  let paths: ServicePaths;
  let log: string[];

  beforeEach(async () => {
    tmp = await createTempDir();
    paths = resolveServicePaths({ homeDir: tmp.dir, configDir: `${tmp.dir}/config`, logDir: tmp.dir }, {});
    log = [];
  });

  afterEach(async () => {
    await tmp.cleanup();
  });

  function runner(tasks: SetupTask[], env: NodeJS.ProcessEnv = {}, ownership: OwnershipTransfer | false = false) {
    return new SetupRunner({ paths, tasks, env, ownership });
  }

  function pipelineTasks(overrides: Partial<Record<SetupTaskName, FakeTaskOptions>> = {}): SetupTask[] {
    return (['download_ca_cert', 'download_cert', 'server'] as const).map((name) =>
      fakeTask(name, log, overrides[name]),
    );
  }

  it('plans the pipeline for all and single tasks by name', () => {
    const r = runner([]);
    expect(r.plan('all')).toEqual(['download_ca_cert', 'download_cert', 'server']);
    expect(r.plan('tls')).toEqual(['tls']);
    expect(() => r.plan('everything')).toThrow(UsageError);
  });

  it('runs the pipeline in order', async () => {
    const report = await runner(pipelineTasks()).run('all');

    expect(log).toEqual(['download_ca_cert', 'download_cert', 'server']);
    expect(report).toEqual({
      results: [
        { task: 'download_ca_cert', status: 'completed' },
        { task: 'download_cert', status: 'completed' },
        { task: 'server', status: 'completed' },
      ],
      ownershipTransferred: false,
    });
  });

  it('checks the inputs of every task before running any', async () => {
    const tasks = pipelineTasks({ server: { inputs: [PORT_INPUT] } });

    const err = await runner(tasks).run('all').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(InsufficientArgumentsError);
    expect(err).toMatchObject({ context: { task: 'server', envName: 'QVS_PORT', flag: 'port' } });
    expect(log).toEqual([]);
    expect(await fileExists(paths.configDir)).toBe(false);
  });

  it('runs input validation before any task', async () => {
    const tasks = pipelineTasks({
      server: {
        inputs: [PORT_INPUT],
        validate: () => {
          throw SetupValidationError.invalid('server', 'port', 'out of range');
        },
      },
    });

    await expect(runner(tasks, { QVS_PORT: '70000' }).run('all')).rejects.toThrow(
      'Invalid port for setup task server: out of range',
    );
    expect(log).toEqual([]);
  });

  it('hands the resolved inputs to the task', async () => {
    let seen: string | undefined;
    const tasks = [
      fakeTask('server', log, {
        inputs: [PORT_INPUT],
        run: async (ctx) => {
          seen = ctx.inputs.require('QVS_PORT');
        },
      }),
    ];

    await runner(tasks, { QVS_PORT: '12000' }).run('server', { flags: { port: '12500' } });
    expect(seen).toBe('12500');
  });

  it('skips satisfied tasks unless forced', async () => {
    const tasks = pipelineTasks({ download_ca_cert: { satisfied: true } });

    const first = await runner(tasks).run('all');
    expect(first.results[0]).toEqual({ task: 'download_ca_cert', status: 'skipped' });
    expect(log).toEqual(['download_cert', 'server']);

    log.length = 0;
    const forced = await runner(tasks).run('all', { force: true });
    expect(forced.results.map((r) => r.status)).toEqual(['completed', 'completed', 'completed']);
    expect(log).toEqual(['download_ca_cert', 'download_cert', 'server']);
  });

  it('stops at the first failure and tags the error with the task', async () => {
    const cause = new Error('CMS unreachable');
    const tasks = pipelineTasks({ download_cert: { error: cause } });

    const err = await runner(tasks).run('all').catch((e: unknown) => e);
    expect(err).toBe(cause);
    expect(taskOf(err)).toBe('download_cert');
    expect(log).toEqual(['download_ca_cert', 'download_cert']);
  });

  it('carries configuration changes from one task to the next and persists them', async () => {
    let portSeenByServer: number | undefined;
    const tasks = pipelineTasks({
      download_cert: {
        run: async (ctx) => {
          ctx.config.server.port = 12345;
          await ctx.saveConfiguration();
        },
      },
      server: {
        run: async (ctx) => {
          portSeenByServer = ctx.config.server.port;
        },
      },
    });

    await runner(tasks).run('all');
    expect(portSeenByServer).toBe(12345);
    expect((await loadConfiguration(paths)).server.port).toBe(12345);
  });

  describe('ownership', () => {
    let lookup: jest.Mock<UserLookup>;
    let chownTree: jest.Mock<ChownFn>;
    let chownFile: jest.Mock<ChownFn>;
    let ownership: OwnershipTransfer;

    beforeEach(() => {
      lookup = jest.fn<UserLookup>(async () => ({ uid: 990, gid: 985 }));
      chownTree = jest.fn<ChownFn>(async () => undefined);
      chownFile = jest.fn<ChownFn>(async () => undefined);
      ownership = new OwnershipTransfer({ user: 'qvs', lookup, chownTree, chownFile });
    });

    it('hands the configuration directory to the runtime user', async () => {
      const report = await runner([fakeTask('server', log)], {}, ownership).run('server');

      expect(report.ownershipTransferred).toBe(true);
      expect(lookup).toHaveBeenCalledWith('qvs');
      expect(chownTree).toHaveBeenCalledWith(paths.configDir, 990, 985);
      expect(chownFile).not.toHaveBeenCalled();
    });

    it('also hands over the TLS key and certificate once they were produced', async () => {
      await runner([fakeTask('tls', log)], {}, ownership).run('tls');

      expect(chownFile.mock.calls).toEqual([
        [paths.defaultTlsKeyFile, 990, 985],
        [paths.defaultTlsCertFile, 990, 985],
      ]);
    });

    it('reports a failed chown', async () => {
      chownTree.mockRejectedValueOnce(new Error('EPERM'));
      await expect(runner([fakeTask('server', log)], {}, ownership).run('server')).rejects.toThrow(
        `Error while changing ownership of ${paths.configDir}`,
      );
    });
  });
});
