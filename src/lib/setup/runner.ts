/**
 * Provisioning task runner
 *
 * Runs one named setup task, or the `all` pipeline. The inputs of every task of the
 * run are checked before the first one starts, so a missing input never leaves a
 * half-provisioned installation behind. Without `force` a task whose artifact
 * already exists is skipped. The first failure stops the run and is rethrown
 * unchanged, tagged with the task name (see {@link taskOf}).
 */

import { mkdir } from 'fs/promises';
import { loadConfiguration, saveConfiguration } from '../config/configuration.js';
import type { ServicePaths } from '../config/paths.js';
import { attachTask, UsageError } from '../errors/errors.js';
import { TrustStore } from '../trust/trust-store.js';
import { debugSetup } from '../utils/debug.js';
import { TaskInputs } from './inputs.js';
import { OwnershipTransfer } from './ownership.js';
import { createDefaultTasks } from './tasks/index.js';
import {
  isSetupTaskName,
  SETUP_ALL,
  SETUP_PIPELINE,
  type SetupContext,
  type SetupFlags,
  type SetupReport,
  type SetupTask,
  type SetupTaskName,
  type SetupTaskResult,
} from './types.js';

/** Tasks whose artifacts include the TLS key and certificate. */
const TLS_IDENTITY_TASKS: readonly SetupTaskName[] = ['download_cert', 'tls'];

export interface SetupRunOptions {
  flags?: SetupFlags;
  force?: boolean;
}

export interface SetupRunnerOptions {
  paths: ServicePaths;
  /** Replaces the built-in tasks of the same name */
  tasks?: SetupTask[];
  env?: NodeJS.ProcessEnv;
  /** `false` leaves ownership untouched (runs as a non-root user, tests) */
  ownership?: OwnershipTransfer | false;
  onTaskStart?: (task: SetupTask) => void;
  onTaskEnd?: (result: SetupTaskResult) => void;
}

export class SetupRunner {
  private readonly tasks = new Map<SetupTaskName, SetupTask>();
  private readonly env: NodeJS.ProcessEnv;
  private readonly ownership: OwnershipTransfer | false;

  constructor(private readonly opts: SetupRunnerOptions) {
    for (const task of [...createDefaultTasks(), ...(opts.tasks ?? [])]) {
      this.tasks.set(task.name, task);
    }
    this.env = opts.env ?? process.env;
    this.ownership = opts.ownership ?? new OwnershipTransfer();
  }

  /** Names of the tasks `target` runs, in order. */
  plan(target: string): SetupTaskName[] {
    if (target === SETUP_ALL) return [...SETUP_PIPELINE];
    if (isSetupTaskName(target)) return [target];
    throw UsageError.unknownTask(target);
  }

  task(name: SetupTaskName): SetupTask {
    const task = this.tasks.get(name);
    if (!task) throw UsageError.unknownTask(name);
    return task;
  }

  async run(target: string, runOpts: SetupRunOptions = {}): Promise<SetupReport> {
    const flags = runOpts.flags ?? {};
    const force = runOpts.force ?? false;

    const planned = this.plan(target).map((name) => {
      const task = this.task(name);
      const inputs = TaskInputs.resolve(name, task.inputs, flags, this.env);
      task.validate?.(inputs);
      return { task, inputs };
    });
    debugSetup('setup %s plan=%j force=%s', target, planned.map((p) => p.task.name), force);

    const { paths } = this.opts;
    const caStore = new TrustStore(paths.trustedCaDir);
    let config = await loadConfiguration(paths);
    const results: SetupTaskResult[] = [];

    for (const { task, inputs } of planned) {
      this.opts.onTaskStart?.(task);
      const ctx: SetupContext = {
        paths,
        config,
        inputs,
        caStore,
        saveConfiguration: () => saveConfiguration(paths, ctx.config),
      };

      let result: SetupTaskResult;
      try {
        if (!force && (await task.isSatisfied(ctx))) {
          debugSetup('task %s already satisfied, skipping', task.name);
          result = { task: task.name, status: 'skipped' };
        } else {
          await task.run(ctx);
          debugSetup('task %s completed', task.name);
          result = { task: task.name, status: 'completed' };
        }
      } catch (err) {
        debugSetup('task %s failed: %s', task.name, err instanceof Error ? err.message : String(err));
        attachTask(err, task.name);
        throw err;
      }
      config = ctx.config;
      results.push(result);
      this.opts.onTaskEnd?.(result);
    }

    if (this.ownership === false) return { results, ownershipTransferred: false };

    const files = results.some((r) => TLS_IDENTITY_TASKS.includes(r.task))
      ? [config.tls.keyFile, config.tls.certFile]
      : [];
    await mkdir(paths.configDir, { recursive: true });
    await this.ownership.transfer(paths.configDir, files);
    return { results, ownershipTransferred: true };
  }
}
