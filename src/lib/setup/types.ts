import type { Configuration } from '../config/configuration.js';
import type { ServicePaths } from '../config/paths.js';
import type { TrustStore } from '../trust/trust-store.js';
import type { TaskInputs } from './inputs.js';

export const SETUP_TASK_NAMES = ['download_ca_cert', 'download_cert', 'admin', 'server', 'tls'] as const;

export type SetupTaskName = (typeof SETUP_TASK_NAMES)[number];

/** Tasks run by `setup all`, in this order. */
export const SETUP_PIPELINE: readonly SetupTaskName[] = ['download_ca_cert', 'download_cert', 'server'];

export const SETUP_ALL = 'all';

export type SetupTarget = SetupTaskName | typeof SETUP_ALL;

export function isSetupTaskName(value: string): value is SetupTaskName {
  return SETUP_TASK_NAMES.some((name) => name === value);
}

/** One input of a task: an environment variable and the flag that can stand in for it. */
export interface TaskInputSpec {
  env: string;
  /** Flag name without the leading `--` */
  flag: string;
  required: boolean;
  description: string;
}

/** Flag values given on the command line, keyed by flag name. */
export type SetupFlags = Readonly<Record<string, string | undefined>>;

/** State shared by the tasks of one setup run. */
export interface SetupContext {
  paths: ServicePaths;
  /** Current configuration; tasks update it and call {@link SetupContext.saveConfiguration} */
  config: Configuration;
  inputs: TaskInputs;
  caStore: TrustStore;
  saveConfiguration(): Promise<void>;
}

export interface SetupTask {
  readonly name: SetupTaskName;
  readonly description: string;
  readonly inputs: readonly TaskInputSpec[];
  /** Check input values beyond presence. Runs before any task of the run starts. */
  validate?(inputs: TaskInputs): void;
  /** True when the task's artifact already exists and an unforced run can skip it. */
  isSatisfied(ctx: SetupContext): Promise<boolean>;
  run(ctx: SetupContext): Promise<void>;
}

export type SetupTaskStatus = 'completed' | 'skipped';

export interface SetupTaskResult {
  task: SetupTaskName;
  status: SetupTaskStatus;
}

export interface SetupReport {
  results: SetupTaskResult[];
  /** Whether ownership of the produced files was handed to the runtime user */
  ownershipTransferred: boolean;
}
