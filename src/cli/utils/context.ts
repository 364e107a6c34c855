import { resolveServicePaths, type ServicePaths } from '../../lib/config/paths.js';
import type { RouteRegistrar } from '../../lib/server/routes.js';
import type { ServiceControlOptions } from '../../lib/service/service-control.js';
import type { SetupRunnerOptions } from '../../lib/setup/runner.js';

/** Everything a command reads from its surroundings. Tests replace parts of it. */
export interface CliContext {
  paths: ServicePaths;
  env: NodeJS.ProcessEnv;
  setup?: Pick<SetupRunnerOptions, 'tasks' | 'ownership'>;
  service?: ServiceControlOptions;
  registrars?: RouteRegistrar[];
  /** Signals that stop `run`; see GatewayOptions.signals */
  signals?: NodeJS.Signals[];
}

export function defaultCliContext(env: NodeJS.ProcessEnv = process.env): CliContext {
  return { paths: resolveServicePaths({}, env), env };
}
