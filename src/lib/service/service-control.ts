import { spawnSync, type SpawnSyncReturns } from 'child_process';
import { constants } from 'fs';
import { access } from 'fs/promises';
import { delimiter, join } from 'path';
import { SERVICE_NAME } from '../constants/defaults.js';
import { ServiceControlError } from '../errors/errors.js';
import { debugService } from '../utils/debug.js';

export type ServiceAction = 'start' | 'stop' | 'status' | 'disable';

/** First executable named `name` on `pathEnv`, like a shell would find it. */
export async function lookPath(name: string, pathEnv = process.env.PATH ?? ''): Promise<string | undefined> {
  for (const dir of pathEnv.split(delimiter)) {
    if (!dir) continue;
    const candidate = join(dir, name);
    try {
      await access(candidate, constants.X_OK);
      return candidate;
    } catch {
      continue;
    }
  }
  return undefined;
}

export type SpawnSyncFn = (command: string, args: string[]) => SpawnSyncReturns<Buffer>;

export interface ServiceControlOptions {
  service?: string;
  pathEnv?: string;
  /** Console line writer */
  print?: (line: string) => void;
  spawn?: SpawnSyncFn;
}

const inheritStdio: SpawnSyncFn = (command, args) => spawnSync(command, args, { stdio: 'inherit' });

/**
 * Forward `action` to `systemctl <action> <service>` with the terminal attached.
 *
 * @returns systemctl's exit status, to be used as the process exit code
 * @throws ServiceControlError when systemctl is not on PATH or cannot be started
 */
export async function controlService(
  action: ServiceAction,
  opts: ServiceControlOptions = {},
): Promise<number> {
  const service = opts.service ?? SERVICE_NAME;
  const print = opts.print ?? ((line: string) => process.stdout.write(line + '\n'));

  print(`Forwarding to "systemctl ${action} ${service}"`);
  const systemctl = await lookPath('systemctl', opts.pathEnv);
  if (!systemctl) throw ServiceControlError.notFound(action);

  debugService('running %s %s %s', systemctl, action, service);
  const result = (opts.spawn ?? inheritStdio)(systemctl, [action, service]);
  if (result.error) throw ServiceControlError.spawnFailed(action, result.error);
  return result.status ?? 1;
}
