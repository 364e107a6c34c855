import { rm } from 'fs/promises';
import type { ServicePaths } from '../config/paths.js';
import { debugService } from '../utils/debug.js';
import { controlService, type ServiceControlOptions } from './service-control.js';

export interface UninstallResult {
  removed: string[];
  failed: { path: string; error: Error }[];
  /** Exit status of the final `systemctl stop`, if it could be run */
  stopStatus?: number;
}

export interface UninstallOptions extends ServiceControlOptions {
  purge?: boolean;
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * Remove the installed service. Each step is attempted even when an earlier one
 * failed; failures are collected in the result.
 */
export async function uninstallService(
  paths: ServicePaths,
  opts: UninstallOptions = {},
): Promise<UninstallResult> {
  const print = opts.print ?? ((line: string) => process.stdout.write(line + '\n'));
  const result: UninstallResult = { removed: [], failed: [] };

  try {
    await controlService('disable', opts);
  } catch (err) {
    print(`Could not disable the service: ${toError(err).message}`);
  }

  const targets = [paths.systemdUnitPath, paths.execLinkPath, paths.runDir, paths.logDir, paths.homeDir];
  if (opts.purge) targets.push(paths.configDir);

  for (const path of targets) {
    try {
      await rm(path, { recursive: true, force: true });
      debugService('removed %s', path);
      result.removed.push(path);
    } catch (err) {
      print(`Could not remove ${path}: ${toError(err).message}`);
      result.failed.push({ path, error: toError(err) });
    }
  }

  try {
    result.stopStatus = await controlService('stop', opts);
  } catch (err) {
    print(`Could not stop the service: ${toError(err).message}`);
  }
  return result;
}
