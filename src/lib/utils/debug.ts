/**
 * Debug logging utilities for QVS
 *
 * Namespaced loggers built on the `debug` package, enabled with the DEBUG
 * environment variable:
 *
 * DEBUG=qvs:*      - All debug output
 * DEBUG=qvs:setup  - Only provisioning
 * DEBUG=qvs:auth   - Only token authorization and JWT certificate refresh
 * DEBUG=qvs:http   - Only outbound HTTP and the access log
 *
 * The `run` command enables namespaces from the configured log level and tees the
 * output into the service log file (see {@link configureLogging}).
 */

import { createWriteStream, mkdirSync, type WriteStream } from 'fs';
import { dirname } from 'path';
import { format } from 'util';
import debug from 'debug';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

const createDebugger = (namespace: string) => debug(`qvs:${namespace}`);

export const debugSetup = createDebugger('setup');
export const debugHttp = createDebugger('http');
export const debugAuth = createDebugger('auth');
export const debugTrust = createDebugger('trust');
export const debugCms = createDebugger('cms');
export const debugServer = createDebugger('server');
export const debugService = createDebugger('service');

/** Namespaces switched on for each configured log level. */
const LEVEL_NAMESPACES: Record<LogLevel, string> = {
  error: 'qvs:server,qvs:service',
  warn: 'qvs:server,qvs:service,qvs:setup',
  info: 'qvs:server,qvs:service,qvs:setup,qvs:auth,qvs:trust,qvs:cms',
  debug: 'qvs:*',
};

export function isLogLevel(value: unknown): value is LogLevel {
  return value === 'error' || value === 'warn' || value === 'info' || value === 'debug';
}

let logStream: WriteStream | undefined;

/**
 * Enable the namespaces for `level` (unless DEBUG already selects some) and, when
 * `logFile` is given, append every line to it as well as to stderr.
 */
export function configureLogging(opts: { level: LogLevel; logFile?: string; stdout?: boolean }): void {
  debug.enable(process.env.DEBUG || LEVEL_NAMESPACES[opts.level]);

  if (opts.logFile) {
    mkdirSync(dirname(opts.logFile), { recursive: true });
    logStream?.end();
    logStream = createWriteStream(opts.logFile, { flags: 'a', mode: 0o640 });
  }
  const file = logStream;
  const toStdout = opts.stdout ?? true;

  debug.log = (...args: unknown[]) => {
    const line = format(...args) + '\n';
    if (toStdout) process.stderr.write(line);
    file?.write(line);
  };
}

/** Close the log file opened by {@link configureLogging}. */
export function closeLogging(): Promise<void> {
  const stream = logStream;
  logStream = undefined;
  if (!stream) return Promise.resolve();
  return new Promise((resolve) => stream.end(resolve));
}
