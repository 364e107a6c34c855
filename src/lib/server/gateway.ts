/**
 * HTTPS request gateway
 *
 * Binds the API router behind TLS once the service identity checks out, and owns
 * the shutdown sequence. Termination signals, a listener error and an explicit
 * {@link RunningGateway.shutdown} all abort one signal; whichever comes first
 * starts the graceful close.
 */

import { createServer, type Server } from 'https';
import type { AddressInfo } from 'net';
import express, { Router, type Express } from 'express';
import { createAuthMiddleware } from '../auth/middleware.js';
import type { TokenVerifier } from '../auth/token-verifier.js';
import type { Configuration } from '../config/configuration.js';
import { API_PATH_PREFIX, SHUTDOWN_TIMEOUT_MS } from '../constants/defaults.js';
import { loadServiceIdentity } from '../crypto/certificates.js';
import { debugServer } from '../utils/debug.js';
import { accessLog, notFound, recovery } from './recovery.js';
import { versionRoutes, type RouteRegistrar } from './routes.js';
import { closeGracefully, type CloseOutcome } from './shutdown.js';
import { createTlsServerOptions } from './tls-options.js';

export function createGatewayApp(
  config: Configuration,
  verifier: TokenVerifier,
  registrars: RouteRegistrar[] = [versionRoutes],
): Express {
  const app = express();
  app.disable('x-powered-by');
  app.set('strict routing', true);
  app.set('case sensitive routing', true);

  app.use(accessLog());

  const router = Router({ strict: true, caseSensitive: true });
  router.use(createAuthMiddleware(verifier));
  for (const register of registrars) {
    register(router, config);
  }
  app.use(API_PATH_PREFIX, router);

  app.use(notFound());
  app.use(recovery());
  return app;
}

export type ShutdownReason = 'signal' | 'listener-error' | 'requested';

export interface ShutdownReport {
  reason: ShutdownReason;
  /** The listener error, when that is what stopped the gateway */
  error?: Error;
  outcome?: CloseOutcome;
}

export interface GatewayOptions {
  config: Configuration;
  verifier: TokenVerifier;
  registrars?: RouteRegistrar[];
  /** Defaults to all interfaces */
  host?: string;
  /** Signals that stop the gateway. Defaults to SIGINT and SIGTERM; `[]` installs no handler. */
  signals?: NodeJS.Signals[];
  shutdownTimeoutMs?: number;
}

export interface RunningGateway {
  server: Server;
  signal: AbortSignal;
  /** Bound port; differs from the configured one when that was 0 */
  port(): number;
  shutdown(): void;
  /** Settles once the gateway has stopped. Never rejects. */
  done: Promise<ShutdownReport>;
}

class ShutdownRequest extends Error {
  constructor(readonly reason: ShutdownReason, readonly listenerError?: Error) {
    super(`gateway shutdown: ${reason}`);
  }
}

function waitForAbort(signal: AbortSignal): Promise<void> {
  if (signal.aborted) return Promise.resolve();
  return new Promise((resolve) => signal.addEventListener('abort', () => resolve(), { once: true }));
}

/**
 * Validate the TLS identity, bind the listener and serve until shut down.
 *
 * @throws ServiceIdentityError before binding when the key or certificate is
 * unusable
 */
export async function startGateway(opts: GatewayOptions): Promise<RunningGateway> {
  const { config } = opts;
  const identity = await loadServiceIdentity(config.tls.keyFile, config.tls.certFile);

  const app = createGatewayApp(config, opts.verifier, opts.registrars);
  const server = createServer(createTlsServerOptions(identity, config.server), app);
  server.keepAliveTimeout = config.server.idleTimeoutMs;
  server.setTimeout(config.server.writeTimeoutMs);

  const controller = new AbortController();
  const stop = (request: ShutdownRequest) => {
    if (!controller.signal.aborted) controller.abort(request);
  };

  server.on('error', (err) => {
    debugServer('listener error: %s', err.message);
    stop(new ShutdownRequest('listener-error', err));
  });

  const signals = opts.signals ?? ['SIGINT', 'SIGTERM'];
  const onSignal = (signal: NodeJS.Signals) => {
    debugServer('received %s', signal);
    stop(new ShutdownRequest('signal'));
  };
  for (const signal of signals) process.on(signal, onSignal);

  await new Promise<void>((resolve) => {
    server.once('listening', resolve);
    controller.signal.addEventListener('abort', () => resolve(), { once: true });
    server.listen(config.server.port, opts.host);
  });
  if (!controller.signal.aborted) {
    debugServer('listening on port %d', boundPort(server, config.server.port));
  }

  const done = (async (): Promise<ShutdownReport> => {
    await waitForAbort(controller.signal);
    for (const signal of signals) process.off(signal, onSignal);

    const request: unknown = controller.signal.reason;
    const report: ShutdownReport =
      request instanceof ShutdownRequest
        ? { reason: request.reason, ...(request.listenerError && { error: request.listenerError }) }
        : { reason: 'requested' };

    if (!server.listening) return report;
    try {
      report.outcome = await closeGracefully(server, opts.shutdownTimeoutMs ?? SHUTDOWN_TIMEOUT_MS);
      debugServer('gateway stopped (%s)', report.outcome);
    } catch (err) {
      debugServer('failed to shut down gracefully: %s', err instanceof Error ? err.message : String(err));
    }
    return report;
  })();

  return {
    server,
    signal: controller.signal,
    port: () => boundPort(server, config.server.port),
    shutdown: () => stop(new ShutdownRequest('requested')),
    done,
  };
}

function boundPort(server: Server, fallback: number): number {
  const address: AddressInfo | string | null = server.address();
  return address !== null && typeof address === 'object' ? address.port : fallback;
}
