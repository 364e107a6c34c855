import { JwtCertRefresher } from '../../lib/auth/jwt-cert-refresher.js';
import { TokenVerifier } from '../../lib/auth/token-verifier.js';
import { loadConfiguration } from '../../lib/config/configuration.js';
import { startGateway, type ShutdownReport } from '../../lib/server/gateway.js';
import { TrustStore } from '../../lib/trust/trust-store.js';
import { closeLogging, configureLogging, debugServer } from '../../lib/utils/debug.js';
import type { CliContext } from '../utils/context.js';

/**
 * Serve the API in the foreground until a termination signal or a listener error.
 */
export async function handleRunCommand(ctx: CliContext): Promise<ShutdownReport> {
  const config = await loadConfiguration(ctx.paths);
  configureLogging({ level: config.logLevel, logFile: ctx.paths.logFile, stdout: config.logEnableStdout });

  try {
    const caStore = new TrustStore(ctx.paths.trustedCaDir);
    const jwtStore = new TrustStore(ctx.paths.trustedJwtDir);
    const refresher = config.authServiceUrl
      ? new JwtCertRefresher({
          authServiceUrl: config.authServiceUrl,
          caStore,
          jwtStore,
          includeSystemRoots: config.includeSystemRoots,
        })
      : undefined;
    if (!refresher) debugServer('no authorization service configured, JWT certificates are not refreshed');

    const verifier = new TokenVerifier({
      jwtStore,
      caStore,
      cacheKeyMins: config.jwtCacheKeyMins,
      ...(refresher && { refresh: () => refresher.refresh() }),
    });

    const gateway = await startGateway({
      config,
      verifier,
      ...(ctx.registrars && { registrars: ctx.registrars }),
      ...(ctx.signals && { signals: ctx.signals }),
    });
    return await gateway.done;
  } finally {
    await closeLogging();
  }
}
