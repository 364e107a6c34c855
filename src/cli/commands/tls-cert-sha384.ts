import { loadConfiguration } from '../../lib/config/configuration.js';
import { certificateFileSha384 } from '../../lib/crypto/certificates.js';
import { render } from '../logger.js';
import type { CliContext } from '../utils/context.js';

/** Print the SHA-384 digest of the configured TLS certificate. */
export async function handleTlsCertSha384Command(ctx: CliContext): Promise<string> {
  const config = await loadConfiguration(ctx.paths);
  const digest = await certificateFileSha384(config.tls.certFile);
  render.line(digest);
  return digest;
}
