import { uninstallService, type UninstallResult } from '../../lib/service/uninstall.js';
import { render } from '../logger.js';
import type { CliContext } from '../utils/context.js';

export async function handleUninstallCommand(
  options: { purge?: boolean },
  ctx: CliContext,
): Promise<UninstallResult> {
  const result = await uninstallService(ctx.paths, {
    print: (line) => render.warn(line),
    ...ctx.service,
    purge: options.purge ?? false,
  });
  if (result.failed.length === 0) render.success('Quote Verification Service uninstalled');
  else render.warn(`Uninstalled with ${result.failed.length} path(s) left behind`);
  return result;
}
