import { controlService, type ServiceAction } from '../../lib/service/service-control.js';
import { render } from '../logger.js';
import type { CliContext } from '../utils/context.js';

/** Forward start/stop/status to systemd; resolves to systemctl's exit status. */
export function handleServiceCommand(action: ServiceAction, ctx: CliContext): Promise<number> {
  return controlService(action, { print: (line) => render.line(line), ...ctx.service });
}
