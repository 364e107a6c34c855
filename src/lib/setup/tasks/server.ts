import type { Configuration } from '../../config/configuration.js';
import { SetupValidationError } from '../../errors/errors.js';
import type { TaskInputs } from '../inputs.js';
import type { SetupTask } from '../types.js';
import { validateHttpsUrl } from './common.js';

const PORT = 'QVS_PORT';
const AAS_API_URL = 'AAS_API_URL';
const REG_HOST_USERNAME = 'QVS_REG_HOST_USERNAME';
const REG_HOST_PASSWORD = 'QVS_REG_HOST_PASSWORD';

export function parsePort(value: string): number | undefined {
  if (!/^\d+$/.test(value)) return undefined;
  const port = Number(value);
  return port >= 1 && port <= 65535 ? port : undefined;
}

/** The configuration with this task's inputs applied. */
function applyInputs(config: Configuration, inputs: TaskInputs): Configuration {
  const value = inputs.get(PORT);
  const port = value === undefined ? config.server.port : parsePort(value);
  if (port === undefined) throw SetupValidationError.invalid('server', PORT, 'expected 1..65535');

  const username = inputs.get(REG_HOST_USERNAME);
  const password = inputs.get(REG_HOST_PASSWORD);
  return {
    ...config,
    server: { ...config.server, port },
    authServiceUrl: inputs.get(AAS_API_URL) ?? config.authServiceUrl,
    regHost: username && password ? { username, password } : config.regHost,
  };
}

/** Persist the listener port and the outbound service settings. */
export function serverTask(): SetupTask {
  return {
    name: 'server',
    description: 'Configure the HTTPS listener',
    inputs: [
      { env: PORT, flag: 'port', required: false, description: 'Listener port' },
      { env: AAS_API_URL, flag: 'aas-api-url', required: false, description: 'Authorization service URL' },
      { env: REG_HOST_USERNAME, flag: 'reg-host-user', required: false, description: 'Registration host user' },
      {
        env: REG_HOST_PASSWORD,
        flag: 'reg-host-pass',
        required: false,
        description: 'Registration host password',
      },
    ],

    validate(inputs) {
      const port = inputs.get(PORT);
      if (port !== undefined && parsePort(port) === undefined) {
        throw SetupValidationError.invalid('server', PORT, `expected 1..65535, got ${port}`);
      }
      validateHttpsUrl('server', inputs, AAS_API_URL);
      if ((inputs.get(REG_HOST_USERNAME) === undefined) !== (inputs.get(REG_HOST_PASSWORD) === undefined)) {
        throw SetupValidationError.invalid(
          'server',
          REG_HOST_USERNAME,
          `${REG_HOST_USERNAME} and ${REG_HOST_PASSWORD} go together`,
        );
      }
    },

    async isSatisfied(ctx) {
      const next = applyInputs(ctx.config, ctx.inputs);
      return (
        next.server.port === ctx.config.server.port &&
        next.authServiceUrl === ctx.config.authServiceUrl &&
        next.regHost?.username === ctx.config.regHost?.username &&
        next.regHost?.password === ctx.config.regHost?.password
      );
    },

    async run(ctx) {
      ctx.config = applyInputs(ctx.config, ctx.inputs);
      await ctx.saveConfiguration();
    },
  };
}
