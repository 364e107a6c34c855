import { hashPassword, verifyPassword } from '../../crypto/password.js';
import type { SetupTask } from '../types.js';

const ADMIN_USERNAME = 'QVS_ADMIN_USERNAME';
const ADMIN_PASSWORD = 'QVS_ADMIN_PASSWORD';

/** Store the administrator credentials, the password as a bcrypt hash. */
export function adminTask(): SetupTask {
  return {
    name: 'admin',
    description: 'Set the administrator credentials',
    inputs: [
      { env: ADMIN_USERNAME, flag: 'user', required: true, description: 'Administrator user name' },
      { env: ADMIN_PASSWORD, flag: 'pass', required: true, description: 'Administrator password' },
    ],

    async isSatisfied(ctx) {
      const admin = ctx.config.admin;
      if (!admin || admin.username !== ctx.inputs.require(ADMIN_USERNAME)) return false;
      return verifyPassword(ctx.inputs.require(ADMIN_PASSWORD), admin.passwordHash);
    },

    async run(ctx) {
      ctx.config = {
        ...ctx.config,
        admin: {
          username: ctx.inputs.require(ADMIN_USERNAME),
          passwordHash: await hashPassword(ctx.inputs.require(ADMIN_PASSWORD)),
        },
      };
      await ctx.saveConfiguration();
    },
  };
}
