import { loadServiceIdentity } from '../../crypto/certificates.js';
import { parseSanList } from '../../crypto/csr.js';
import { createSelfSignedIdentity } from '../../crypto/self-signed.js';
import { SetupValidationError } from '../../errors/errors.js';
import { debugSetup } from '../../utils/debug.js';
import type { SetupTask } from '../types.js';
import { hasUsableIdentity, writeTlsIdentity } from './common.js';

const HOST_NAMES = 'QVS_TLS_HOST_NAMES';
const KEY_SOURCE = 'QVS_TLS_KEY_SOURCE';
const CERT_SOURCE = 'QVS_TLS_CERT_SOURCE';

/**
 * Install the TLS identity: a provided key and certificate when given,
 * otherwise a self-signed one for the host names.
 */
export function tlsTask(): SetupTask {
  return {
    name: 'tls',
    description: 'Install the TLS key and certificate',
    inputs: [
      { env: HOST_NAMES, flag: 'host-names', required: true, description: 'Comma separated host names' },
      { env: KEY_SOURCE, flag: 'key-source', required: false, description: 'Existing TLS key to install' },
      {
        env: CERT_SOURCE,
        flag: 'cert-source',
        required: false,
        description: 'Existing TLS certificate to install',
      },
    ],

    validate(inputs) {
      if (parseSanList(inputs.require(HOST_NAMES)).length === 0) {
        throw SetupValidationError.invalid('tls', HOST_NAMES, 'no host name given');
      }
      if ((inputs.get(KEY_SOURCE) === undefined) !== (inputs.get(CERT_SOURCE) === undefined)) {
        throw SetupValidationError.invalid('tls', KEY_SOURCE, `${KEY_SOURCE} and ${CERT_SOURCE} go together`);
      }
    },

    async isSatisfied(ctx) {
      return hasUsableIdentity(ctx.config.tls.keyFile, ctx.config.tls.certFile);
    },

    async run(ctx) {
      const hostNames = parseSanList(ctx.inputs.require(HOST_NAMES));
      const { keyFile, certFile } = ctx.config.tls;
      const keySource = ctx.inputs.get(KEY_SOURCE);
      const certSource = ctx.inputs.get(CERT_SOURCE);

      if (keySource !== undefined && certSource !== undefined) {
        const provided = await loadServiceIdentity(keySource, certSource);
        await writeTlsIdentity(keyFile, certFile, provided.keyPem, provided.certPem);
        debugSetup('installed TLS identity from %s and %s', keySource, certSource);
      } else {
        const identity = await createSelfSignedIdentity(hostNames);
        await writeTlsIdentity(keyFile, certFile, identity.keyPem, identity.certPem);
        debugSetup('self-signed TLS identity written for %j', hostNames);
      }

      ctx.config = { ...ctx.config, tls: { ...ctx.config.tls, sanList: hostNames } };
      await ctx.saveConfiguration();
    },
  };
}
