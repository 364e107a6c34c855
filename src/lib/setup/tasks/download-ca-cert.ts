import { CmsClient } from '../../cms/cms-client.js';
import { normalizeDigest } from '../../transport/dispatchers.js';
import { debugSetup } from '../../utils/debug.js';
import type { SetupContext, SetupTask } from '../types.js';
import { CMS_BASE_URL, CMS_INPUTS, CMS_TLS_CERT_SHA384, validateCmsInputs } from './common.js';

/**
 * Fetch the CMS root CA bundle over the digest-pinned connection and store it in
 * the root CA trust store.
 */
export function downloadCaCertTask(): SetupTask {
  return {
    name: 'download_ca_cert',
    description: 'Download the CMS root CA certificates',
    inputs: CMS_INPUTS,

    validate(inputs) {
      validateCmsInputs('download_ca_cert', inputs);
    },

    async isSatisfied(ctx) {
      return !(await ctx.caStore.isEmpty());
    },

    async run(ctx: SetupContext) {
      const baseUrl = ctx.inputs.require(CMS_BASE_URL);
      const digest = normalizeDigest(ctx.inputs.require(CMS_TLS_CERT_SHA384));

      const cms = new CmsClient({ baseUrl, tlsCertDigest: digest, caStore: ctx.caStore });
      const pems = await cms.getRootCaCertificates();
      const { added, existing } = await ctx.caStore.addPemBundle(pems.join(''), baseUrl);
      debugSetup('root CA store %s added=%j existing=%j', ctx.caStore.dir, added, existing);

      ctx.config = { ...ctx.config, cmsBaseUrl: baseUrl, cmsTlsCertDigest: digest };
      await ctx.saveConfiguration();
    },
  };
}
