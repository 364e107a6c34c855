import { CmsClient } from '../../cms/cms-client.js';
import { TLS_KEY_MODULUS_LENGTH } from '../../constants/defaults.js';
import { keyMatchesCertificate, parsePemCertificates } from '../../crypto/certificates.js';
import {
  createTlsCsr,
  exportPrivateKeyPem,
  generateTlsKeyPair,
  parseSanList,
  type TlsKeyAlgorithm,
} from '../../crypto/csr.js';
import { ServiceIdentityError, SetupValidationError } from '../../errors/errors.js';
import { normalizeDigest } from '../../transport/dispatchers.js';
import { debugSetup } from '../../utils/debug.js';
import type { TaskInputs } from '../inputs.js';
import type { SetupContext, SetupTask } from '../types.js';
import {
  CMS_BASE_URL,
  CMS_INPUTS,
  CMS_TLS_CERT_SHA384,
  hasUsableIdentity,
  validateCmsInputs,
  writeTlsIdentity,
} from './common.js';

const BEARER_TOKEN = 'BEARER_TOKEN';
const SAN_LIST = 'SAN_LIST';
const KEY_PATH = 'KEY_PATH';
const CERT_PATH = 'CERT_PATH';
const COMMON_NAME = 'QVS_TLS_CERT_CN';

export const DEFAULT_TLS_KEY_ALGORITHM: TlsKeyAlgorithm = {
  kind: 'rsa',
  modulusLength: TLS_KEY_MODULUS_LENGTH,
  hash: 'SHA-384',
};

export interface DownloadCertTaskOptions {
  keyAlgorithm?: TlsKeyAlgorithm;
}

function identityFiles(ctx: SetupContext): { keyFile: string; certFile: string } {
  return {
    keyFile: ctx.inputs.get(KEY_PATH) ?? ctx.config.tls.keyFile,
    certFile: ctx.inputs.get(CERT_PATH) ?? ctx.config.tls.certFile,
  };
}

/**
 * Generate the TLS key, have CMS sign a CSR for it and install the issued
 * certificate as the service identity.
 */
export function downloadCertTask(opts: DownloadCertTaskOptions = {}): SetupTask {
  const keyAlgorithm = opts.keyAlgorithm ?? DEFAULT_TLS_KEY_ALGORITHM;

  return {
    name: 'download_cert',
    description: 'Obtain the TLS certificate from CMS',
    inputs: [
      ...CMS_INPUTS,
      { env: BEARER_TOKEN, flag: 'token', required: true, description: 'CMS bearer token' },
      { env: SAN_LIST, flag: 'san-list', required: true, description: 'Comma separated SAN list' },
      { env: KEY_PATH, flag: 'key-path', required: false, description: 'TLS key file' },
      { env: CERT_PATH, flag: 'cert-path', required: false, description: 'TLS certificate file' },
      { env: COMMON_NAME, flag: 'common-name', required: false, description: 'TLS certificate CN' },
    ],

    validate(inputs: TaskInputs) {
      validateCmsInputs('download_cert', inputs);
      if (parseSanList(inputs.get(SAN_LIST) ?? '').length === 0) {
        throw SetupValidationError.invalid('download_cert', SAN_LIST, 'no host name given');
      }
    },

    async isSatisfied(ctx) {
      const { keyFile, certFile } = identityFiles(ctx);
      return hasUsableIdentity(keyFile, certFile);
    },

    async run(ctx: SetupContext) {
      const { keyFile, certFile } = identityFiles(ctx);
      const baseUrl = ctx.inputs.require(CMS_BASE_URL);
      const sanList = parseSanList(ctx.inputs.require(SAN_LIST));
      const commonName = ctx.inputs.get(COMMON_NAME) ?? ctx.config.tls.commonName;

      const keys = await generateTlsKeyPair(keyAlgorithm);
      const csr = await createTlsCsr(sanList, commonName, keyAlgorithm, keys);
      const cms = new CmsClient({
        baseUrl,
        tlsCertDigest: normalizeDigest(ctx.inputs.require(CMS_TLS_CERT_SHA384)),
        caStore: ctx.caStore,
      });
      const chainPem = await cms.signCertificate(csr.pem, ctx.inputs.require(BEARER_TOKEN));

      const keyPem = await exportPrivateKeyPem(keys.privateKey);
      const [leaf] = parsePemCertificates(chainPem, baseUrl);
      if (!leaf || !keyMatchesCertificate(keyPem, leaf)) {
        throw ServiceIdentityError.mismatch(keyFile, certFile);
      }

      await writeTlsIdentity(keyFile, certFile, keyPem, chainPem);
      debugSetup('TLS identity written key=%s cert=%s subject=%s', keyFile, certFile, leaf.subject);

      ctx.config = {
        ...ctx.config,
        cmsBaseUrl: baseUrl,
        tls: { ...ctx.config.tls, keyFile, certFile, commonName, sanList },
      };
      await ctx.saveConfiguration();
    },
  };
}
