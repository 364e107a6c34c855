import { mkdir } from 'fs/promises';
import { dirname } from 'path';
import { loadServiceIdentity } from '../../crypto/certificates.js';
import { ServiceIdentityError, SetupValidationError } from '../../errors/errors.js';
import { normalizeDigest } from '../../transport/dispatchers.js';
import { writeFileAtomic } from '../../utils/files.js';
import type { TaskInputs } from '../inputs.js';
import type { SetupTaskName, TaskInputSpec } from '../types.js';

export const CMS_BASE_URL = 'CMS_BASE_URL';
export const CMS_TLS_CERT_SHA384 = 'CMS_TLS_CERT_SHA384';

export const CMS_INPUTS: readonly TaskInputSpec[] = [
  { env: CMS_BASE_URL, flag: 'cms-base-url', required: true, description: 'CMS base URL' },
  {
    env: CMS_TLS_CERT_SHA384,
    flag: 'cms-tls-cert-sha384',
    required: true,
    description: 'SHA-384 digest of the CMS TLS certificate',
  },
];

const SHA384_HEX_LENGTH = 96;

export function validateCmsInputs(task: SetupTaskName, inputs: TaskInputs): void {
  validateHttpsUrl(task, inputs, CMS_BASE_URL);
  const digest = inputs.get(CMS_TLS_CERT_SHA384);
  if (digest !== undefined && normalizeDigest(digest).length !== SHA384_HEX_LENGTH) {
    throw SetupValidationError.invalid(task, CMS_TLS_CERT_SHA384, 'expected a hex SHA-384 digest');
  }
}

export function validateHttpsUrl(task: SetupTaskName, inputs: TaskInputs, env: string): void {
  const value = inputs.get(env);
  if (value === undefined) return;
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    throw SetupValidationError.invalid(task, env, `not a URL: ${value}`);
  }
  if (url.protocol !== 'https:') {
    throw SetupValidationError.invalid(task, env, 'only https URLs are supported');
  }
}

/** Write the TLS key (owner-only) and certificate, creating their directories. */
export async function writeTlsIdentity(
  keyFile: string,
  certFile: string,
  keyPem: string,
  certPem: string,
): Promise<void> {
  await mkdir(dirname(keyFile), { recursive: true });
  await mkdir(dirname(certFile), { recursive: true });
  await writeFileAtomic(keyFile, keyPem, 0o600);
  await writeFileAtomic(certFile, certPem, 0o644);
}

/** Whether the key and certificate files exist and belong together. */
export async function hasUsableIdentity(keyFile: string, certFile: string): Promise<boolean> {
  try {
    await loadServiceIdentity(keyFile, certFile);
    return true;
  } catch (err) {
    if (err instanceof ServiceIdentityError) return false;
    throw err;
  }
}
