import type { SetupTask } from '../types.js';
import { adminTask } from './admin.js';
import { downloadCaCertTask } from './download-ca-cert.js';
import { downloadCertTask } from './download-cert.js';
import { serverTask } from './server.js';
import { tlsTask } from './tls.js';

export { adminTask, downloadCaCertTask, downloadCertTask, serverTask, tlsTask };
export { DEFAULT_TLS_KEY_ALGORITHM, type DownloadCertTaskOptions } from './download-cert.js';
export { parsePort } from './server.js';

export function createDefaultTasks(): SetupTask[] {
  return [downloadCaCertTask(), downloadCertTask(), adminTask(), serverTask(), tlsTask()];
}
