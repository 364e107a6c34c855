export { CmsClient, type CmsClientOptions } from './cms-client.js';
