export {
  controlService,
  lookPath,
  type ServiceAction,
  type ServiceControlOptions,
  type SpawnSyncFn,
} from './service-control.js';
export { uninstallService, type UninstallOptions, type UninstallResult } from './uninstall.js';
export { formatDirListing, readDirFiles } from './dir-listing.js';
