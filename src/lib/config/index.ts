export {
  defaultConfiguration,
  loadConfiguration,
  mergeConfiguration,
  saveConfiguration,
  type AdminCredentials,
  type Configuration,
  type Credentials,
  type ServerRuntimeConfig,
  type TlsIdentityConfig,
} from './configuration.js';
export { resolveServicePaths, type ServicePathOverrides, type ServicePaths } from './paths.js';
