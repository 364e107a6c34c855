import { join } from 'path';
import {
  CONFIG_DIR,
  CONFIG_FILE_NAME,
  EXEC_LINK_PATH,
  HOME_DIR,
  LOG_DIR,
  LOG_FILE_NAME,
  RUN_DIR,
  SYSTEMD_UNIT_PATH,
  TLS_CERT_FILE_NAME,
  TLS_KEY_FILE_NAME,
  TRUSTED_CA_SUBDIR,
  TRUSTED_JWT_SUBDIR,
} from '../constants/defaults.js';

/**
 * Filesystem layout of an installed service. Every directory is owned by the
 * runtime user once provisioning has finished.
 */
export interface ServicePaths {
  homeDir: string;
  configDir: string;
  logDir: string;
  runDir: string;
  execLinkPath: string;
  systemdUnitPath: string;
  configFile: string;
  logFile: string;
  trustedCaDir: string;
  trustedJwtDir: string;
  defaultTlsKeyFile: string;
  defaultTlsCertFile: string;
}

export interface ServicePathOverrides {
  homeDir?: string;
  configDir?: string;
  logDir?: string;
  runDir?: string;
  execLinkPath?: string;
  systemdUnitPath?: string;
}

/**
 * Resolve the layout from explicit overrides, then `QVS_HOME`, `QVS_CONFIG_DIR`
 * and `QVS_LOG_DIR`, then the packaged defaults.
 */
export function resolveServicePaths(
  overrides: ServicePathOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
): ServicePaths {
  const homeDir = overrides.homeDir ?? env.QVS_HOME ?? HOME_DIR;
  const configDir = overrides.configDir ?? env.QVS_CONFIG_DIR ?? CONFIG_DIR;
  const logDir = overrides.logDir ?? env.QVS_LOG_DIR ?? LOG_DIR;

  return {
    homeDir,
    configDir,
    logDir,
    runDir: overrides.runDir ?? RUN_DIR,
    execLinkPath: overrides.execLinkPath ?? EXEC_LINK_PATH,
    systemdUnitPath: overrides.systemdUnitPath ?? SYSTEMD_UNIT_PATH,
    configFile: join(configDir, CONFIG_FILE_NAME),
    logFile: join(logDir, LOG_FILE_NAME),
    trustedCaDir: join(configDir, TRUSTED_CA_SUBDIR),
    trustedJwtDir: join(configDir, TRUSTED_JWT_SUBDIR),
    defaultTlsKeyFile: join(configDir, TLS_KEY_FILE_NAME),
    defaultTlsCertFile: join(configDir, TLS_CERT_FILE_NAME),
  };
}
