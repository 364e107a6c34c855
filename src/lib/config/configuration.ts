/**
 * Service configuration
 *
 * A single {@link Configuration} value is loaded once at startup and handed to each
 * component. It is persisted as YAML in `<configDir>/config.yml`; unknown keys are
 * ignored and missing ones fall back to {@link defaultConfiguration}.
 */

import { mkdir, readFile } from 'fs/promises';
import { dirname } from 'path';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import {
  DEFAULT_PORT,
  IDLE_TIMEOUT_MS,
  JWT_CACHE_KEY_MINS,
  MAX_HEADER_BYTES,
  READ_HEADER_TIMEOUT_MS,
  READ_TIMEOUT_MS,
  TLS_CERT_COMMON_NAME,
  WRITE_TIMEOUT_MS,
} from '../constants/defaults.js';
import { isLogLevel, type LogLevel } from '../utils/debug.js';
import { isNotFound, writeFileAtomic } from '../utils/files.js';
import type { ServicePaths } from './paths.js';

/** Listener settings; fixed for the lifetime of a running gateway. */
export interface ServerRuntimeConfig {
  port: number;
  readTimeoutMs: number;
  readHeaderTimeoutMs: number;
  writeTimeoutMs: number;
  idleTimeoutMs: number;
  maxHeaderBytes: number;
}

export interface TlsIdentityConfig {
  keyFile: string;
  certFile: string;
  commonName: string;
  sanList: string[];
}

export interface Credentials {
  username: string;
  password: string;
}

export interface AdminCredentials {
  username: string;
  /** bcrypt hash, `$2a$<cost>$...` */
  passwordHash: string;
}

export interface Configuration {
  server: ServerRuntimeConfig;
  tls: TlsIdentityConfig;
  logLevel: LogLevel;
  logEnableStdout: boolean;
  cmsBaseUrl?: string;
  cmsTlsCertDigest?: string;
  /** Base URL of the authorization service serving `noauth/jwt-certificates` */
  authServiceUrl?: string;
  /** Minutes a loaded set of JWT signer keys is reused before the store is re-read */
  jwtCacheKeyMins: number;
  /** Union Node's bundled roots with the root CA store for outbound AAS calls */
  includeSystemRoots: boolean;
  admin?: AdminCredentials;
  regHost?: Credentials;
}

export function defaultConfiguration(paths: ServicePaths): Configuration {
  return {
    server: {
      port: DEFAULT_PORT,
      readTimeoutMs: READ_TIMEOUT_MS,
      readHeaderTimeoutMs: READ_HEADER_TIMEOUT_MS,
      writeTimeoutMs: WRITE_TIMEOUT_MS,
      idleTimeoutMs: IDLE_TIMEOUT_MS,
      maxHeaderBytes: MAX_HEADER_BYTES,
    },
    tls: {
      keyFile: paths.defaultTlsKeyFile,
      certFile: paths.defaultTlsCertFile,
      commonName: TLS_CERT_COMMON_NAME,
      sanList: [],
    },
    logLevel: 'info',
    logEnableStdout: true,
    jwtCacheKeyMins: JWT_CACHE_KEY_MINS,
    includeSystemRoots: false,
  };
}

type Raw = Record<string, unknown>;

function isRecord(value: unknown): value is Raw {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function str(raw: Raw, key: string): string | undefined {
  const v = raw[key];
  return typeof v === 'string' && v.length > 0 ? v : undefined;
}

function num(raw: Raw, key: string, fallback: number): number {
  const v = raw[key];
  return typeof v === 'number' && Number.isFinite(v) ? v : fallback;
}

function bool(raw: Raw, key: string, fallback: boolean): boolean {
  const v = raw[key];
  return typeof v === 'boolean' ? v : fallback;
}

function section(raw: Raw, key: string): Raw {
  const v = raw[key];
  return isRecord(v) ? v : {};
}

/**
 * Overlay a parsed YAML document on the defaults. Values of the wrong type are
 * ignored rather than trusted.
 */
export function mergeConfiguration(defaults: Configuration, raw: unknown): Configuration {
  if (!isRecord(raw)) return defaults;

  const server = section(raw, 'server');
  const tls = section(raw, 'tls');
  const admin = section(raw, 'admin');
  const regHost = section(raw, 'regHost');
  const sanList = tls.sanList;
  const logLevel = raw.logLevel;

  const adminUser = str(admin, 'username');
  const adminHash = str(admin, 'passwordHash');
  const regUser = str(regHost, 'username');
  const regPass = str(regHost, 'password');

  return {
    server: {
      port: num(server, 'port', defaults.server.port),
      readTimeoutMs: num(server, 'readTimeoutMs', defaults.server.readTimeoutMs),
      readHeaderTimeoutMs: num(server, 'readHeaderTimeoutMs', defaults.server.readHeaderTimeoutMs),
      writeTimeoutMs: num(server, 'writeTimeoutMs', defaults.server.writeTimeoutMs),
      idleTimeoutMs: num(server, 'idleTimeoutMs', defaults.server.idleTimeoutMs),
      maxHeaderBytes: num(server, 'maxHeaderBytes', defaults.server.maxHeaderBytes),
    },
    tls: {
      keyFile: str(tls, 'keyFile') ?? defaults.tls.keyFile,
      certFile: str(tls, 'certFile') ?? defaults.tls.certFile,
      commonName: str(tls, 'commonName') ?? defaults.tls.commonName,
      sanList: Array.isArray(sanList)
        ? sanList.filter((s): s is string => typeof s === 'string')
        : defaults.tls.sanList,
    },
    logLevel: isLogLevel(logLevel) ? logLevel : defaults.logLevel,
    logEnableStdout: bool(raw, 'logEnableStdout', defaults.logEnableStdout),
    cmsBaseUrl: str(raw, 'cmsBaseUrl') ?? defaults.cmsBaseUrl,
    cmsTlsCertDigest: str(raw, 'cmsTlsCertDigest') ?? defaults.cmsTlsCertDigest,
    authServiceUrl: str(raw, 'authServiceUrl') ?? defaults.authServiceUrl,
    jwtCacheKeyMins: num(raw, 'jwtCacheKeyMins', defaults.jwtCacheKeyMins),
    includeSystemRoots: bool(raw, 'includeSystemRoots', defaults.includeSystemRoots),
    ...(adminUser !== undefined && adminHash !== undefined
      ? { admin: { username: adminUser, passwordHash: adminHash } }
      : {}),
    ...(regUser !== undefined && regPass !== undefined
      ? { regHost: { username: regUser, password: regPass } }
      : {}),
  };
}

/**
 * Read `config.yml`; a missing file yields the defaults.
 */
export async function loadConfiguration(paths: ServicePaths): Promise<Configuration> {
  const defaults = defaultConfiguration(paths);
  let text: string;
  try {
    text = await readFile(paths.configFile, 'utf-8');
  } catch (err) {
    if (isNotFound(err)) return defaults;
    throw err;
  }
  return mergeConfiguration(defaults, parseYaml(text));
}

/**
 * Persist the configuration atomically. The file holds credentials, so it is
 * readable by its owner only.
 */
export async function saveConfiguration(paths: ServicePaths, config: Configuration): Promise<void> {
  await mkdir(dirname(paths.configFile), { recursive: true });
  await writeFileAtomic(paths.configFile, stringifyYaml(config, { indent: 2 }), 0o600);
}
