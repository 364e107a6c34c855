/**
 * Default configuration constants for QVS
 *
 * Centralized defaults for paths, the HTTPS listener, JWT signer caching and
 * provisioning. These values are used as fallbacks when no explicit configuration
 * is provided.
 */

export const SERVICE_NAME = 'qvs';
export const SERVICE_USER_NAME = 'qvs';
export const SERVICE_DISPLAY_NAME = 'Quote Verification Service';

// Filesystem layout
export const HOME_DIR = '/opt/qvs';
export const CONFIG_DIR = '/etc/qvs';
export const LOG_DIR = '/var/log/qvs';
export const RUN_DIR = '/run/qvs';
export const EXEC_LINK_PATH = '/usr/bin/qvs';
export const SYSTEMD_UNIT_PATH = '/etc/systemd/system/qvs.service';
export const CONFIG_FILE_NAME = 'config.yml';
export const LOG_FILE_NAME = 'qvs.log';
export const TRUSTED_CA_SUBDIR = 'certs/trustedca';
export const TRUSTED_JWT_SUBDIR = 'certs/trustedjwt';
export const TLS_KEY_FILE_NAME = 'tls.key';
export const TLS_CERT_FILE_NAME = 'tls-cert.pem';

// HTTPS listener
export const API_PATH_PREFIX = '/qvs/v1';
export const DEFAULT_PORT = 12000;
export const READ_TIMEOUT_MS = 30_000;
export const READ_HEADER_TIMEOUT_MS = 10_000;
export const WRITE_TIMEOUT_MS = 10_000;
export const IDLE_TIMEOUT_MS = 10_000;
export const MAX_HEADER_BYTES = 1 << 20; // 1 MiB
export const SHUTDOWN_TIMEOUT_MS = 5_000;
export const SHUTDOWN_IDLE_SWEEP_MS = 50;

// Admin credentials
export const ADMIN_PASSWORD_BCRYPT_COST = 10;

// JWT authorization
export const JWT_CACHE_KEY_MINS = 60;
export const JWT_CERTIFICATES_PATH = 'noauth/jwt-certificates';

// Provisioning
export const TLS_CERT_COMMON_NAME = 'QVS TLS Certificate';
export const TLS_CERT_TYPE = 'TLS';
export const TLS_KEY_MODULUS_LENGTH = 3072;
export const SELF_SIGNED_VALIDITY_DAYS = 365;
export const PEM_CONTENT_TYPE = 'application/x-pem-file';
