/**
 * QVS library - core exports
 *
 * Provisioning, trust stores, token authorization and the HTTPS gateway.
 */

export * from './auth/index.js';
export * from './cms/index.js';
export * from './config/index.js';
export * from './crypto/index.js';
export * from './server/index.js';
export * from './service/index.js';
export * from './setup/index.js';
export * from './transport/index.js';
export * from './trust/index.js';

export {
  ServiceOperationError,
  UsageError,
  InsufficientArgumentsError,
  SetupValidationError,
  OwnershipError,
  TrustStoreError,
  CmsRequestError,
  PinnedCertificateMismatchError,
  JwtCertRefreshError,
  TokenAuthorizationError,
  ServiceIdentityError,
  ServiceControlError,
  isServiceOperationError,
  isTokenAuthorizationError,
  isUsageError,
  attachTask,
  taskOf,
  type ServiceOperationErrorType,
} from './errors/errors.js';
export { QVS_ERROR, type QvsErrorCode } from './errors/codes.js';

export * as defaults from './constants/defaults.js';
export { configureLogging, closeLogging, isLogLevel, type LogLevel } from './utils/debug.js';
