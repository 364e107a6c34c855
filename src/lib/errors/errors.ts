/**
 * QVS operation errors
 *
 * Typed representation of the failure states of provisioning, trust store access,
 * outbound CMS/AAS calls, token authorization and service control. Each class carries
 * a stable `code`, a coarse `type` and structured `context` so that the command layer
 * can decide console messaging and exit codes without parsing messages.
 */

import { QVS_ERROR, type QvsErrorCode } from './codes.js';

/**
 * Base class for all QVS operation errors
 */
export abstract class ServiceOperationError extends Error {
  abstract readonly code: QvsErrorCode;
  abstract readonly type: string;

  constructor(
    message: string,
    public readonly context?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = this.constructor.name;

    // Support proper stack traces
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Bad command line: unknown command, unknown setup task, missing positional argument
 */
export class UsageError extends ServiceOperationError {
  readonly code = QVS_ERROR.usage;
  readonly type = 'usage';

  static unknownCommand(command: string): UsageError {
    return new UsageError(`Unrecognized command: ${command}`, { command });
  }

  static unknownTask(task: string): UsageError {
    return new UsageError(`No such setup task: ${task}`, { task });
  }

  static missingArgument(argument: string): UsageError {
    return new UsageError(`Missing required argument: ${argument}`, { argument });
  }
}

/**
 * A setup task is missing a required input (neither the environment variable nor
 * the equivalent flag was supplied)
 */
export class InsufficientArgumentsError extends ServiceOperationError {
  readonly code = QVS_ERROR.insufficientArguments;
  readonly type = 'setup';

  static missing(task: string, envName: string, flag: string): InsufficientArgumentsError {
    return new InsufficientArgumentsError(
      `Insufficient arguments for setup task ${task}: set ${envName} or pass --${flag}`,
      { task, envName, flag },
    );
  }
}

/**
 * A setup input is present but unusable (bad port, malformed digest...)
 */
export class SetupValidationError extends ServiceOperationError {
  readonly code = QVS_ERROR.setupValidation;
  readonly type = 'setup';

  static invalid(task: string, input: string, reason: string): SetupValidationError {
    return new SetupValidationError(`Invalid ${input} for setup task ${task}: ${reason}`, {
      task,
      input,
      reason,
    });
  }
}

/**
 * Ownership transfer to the runtime user failed
 */
export class OwnershipError extends ServiceOperationError {
  readonly code = QVS_ERROR.ownership;
  readonly type = 'setup';

  static userNotFound(user: string, cause?: unknown): OwnershipError {
    return new OwnershipError(`Could not find user '${user}'`, { user }, { cause });
  }

  static chownFailed(path: string, cause: unknown): OwnershipError {
    return new OwnershipError(`Error while changing ownership of ${path}`, { path }, { cause });
  }
}

/**
 * Trust store directory could not be read or written
 */
export class TrustStoreError extends ServiceOperationError {
  readonly code = QVS_ERROR.trustStore;
  readonly type = 'trust';

  static noCertificates(source: string): TrustStoreError {
    return new TrustStoreError(`No PEM certificate found in ${source}`, { source });
  }

  static conflictingFile(path: string): TrustStoreError {
    return new TrustStoreError(
      `Trust store file ${path} exists with different certificate content`,
      { path },
    );
  }

  static io(dir: string, cause: unknown): TrustStoreError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new TrustStoreError(`Trust store ${dir} is not accessible: ${reason}`, { dir }, { cause });
  }
}

/**
 * CMS answered with a non-success status or could not be reached
 */
export class CmsRequestError extends ServiceOperationError {
  readonly code = QVS_ERROR.cmsRequest;
  readonly type = 'cms';

  static status(url: string, status: number, body: string): CmsRequestError {
    return new CmsRequestError(`CMS request to ${url} failed with HTTP ${status}`, {
      url,
      status,
      body: body.slice(0, 200),
    });
  }

  static network(url: string, cause: unknown): CmsRequestError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new CmsRequestError(`CMS request to ${url} failed: ${reason}`, { url }, { cause });
  }
}

/**
 * The peer presented a TLS certificate whose SHA-384 digest is not the pinned one
 */
export class PinnedCertificateMismatchError extends ServiceOperationError {
  readonly code = QVS_ERROR.pinnedCertificateMismatch;
  readonly type = 'cms';

  static mismatch(host: string, expected: string, actual: string): PinnedCertificateMismatchError {
    return new PinnedCertificateMismatchError(
      `TLS certificate of ${host} does not match the pinned SHA-384 digest`,
      { host, expected, actual },
    );
  }
}

/**
 * JWT signing certificates could not be fetched or stored
 */
export class JwtCertRefreshError extends ServiceOperationError {
  readonly code = QVS_ERROR.jwtCertRefresh;
  readonly type = 'auth';

  static status(url: string, status: number): JwtCertRefreshError {
    return new JwtCertRefreshError(`Could not retrieve jwt certificate: HTTP ${status}`, {
      url,
      status,
    });
  }

  static failed(url: string, cause: unknown): JwtCertRefreshError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new JwtCertRefreshError(`Could not retrieve jwt certificate: ${reason}`, { url }, { cause });
  }

  static noRootCa(dir: string): JwtCertRefreshError {
    return new JwtCertRefreshError('Could not read root CA certificate', { dir });
  }
}

/**
 * A bearer token was rejected
 */
export class TokenAuthorizationError extends ServiceOperationError {
  readonly code = QVS_ERROR.tokenAuthorization;
  readonly type = 'auth';

  static missingToken(): TokenAuthorizationError {
    return new TokenAuthorizationError('Missing bearer token', { reason: 'missing' });
  }

  static unknownSigner(kid?: string): TokenAuthorizationError {
    return new TokenAuthorizationError('Token is not signed by a trusted certificate', {
      reason: 'unknown_signer',
      kid,
    });
  }

  static invalid(reason: string): TokenAuthorizationError {
    return new TokenAuthorizationError(`Invalid token: ${reason}`, { reason: 'invalid' });
  }

  get isUnknownSigner(): boolean {
    return this.context?.reason === 'unknown_signer';
  }
}

/**
 * TLS key/certificate pair missing, unreadable or not matching
 */
export class ServiceIdentityError extends ServiceOperationError {
  readonly code = QVS_ERROR.serviceIdentity;
  readonly type = 'identity';

  static unreadable(path: string, cause: unknown): ServiceIdentityError {
    return new ServiceIdentityError(`Could not read TLS identity file ${path}`, { path }, { cause });
  }

  static mismatch(keyFile: string, certFile: string): ServiceIdentityError {
    return new ServiceIdentityError(
      `TLS key ${keyFile} does not match certificate ${certFile}`,
      { keyFile, certFile },
    );
  }
}

/**
 * systemctl could not be located or invoked
 */
export class ServiceControlError extends ServiceOperationError {
  readonly code = QVS_ERROR.serviceControl;
  readonly type = 'service';

  static notFound(action: string): ServiceControlError {
    return new ServiceControlError(
      `Could not locate systemctl to ${action} application service`,
      { action },
    );
  }

  static spawnFailed(action: string, cause: unknown): ServiceControlError {
    return new ServiceControlError(`Could not run systemctl ${action}`, { action }, { cause });
  }
}

/**
 * Union type for all QVS operation errors
 */
export type ServiceOperationErrorType =
  | UsageError
  | InsufficientArgumentsError
  | SetupValidationError
  | OwnershipError
  | TrustStoreError
  | CmsRequestError
  | PinnedCertificateMismatchError
  | JwtCertRefreshError
  | TokenAuthorizationError
  | ServiceIdentityError
  | ServiceControlError;

/**
 * Type guards for error type checking
 */
export function isServiceOperationError(error: unknown): error is ServiceOperationErrorType {
  return error instanceof ServiceOperationError;
}

export function isUsageError(error: unknown): error is UsageError {
  return error instanceof UsageError;
}

export function isTokenAuthorizationError(error: unknown): error is TokenAuthorizationError {
  return error instanceof TokenAuthorizationError;
}

/**
 * Attach the name of the setup task that raised an error, without wrapping it.
 */
export function attachTask(error: unknown, task: string): void {
  if (typeof error === 'object' && error !== null && Object.isExtensible(error)) {
    Object.defineProperty(error, 'task', { value: task, enumerable: true, configurable: true });
  }
}

/** Name of the setup task that raised `error`, if {@link attachTask} marked it. */
export function taskOf(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'task' in error) {
    return typeof error.task === 'string' ? error.task : undefined;
  }
  return undefined;
}
