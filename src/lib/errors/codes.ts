/**
 * Stable error codes carried by every {@link ServiceOperationError}.
 *
 * The CLI maps these to console output; tests assert on them instead of messages.
 */
export const QVS_ERROR = {
  usage: 'USAGE_ERROR',
  insufficientArguments: 'INSUFFICIENT_ARGUMENTS',
  setupValidation: 'SETUP_VALIDATION_ERROR',
  ownership: 'OWNERSHIP_ERROR',
  trustStore: 'TRUST_STORE_ERROR',
  cmsRequest: 'CMS_REQUEST_ERROR',
  pinnedCertificateMismatch: 'PINNED_CERTIFICATE_MISMATCH',
  jwtCertRefresh: 'JWT_CERT_REFRESH_ERROR',
  tokenAuthorization: 'TOKEN_AUTHORIZATION_ERROR',
  serviceIdentity: 'SERVICE_IDENTITY_ERROR',
  serviceControl: 'SERVICE_CONTROL_ERROR',
} as const;

export type QvsErrorCode = (typeof QVS_ERROR)[keyof typeof QVS_ERROR];
