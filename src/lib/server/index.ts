export {
  createGatewayApp,
  startGateway,
  type GatewayOptions,
  type RunningGateway,
  type ShutdownReason,
  type ShutdownReport,
} from './gateway.js';
export { accessLog, notFound, recovery } from './recovery.js';
export { versionRoutes, type RouteRegistrar } from './routes.js';
export { closeGracefully, type CloseOutcome } from './shutdown.js';
export { createTlsServerOptions, TLS_CIPHERS, TLS_MIN_VERSION } from './tls-options.js';
