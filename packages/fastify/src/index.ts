export type { EnvConfig, ServerSettings } from '#config';
export type {
  ClientInfoParams,
  ProtectedResourceOptions,
} from '#handlers/index';
export type { RequireAuthOptions } from '#middleware';
export type { ProxyRoutesOptions } from '#routes';
export type { ProxyServer, ProxyServerOptions } from '#server';
export type * from '#types';

export { loadConfigFromEnv } from '#config';
export * from '#constants/http';
export { PROXY_ROUTES } from '#constants/routes';
export { buildBearerChallenge, sendOAuthError, setupErrorHandler } from '#errors';
export {
  createAuthorizationServerMetadata,
  createProtectedResourceMetadata,
} from '#handlers/index';
export {
  createFastifyLog,
  createLoggerConfig,
  createPinoConfig,
  setupNotFoundHandler,
} from '#logging';
export { createRequireAuth } from '#middleware';
export { registerProxyRoutes } from '#routes';
export { createProxyServer } from '#server';
