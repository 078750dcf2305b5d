/**
 * @module server
 * @description Builds the Fastify server hosting the authorization proxy.
 */

import { AuthorizationProxy } from '@dcrbridge/core';
import fastify from 'fastify';

import { setupErrorHandler } from '#errors';
import {
  createFastifyLog,
  createLoggerConfig,
  createPinoConfig,
  setupNotFoundHandler,
} from '#logging';
import { registerProxyRoutes } from '#routes';

import type { Log, ProxyConfig } from '@dcrbridge/core';
import type { FastifyInstance } from 'fastify';

import type { ProtectedResourceOptions } from '#handlers/index';

/**
 * options of the proxy server
 * @example
 * ```typescript
 * // logs through a callback
 * const { server } = createProxyServer({ config, log: (level, message, meta) => {} });
 *
 * // logs through fastify's own logger
 * const { server } = createProxyServer({ config, logLevel: 'info' });
 * ```
 */
export interface ProxyServerOptions {
  /** proxy configuration, its log defaults to the server's */
  config: ProxyConfig;
  /** receives both fastify's and the proxy's log records */
  log?: Log;
  /** level of fastify's own logger, used when no log callback is given */
  logLevel?: string;
  /** how the protected resource metadata describes the resource */
  protectedResource?: ProtectedResourceOptions;
}

/** a server ready to listen together with the proxy it serves */
export interface ProxyServer {
  server: FastifyInstance;
  proxy: AuthorizationProxy;
}

/**
 * creates a fastify server with every proxy route registered
 * closing the server closes the proxy's stores
 * @param options server options
 * @returns the server and its proxy
 * @throws {Error} when the proxy configuration is invalid
 */
export function createProxyServer(options: ProxyServerOptions): ProxyServer {
  const server = fastify({
    logger: options.log
      ? createLoggerConfig(options.log)
      : options.logLevel
        ? createPinoConfig(options.logLevel)
        : false,
  });

  const log = options.log ?? createFastifyLog(server.log);
  const proxy = new AuthorizationProxy({
    ...options.config,
    log: options.config.log ?? log,
  });

  setupErrorHandler(server, log);
  void server.register(
    registerProxyRoutes(proxy, { protectedResource: options.protectedResource }),
  );
  setupNotFoundHandler(server);

  server.addHook('onClose', async () => proxy.close());

  return { server, proxy };
}
