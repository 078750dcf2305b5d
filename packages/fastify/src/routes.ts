/**
 * @module routes
 * @description Registers the OAuth endpoints of the authorization proxy on a Fastify instance.
 */

import formbody from '@fastify/formbody';

import { PROXY_ROUTES } from '#constants/routes';
import {
  handleAuthorizationServerMetadata,
  handleAuthorize,
  handleCallback,
  handleClientInfo,
  handleClientRegistration,
  handleProtectedResourceMetadata,
  handleRevoke,
  handleToken,
} from '#handlers/index';

import type { AuthorizationProxy } from '@dcrbridge/core';
import type { FastifyPluginAsync } from 'fastify';

import type { ClientInfoParams, ProtectedResourceOptions } from '#handlers/index';

/** options of the proxy routes plugin */
export interface ProxyRoutesOptions {
  /** how the protected resource metadata describes the resource */
  protectedResource?: ProtectedResourceOptions;
}

/**
 * creates a fastify plugin that registers every oauth route of the proxy
 * the callback is served on the path of the configured callback url
 * @param proxy authorization proxy serving the routes
 * @param options route options
 * @returns fastify plugin async function
 */
export function registerProxyRoutes(
  proxy: AuthorizationProxy,
  options: ProxyRoutesOptions = {},
): FastifyPluginAsync {
  const callbackPath = new URL(proxy.config.upstream.callbackUrl).pathname;

  return async (fastify) => {
    // the token and revocation endpoints take form-encoded bodies
    await fastify.register(formbody);

    // client management //

    fastify.post(PROXY_ROUTES.register, async (request, reply) =>
      handleClientRegistration(request, reply, proxy),
    );

    fastify.get<{ Params: ClientInfoParams }>(
      PROXY_ROUTES.clientInfo,
      async (request, reply) => handleClientInfo(request, reply, proxy),
    );

    // authorization flow //

    fastify.get(PROXY_ROUTES.authorize, async (request, reply) =>
      handleAuthorize(request, reply, proxy),
    );

    fastify.get(callbackPath, async (request, reply) =>
      handleCallback(request, reply, proxy),
    );

    fastify.post(PROXY_ROUTES.token, async (request, reply) =>
      handleToken(request, reply, proxy),
    );

    fastify.post(PROXY_ROUTES.revoke, async (request, reply) =>
      handleRevoke(request, reply, proxy),
    );

    // discovery //

    fastify.get(PROXY_ROUTES.authorizationServerMetadata, async (request, reply) =>
      handleAuthorizationServerMetadata(request, reply, proxy),
    );

    fastify.get(PROXY_ROUTES.protectedResourceMetadata, async (request, reply) =>
      handleProtectedResourceMetadata(
        request,
        reply,
        proxy,
        options.protectedResource,
      ),
    );
  };
}
