/**
 * @module handlers/callback
 * @description Receives the upstream provider's redirect and hands the user agent back to the client.
 */

import { readParam } from '#params';

import type { AuthorizationProxy } from '@dcrbridge/core';
import type { FastifyReply, FastifyRequest } from 'fastify';

/**
 * handles GET on the proxy callback
 * unknown or expired transactions fail with a JSON error, since no client redirect can be trusted
 * @param request fastify request with the provider's query parameters
 * @param reply fastify reply object
 * @param proxy authorization proxy
 * @returns the redirect reply
 */
export async function handleCallback(
  request: FastifyRequest,
  reply: FastifyReply,
  proxy: AuthorizationProxy,
): Promise<FastifyReply> {
  const { query } = request;
  const { redirectTo } = await proxy.callback({
    code: readParam(query, 'code'),
    state: readParam(query, 'state'),
    error: readParam(query, 'error'),
    errorDescription: readParam(query, 'error_description'),
  });

  return reply.redirect(redirectTo);
}
