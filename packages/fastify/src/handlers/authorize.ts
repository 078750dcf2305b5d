/**
 * @module handlers/authorize
 * @description Authorization endpoint. Sends the user agent to the upstream provider, or back to the
 * client with an error once its redirect uri is trusted. Failures before that point surface as JSON.
 */

import { readParam } from '#params';

import type { AuthorizationProxy } from '@dcrbridge/core';
import type { FastifyReply, FastifyRequest } from 'fastify';

/**
 * handles GET /oauth/authorize
 * @param request fastify request with authorization query parameters
 * @param reply fastify reply object
 * @param proxy authorization proxy
 * @returns the redirect reply
 */
export async function handleAuthorize(
  request: FastifyRequest,
  reply: FastifyReply,
  proxy: AuthorizationProxy,
): Promise<FastifyReply> {
  const { query } = request;
  const { redirectTo } = await proxy.authorize({
    clientId: readParam(query, 'client_id'),
    redirectUri: readParam(query, 'redirect_uri'),
    responseType: readParam(query, 'response_type'),
    state: readParam(query, 'state'),
    codeChallenge: readParam(query, 'code_challenge'),
    codeChallengeMethod: readParam(query, 'code_challenge_method'),
    scope: readParam(query, 'scope'),
  });

  return reply.redirect(redirectTo);
}
