/**
 * @module handlers/token
 * @description Token endpoint for the authorization_code and refresh_token grants.
 * Accepts form-encoded and json bodies; responses are never cached.
 */

import { HTTP_OK } from '#constants/http';
import { readParam } from '#params';
import { resolveClientId } from '#request-context';

import type { AuthorizationProxy } from '@dcrbridge/core';
import type { FastifyReply, FastifyRequest } from 'fastify';

/**
 * handles POST /oauth/token
 * @param request fastify request with token request body
 * @param reply fastify reply object
 * @param proxy authorization proxy
 * @returns the reply
 */
export async function handleToken(
  request: FastifyRequest,
  reply: FastifyReply,
  proxy: AuthorizationProxy,
): Promise<FastifyReply> {
  const { body } = request;
  const tokens = await proxy.token({
    grantType: readParam(body, 'grant_type'),
    code: readParam(body, 'code'),
    codeVerifier: readParam(body, 'code_verifier'),
    redirectUri: readParam(body, 'redirect_uri'),
    refreshToken: readParam(body, 'refresh_token'),
    scope: readParam(body, 'scope'),
    clientId: resolveClientId(request, readParam(body, 'client_id')),
  });

  return reply
    .code(HTTP_OK)
    .header('Cache-Control', 'no-store')
    .header('Pragma', 'no-cache')
    .send(tokens);
}
