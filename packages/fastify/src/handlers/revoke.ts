import { InvalidRequestError } from '@dcrbridge/core';

import { HTTP_OK } from '#constants/http';
import { readParam } from '#params';

import type { AuthorizationProxy } from '@dcrbridge/core';
import type { FastifyReply, FastifyRequest } from 'fastify';

/**
 * handles POST /oauth/revoke (RFC 7009)
 * answers 200 for unknown tokens as well
 * @param request fastify request with revocation body
 * @param reply fastify reply object
 * @param proxy authorization proxy
 * @returns the reply
 */
export async function handleRevoke(
  request: FastifyRequest,
  reply: FastifyReply,
  proxy: AuthorizationProxy,
): Promise<FastifyReply> {
  const token = readParam(request.body, 'token');
  if (!token) {
    throw new InvalidRequestError('token is required');
  }

  await proxy.revoke(token);

  return reply.code(HTTP_OK).send();
}
