import { InvalidClientError } from '@dcrbridge/core';

import { HTTP_NOT_FOUND, HTTP_OK } from '#constants/http';
import { sendOAuthError } from '#errors';

import { toClientInformation } from './registration';

import type { AuthorizationProxy } from '@dcrbridge/core';
import type { FastifyReply, FastifyRequest } from 'fastify';

/** route parameters of the client info endpoint */
export interface ClientInfoParams {
  clientId: string;
}

/**
 * handles GET /oauth/clients/:clientId - reads a registration back
 * @param request fastify request with the client id parameter
 * @param reply fastify reply object
 * @param proxy authorization proxy
 * @returns the reply
 */
export async function handleClientInfo(
  request: FastifyRequest<{ Params: ClientInfoParams }>,
  reply: FastifyReply,
  proxy: AuthorizationProxy,
): Promise<FastifyReply> {
  const client = await proxy.getClient(request.params.clientId);
  if (!client) {
    return sendOAuthError(
      reply,
      new InvalidClientError(`unknown client: ${request.params.clientId}`),
      HTTP_NOT_FOUND,
    );
  }

  return reply.code(HTTP_OK).send(toClientInformation(client));
}
