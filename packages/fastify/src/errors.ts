import { describeError, ProxyError } from '@dcrbridge/core';

import {
  HTTP_BAD_REQUEST,
  HTTP_INTERNAL_SERVER_ERROR,
} from '#constants/http';

import type { Log, OAuthErrorResponseWire } from '@dcrbridge/core';
import type { FastifyError, FastifyInstance, FastifyReply } from 'fastify';

/**
 * builds a WWW-Authenticate challenge (RFC 6750 Section 3)
 * @param params challenge attributes, undefined ones are skipped
 * @returns header value
 */
export function buildBearerChallenge(
  params: Record<string, string | undefined>,
): string {
  const attributes = Object.entries(params)
    .filter((entry): entry is [string, string] => entry[1] !== undefined)
    // quoted-string values may not carry a double quote
    .map(([name, value]) => `${name}="${value.replaceAll('"', "'")}"`);

  return attributes.length > 0 ? `Bearer ${attributes.join(', ')}` : 'Bearer';
}

/**
 * sends a proxy error as an OAuth error response
 * @param reply fastify reply object
 * @param error error to send
 * @param statusCode status overriding the error's own
 * @returns the reply
 */
export function sendOAuthError(
  reply: FastifyReply,
  error: ProxyError,
  statusCode: number = error.statusCode,
): FastifyReply {
  if (error.code === 'invalid_token') {
    void reply.header(
      'WWW-Authenticate',
      buildBearerChallenge({
        error: error.code,
        error_description: error.message,
      }),
    );
  }

  const body: OAuthErrorResponseWire = error.toWireFormat();

  return reply.code(statusCode).header('Cache-Control', 'no-store').send(body);
}

/**
 * turns thrown errors into OAuth error responses
 * proxy errors keep their code and status, malformed requests become invalid_request
 * and anything else is logged and reported as server_error
 * @param server the fastify server instance to configure
 * @param log sink for unexpected failures
 */
export function setupErrorHandler(server: FastifyInstance, log: Log): void {
  server.setErrorHandler<FastifyError>(async (error, request, reply) => {
    if (error instanceof ProxyError) {
      return sendOAuthError(reply, error);
    }

    // body parser and validation failures
    const { statusCode } = error;
    if (
      statusCode !== undefined &&
      statusCode >= HTTP_BAD_REQUEST &&
      statusCode < HTTP_INTERNAL_SERVER_ERROR
    ) {
      return reply.code(statusCode).send({
        error: 'invalid_request',
        error_description: error.message,
      });
    }

    log('error', 'unhandled error while serving request', {
      method: request.method,
      url: request.routeOptions.url ?? request.url,
      ...describeError(error),
    });

    return reply.code(HTTP_INTERNAL_SERVER_ERROR).send({
      error: 'server_error',
      error_description: 'internal server error',
    });
  });
}
