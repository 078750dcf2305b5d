import { TokenInvalidError } from '@dcrbridge/core';

import { HTTP_FORBIDDEN } from '#constants/http';
import { buildBearerChallenge, sendOAuthError } from '#errors';
import { extractBearerToken, lastHeader } from '#request-context';

import type { AuthenticatedIdentity, AuthorizationProxy } from '@dcrbridge/core';
import type { FastifyReply, preHandlerAsyncHookHandler } from 'fastify';

declare module 'fastify' {
  interface FastifyRequest {
    /** identity behind the bearer token, set by createRequireAuth */
    auth?: AuthenticatedIdentity;
  }
}

/** options of the bearer token guard */
export interface RequireAuthOptions {
  /** scopes the token must carry, all of them */
  requiredScopes?: string[];
}

/**
 * sends a 403 insufficient_scope response with its challenge (RFC 6750 Section 3.1)
 * @param reply fastify reply object
 * @param requiredScopes scopes the resource requires
 * @returns the reply
 */
function sendInsufficientScope(
  reply: FastifyReply,
  requiredScopes: string[],
): FastifyReply {
  const description = `required scope(s): ${requiredScopes.join(' ')}`;

  return reply
    .code(HTTP_FORBIDDEN)
    .header(
      'WWW-Authenticate',
      buildBearerChallenge({
        error: 'insufficient_scope',
        error_description: description,
        scope: requiredScopes.join(' '),
      }),
    )
    .send({ error: 'insufficient_scope', error_description: description });
}

/**
 * creates a preHandler that requires a valid proxy access token
 * the authenticated identity is exposed as request.auth
 * @param proxy authorization proxy that issued the tokens
 * @param options required scopes
 * @returns fastify preHandler hook
 * @example
 * ```typescript
 * server.get('/tools', { preHandler: createRequireAuth(proxy, { requiredScopes: ['read'] }) },
 *   async (request) => ({ user: request.auth?.subject }));
 * ```
 */
export function createRequireAuth(
  proxy: AuthorizationProxy,
  options: RequireAuthOptions = {},
): preHandlerAsyncHookHandler {
  const { requiredScopes = [] } = options;

  return async (request, reply) => {
    const token = extractBearerToken(
      lastHeader(request.headers, 'authorization'),
    );
    if (!token) {
      return sendOAuthError(
        reply,
        new TokenInvalidError('bearer token is required'),
      );
    }

    let identity: AuthenticatedIdentity;
    try {
      identity = await proxy.authenticate(token);
    } catch (error) {
      if (error instanceof TokenInvalidError) {
        return sendOAuthError(reply, error);
      }
      throw error;
    }

    if (!requiredScopes.every((scope) => identity.scopes.includes(scope))) {
      return sendInsufficientScope(reply, requiredScopes);
    }

    request.auth = identity;
  };
}
