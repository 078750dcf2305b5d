/**
 * @module handlers/metadata
 * @description Discovery documents. The proxy presents itself as the authorization server; the
 * upstream provider never appears in them.
 */

import {
  SUPPORTED_CODE_CHALLENGE_METHODS,
  SUPPORTED_GRANT_TYPES,
  SUPPORTED_RESPONSE_TYPES,
} from '@dcrbridge/core';

import { HTTP_OK } from '#constants/http';
import { PROXY_ROUTES } from '#constants/routes';

import type { AuthorizationProxy } from '@dcrbridge/core';
import type { FastifyReply, FastifyRequest } from 'fastify';

import type {
  AuthorizationServerMetadataWire,
  ProtectedResourceMetadataWire,
} from '#types';

/** how the protected resource describes itself */
export interface ProtectedResourceOptions {
  /** resource identifier, defaults to the issuer */
  resource?: string;
  /** scopes the resource accepts, defaults to the proxy's allowed scopes */
  scopes?: string[];
}

/**
 * creates authorization server metadata (RFC 8414)
 * @param proxy authorization proxy
 * @returns metadata document
 */
export function createAuthorizationServerMetadata(
  proxy: AuthorizationProxy,
): AuthorizationServerMetadataWire {
  const { issuer, allowedScopes } = proxy.config;

  return {
    issuer,
    authorization_endpoint: `${issuer}${PROXY_ROUTES.authorize}`,
    token_endpoint: `${issuer}${PROXY_ROUTES.token}`,
    registration_endpoint: `${issuer}${PROXY_ROUTES.register}`,
    revocation_endpoint: `${issuer}${PROXY_ROUTES.revoke}`,
    response_types_supported: [...SUPPORTED_RESPONSE_TYPES],
    grant_types_supported: [...SUPPORTED_GRANT_TYPES],
    code_challenge_methods_supported: [...SUPPORTED_CODE_CHALLENGE_METHODS],
    token_endpoint_auth_methods_supported: ['none'],
    revocation_endpoint_auth_methods_supported: ['none'],
    scopes_supported: allowedScopes,
  };
}

/**
 * creates protected resource metadata (RFC 9728)
 * @param proxy authorization proxy
 * @param options resource description
 * @returns metadata document
 */
export function createProtectedResourceMetadata(
  proxy: AuthorizationProxy,
  options: ProtectedResourceOptions = {},
): ProtectedResourceMetadataWire {
  const { issuer, allowedScopes } = proxy.config;

  return {
    resource: options.resource ?? issuer,
    authorization_servers: [issuer],
    bearer_methods_supported: ['header'],
    scopes_supported: options.scopes ?? allowedScopes,
  };
}

/**
 * handles GET /.well-known/oauth-authorization-server
 * @param _request fastify request object (unused)
 * @param reply fastify reply object
 * @param proxy authorization proxy
 * @returns the reply
 */
export async function handleAuthorizationServerMetadata(
  _request: FastifyRequest,
  reply: FastifyReply,
  proxy: AuthorizationProxy,
): Promise<FastifyReply> {
  return reply.code(HTTP_OK).send(createAuthorizationServerMetadata(proxy));
}

/**
 * handles GET /.well-known/oauth-protected-resource
 * @param _request fastify request object (unused)
 * @param reply fastify reply object
 * @param proxy authorization proxy
 * @param options resource description
 * @returns the reply
 */
export async function handleProtectedResourceMetadata(
  _request: FastifyRequest,
  reply: FastifyReply,
  proxy: AuthorizationProxy,
  options?: ProtectedResourceOptions,
): Promise<FastifyReply> {
  return reply
    .code(HTTP_OK)
    .send(createProtectedResourceMetadata(proxy, options));
}
