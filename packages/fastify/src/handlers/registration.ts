/**
 * @module handlers/registration
 * @description Dynamic client registration (RFC 7591). Every client registers as a public client
 * and is bound to the operator's single upstream credential.
 */

import { MS_PER_SECOND } from '@dcrbridge/core';

import { HTTP_CREATED } from '#constants/http';
import { readMetadataString, readStringList } from '#params';

import type {
  AuthorizationProxy,
  ClientRegistrationRequest,
  RegisteredClient,
} from '@dcrbridge/core';
import type { FastifyReply, FastifyRequest } from 'fastify';

import type { ClientInformationWire } from '#types';

// HELPER FUNCTIONS //

/**
 * maps a registration body to the proxy's request shape
 * @param body parsed json body
 * @returns registration request
 */
export function toRegistrationRequest(body: unknown): ClientRegistrationRequest {
  return {
    redirectUris: readStringList(body, 'redirect_uris') ?? [],
    grantTypes: readStringList(body, 'grant_types'),
    responseTypes: readStringList(body, 'response_types'),
    tokenEndpointAuthMethod: readMetadataString(
      body,
      'token_endpoint_auth_method',
    ),
    scope: readMetadataString(body, 'scope'),
    clientName: readMetadataString(body, 'client_name'),
    clientUri: readMetadataString(body, 'client_uri'),
    logoUri: readMetadataString(body, 'logo_uri'),
    contacts: readStringList(body, 'contacts'),
    tosUri: readMetadataString(body, 'tos_uri'),
    policyUri: readMetadataString(body, 'policy_uri'),
    softwareId: readMetadataString(body, 'software_id'),
    softwareVersion: readMetadataString(body, 'software_version'),
  };
}

/**
 * builds the RFC 7591 client information response
 * @param client registered client
 * @returns wire format response
 */
export function toClientInformation(
  client: RegisteredClient,
): ClientInformationWire {
  return {
    client_id: client.clientId,
    upstream_client_id: client.upstreamClientId,
    client_id_issued_at: Math.floor(client.createdAt / MS_PER_SECOND),
    client_secret_expires_at: 0,
    redirect_uris: client.redirectUris,
    grant_types: client.grantTypes,
    response_types: client.responseTypes,
    token_endpoint_auth_method: 'none',
    scope: client.scope,
    client_name: client.clientName,
    client_uri: client.clientUri,
    logo_uri: client.logoUri,
    contacts: client.contacts,
    tos_uri: client.tosUri,
    policy_uri: client.policyUri,
    software_id: client.softwareId,
    software_version: client.softwareVersion,
  };
}

// REGISTRATION HANDLER //

/**
 * handles POST /oauth/register - dynamic client registration
 * @param request fastify request with registration body
 * @param reply fastify reply object
 * @param proxy authorization proxy
 * @returns the reply
 */
export async function handleClientRegistration(
  request: FastifyRequest,
  reply: FastifyReply,
  proxy: AuthorizationProxy,
): Promise<FastifyReply> {
  const client = await proxy.register(toRegistrationRequest(request.body));

  return reply.code(HTTP_CREATED).send(toClientInformation(client));
}
