/**
 * Wire formats the HTTP surface produces.
 * Fields mirror the snake_case JSON mandated by the OAuth RFCs.
 * @see RFC 7591 - OAuth 2.0 Dynamic Client Registration
 * @see RFC 8414 - OAuth 2.0 Authorization Server Metadata
 * @see RFC 9728 - OAuth 2.0 Protected Resource Metadata
 */

import type { GrantType, ResponseType } from '@dcrbridge/core';

/* eslint-disable @typescript-eslint/naming-convention */

/** client information response (RFC 7591 Section 3.2.1) */
export interface ClientInformationWire {
  client_id: string;
  /** the operator's upstream client id every flow of this client runs under */
  upstream_client_id: string;
  client_id_issued_at: number;
  /** no secret is ever issued */
  client_secret_expires_at: 0;
  redirect_uris: string[];
  grant_types: GrantType[];
  response_types: ResponseType[];
  token_endpoint_auth_method: 'none';
  scope?: string;
  client_name?: string;
  client_uri?: string;
  logo_uri?: string;
  contacts?: string[];
  tos_uri?: string;
  policy_uri?: string;
  software_id?: string;
  software_version?: string;
}

/** authorization server metadata (RFC 8414 Section 2) */
export interface AuthorizationServerMetadataWire {
  issuer: string;
  authorization_endpoint: string;
  token_endpoint: string;
  registration_endpoint: string;
  revocation_endpoint: string;
  response_types_supported: ResponseType[];
  grant_types_supported: GrantType[];
  code_challenge_methods_supported: Array<'S256'>;
  token_endpoint_auth_methods_supported: Array<'none'>;
  revocation_endpoint_auth_methods_supported: Array<'none'>;
  scopes_supported?: string[];
}

/** protected resource metadata (RFC 9728 Section 2) */
export interface ProtectedResourceMetadataWire {
  resource: string;
  authorization_servers: string[];
  bearer_methods_supported: Array<'header'>;
  scopes_supported?: string[];
}

/* eslint-enable @typescript-eslint/naming-convention */
