/**
 * Shared type contracts for the authorization proxy.
 * Internal records use camelCase; wire types mirror the snake_case JSON the OAuth RFCs mandate.
 * @see RFC 6749 - OAuth 2.0 Authorization Framework
 * @see RFC 7591 - OAuth 2.0 Dynamic Client Registration
 * @see RFC 7636 - Proof Key for Code Exchange
 * @see RFC 7009 - OAuth 2.0 Token Revocation
 */

// JSON //

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export interface JsonObject {
  [key: string]: JsonValue;
}

// ENUMS AND LITERALS //

/** oauth grant types */
export type GrantType = 'authorization_code' | 'refresh_token';

/** oauth response types */
export type ResponseType = 'code';

/** pkce code challenge methods */
export type CodeChallengeMethod = 'S256';

/** how the proxy authenticates itself at the upstream token endpoint */
export type UpstreamAuthMethod = 'client_secret_basic' | 'client_secret_post';

/** standard oauth error codes */
export type OAuthErrorCode =
  | 'invalid_request'
  | 'invalid_client'
  | 'invalid_client_metadata'
  | 'invalid_redirect_uri'
  | 'invalid_grant'
  | 'unauthorized_client'
  | 'unsupported_grant_type'
  | 'unsupported_response_type'
  | 'invalid_scope'
  | 'access_denied'
  | 'server_error'
  | 'temporarily_unavailable'
  | 'invalid_token'
  | 'insufficient_scope';

// INTERNAL TYPES (camelCase) //

/**
 * the operator's single upstream application credential
 * plus the provider quirks the token exchange has to honour
 */
export interface UpstreamProfile {
  clientId: string;
  clientSecret: string;
  /** basic auth header or credentials in the form body */
  authMethod: UpstreamAuthMethod;
}

/** a logical calling application registered through DCR */
export interface ClientRegistration {
  // identity //
  clientId: string;
  upstream: UpstreamProfile;

  // configuration //
  redirectUris: string[];
  grantTypes: GrantType[];
  responseTypes: ResponseType[];
  scope?: string;

  // metadata //
  clientName?: string;
  clientUri?: string;
  logoUri?: string;
  contacts?: string[];
  tosUri?: string;
  policyUri?: string;
  softwareId?: string;
  softwareVersion?: string;

  // timestamps //
  createdAt: number;
}

/** the registration as shown to clients, without the upstream secret */
export type RegisteredClient = Omit<ClientRegistration, 'upstream'> & {
  upstreamClientId: string;
};

/** registration metadata supplied by a client */
export interface ClientRegistrationRequest {
  redirectUris: string[];
  grantTypes?: string[];
  responseTypes?: string[];
  tokenEndpointAuthMethod?: string;
  scope?: string;
  clientName?: string;
  clientUri?: string;
  logoUri?: string;
  contacts?: string[];
  tosUri?: string;
  policyUri?: string;
  softwareId?: string;
  softwareVersion?: string;
}

/** the proxy's record of an authorization request awaiting the upstream callback */
export interface Transaction {
  transactionId: string;
  clientId: string;
  clientCodeChallenge: string;
  clientCodeChallengeMethod: CodeChallengeMethod;
  clientState?: string;
  clientRedirectUri: string;
  /** the authorization request named its redirect_uri, so the token request must repeat it */
  redirectUriRequired: boolean;
  scopes: string[];
  /** absent when the client's own challenge was forwarded upstream */
  proxyCodeVerifier?: string;
  proxyCodeChallenge?: string;
  expiresAt: number;
}

/** input for creating a transaction; the store assigns id and expiry */
export type TransactionInput = Omit<Transaction, 'transactionId' | 'expiresAt'>;

/** single-use code handed to the client after a successful callback */
export interface ProxyAuthorizationCode {
  code: string;
  clientId: string;
  /** set when the upstream exchange already happened at callback time */
  referenceId?: string;
  /** encrypted upstream code, set when the exchange is deferred to the token request */
  upstreamCode?: string;
  clientCodeChallenge: string;
  clientCodeChallengeMethod: CodeChallengeMethod;
  clientRedirectUri: string;
  redirectUriRequired: boolean;
  scopes: string[];
  expiresAt: number;
  used: boolean;
}

/** input for minting a code; the store assigns the code and expiry */
export type ProxyAuthorizationCodeInput = Omit<
  ProxyAuthorizationCode,
  'code' | 'expiresAt' | 'used'
>;

/** decrypted upstream token material and metadata */
export interface UpstreamTokenRecord {
  referenceId: string;
  clientId: string;
  accessToken: string;
  refreshToken?: string;
  /** epoch milliseconds, null when the provider gave no lifetime */
  expiresAt: number | null;
  scopes: string[];
  upstreamSubject?: string;
  /** identity claims passed through unchanged */
  claims: JsonObject;
  /** jti of the live proxy refresh token bound to this record */
  refreshJti: string;
  /** bumped on every update, used for conditional writes */
  version: number;
  updatedAt: number;
  /** epoch milliseconds until which one worker holds the right to refresh upstream */
  refreshingUntil?: number;
}

/** token material returned by the upstream provider */
export interface UpstreamTokenSet {
  accessToken: string;
  refreshToken?: string;
  /** seconds, when the provider reported it */
  expiresIn?: number;
  scopes?: string[];
  idToken?: string;
  claims: JsonObject;
}

/** identity handed to the request-dispatch layer */
export interface AuthenticatedIdentity {
  /** upstream subject identifier, or the reference id when the provider gave none */
  subject: string;
  referenceId: string;
  clientId: string;
  scopes: string[];
  /** upstream claims, unchanged */
  claims: JsonObject;
  /** epoch seconds */
  expiresAt: number;
}

/** parameters of an authorization request */
export interface AuthorizeRequest {
  clientId?: string;
  redirectUri?: string;
  responseType?: string;
  state?: string;
  codeChallenge?: string;
  codeChallengeMethod?: string;
  scope?: string;
}

/** parameters the upstream provider sends to the proxy callback */
export interface CallbackRequest {
  code?: string;
  state?: string;
  error?: string;
  errorDescription?: string;
}

/** an authorization_code grant */
export interface CodeExchangeRequest {
  code?: string;
  codeVerifier?: string;
  redirectUri?: string;
  clientId?: string;
}

/** a refresh_token grant */
export interface RefreshRequest {
  refreshToken?: string;
  scope?: string;
  clientId?: string;
}

/** any token endpoint request */
export interface TokenRequest extends CodeExchangeRequest, RefreshRequest {
  grantType?: string;
}

/** a redirect the HTTP layer should issue */
export interface RedirectResult {
  redirectTo: string;
}

// WIRE FORMAT TYPES (RFC-mandated snake_case) //

/* eslint-disable @typescript-eslint/naming-convention */

/**
 * oauth token response (RFC 6749)
 */
export interface TokenResponseWire {
  access_token: string;
  token_type: 'Bearer';
  expires_in: number;
  refresh_token: string;
  scope: string;
}

/**
 * oauth error response (RFC 6749 Section 5.2)
 */
export interface OAuthErrorResponseWire {
  error: OAuthErrorCode;
  error_description?: string;
}

/* eslint-enable @typescript-eslint/naming-convention */
