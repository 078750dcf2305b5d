/**
 * @module config
 * @description Programmatic configuration of the authorization proxy, with defaults and validation.
 */

import { assertSecretKeys } from '#cipher';
import {
  DEFAULT_ACCESS_TOKEN_TTL_SECONDS,
  DEFAULT_CALLBACK_PATH,
  DEFAULT_CODE_TTL_SECONDS,
  DEFAULT_REFRESH_TOKEN_TTL_SECONDS,
  DEFAULT_TRANSACTION_TTL_SECONDS,
  DEFAULT_UPSTREAM_TIMEOUT_MS,
  MAX_TRANSACTION_TTL_SECONDS,
  MIN_TRANSACTION_TTL_SECONDS,
} from '#constants';
import { compileRedirectPattern } from '#redirect';

import type { SecretKey } from '#cipher';
import type { Log } from '#logging';
import type { RedirectPattern } from '#redirect';
import type { KeyValueStore } from '#store/types';
import type { UpstreamAuthMethod } from '#types';
import type { UpstreamProvider } from '#upstream/types';

/** the upstream provider and the operator's credential there */
export interface UpstreamConfig {
  authorizationEndpoint: string;
  tokenEndpoint: string;
  userinfoEndpoint?: string;
  revocationEndpoint?: string;
  clientId: string;
  clientSecret: string;
  /** defaults to client_secret_basic */
  tokenEndpointAuthMethod?: UpstreamAuthMethod;
  /** send the client's own PKCE challenge upstream instead of the proxy's */
  forwardClientPkce?: boolean;
  /** per-call timeout in milliseconds */
  timeoutMs?: number;
  /** the proxy callback registered at the provider, defaults to `${issuer}/oauth/callback` */
  callbackUrl?: string;
  /** extra query parameters for the upstream authorization redirect */
  authorizationParams?: Record<string, string>;
}

/** configuration of the authorization proxy */
export interface ProxyConfig {
  /** the proxy's public base url */
  issuer: string;
  upstream: UpstreamConfig;
  /** signs proxy tokens, the first key active */
  signingKeys: SecretKey[];
  /** encrypts upstream secrets at rest, the first key active */
  encryptionKeys: SecretKey[];
  /** operator redirect allowlist, every redirect must also match one pattern when set */
  allowedRedirectPatterns?: string[];
  /** scopes clients may request, any when unset */
  allowedScopes?: string[];
  /** scopes requested upstream when a client asks for none */
  defaultScopes?: string[];
  transactionTtlSeconds?: number;
  codeTtlSeconds?: number;
  accessTokenTtlSeconds?: number;
  refreshTokenTtlSeconds?: number;
  /** revoke the tokens issued from a code when that code is replayed */
  revokeOnCodeReplay?: boolean;
  /** durable backend for clients and upstream tokens */
  storage?: KeyValueStore;
  /** short-lived backend for transactions and codes */
  ephemeralStorage?: KeyValueStore;
  /** replaces the http upstream client */
  upstreamProvider?: UpstreamProvider;
  log?: Log;
}

/** configuration with every default applied */
export interface ResolvedProxyConfig
  extends Omit<
    ProxyConfig,
    | 'upstream'
    | 'allowedRedirectPatterns'
    | 'defaultScopes'
    | 'transactionTtlSeconds'
    | 'codeTtlSeconds'
    | 'accessTokenTtlSeconds'
    | 'refreshTokenTtlSeconds'
    | 'revokeOnCodeReplay'
  > {
  upstream: UpstreamConfig &
    Required<
      Pick<
        UpstreamConfig,
        'tokenEndpointAuthMethod' | 'forwardClientPkce' | 'timeoutMs' | 'callbackUrl'
      >
    >;
  redirectPatterns?: RedirectPattern[];
  defaultScopes: string[];
  transactionTtlSeconds: number;
  codeTtlSeconds: number;
  accessTokenTtlSeconds: number;
  refreshTokenTtlSeconds: number;
  revokeOnCodeReplay: boolean;
}

/**
 * checks a value is an absolute http(s) url
 * @param value url to check
 * @param field field name for error messages
 * @throws {Error} when the value is not an absolute http(s) url
 */
function assertHttpUrl(value: string, field: string): void {
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    throw new Error(`${field} must be an absolute url: ${value}`);
  }

  if (url.protocol !== 'https:' && url.protocol !== 'http:') {
    throw new Error(`${field} must use http or https: ${value}`);
  }
}

/**
 * checks a ttl is a positive whole number of seconds
 * @param value ttl in seconds
 * @param field field name for error messages
 * @throws {Error} when the ttl is not a positive integer
 */
function assertPositiveInteger(value: number, field: string): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${field} must be a positive integer`);
  }
}

/**
 * validates a proxy configuration and applies defaults
 * @param config configuration to validate
 * @returns resolved configuration
 * @throws {Error} describing the first problem found
 */
export function validateProxyConfig(config: ProxyConfig): ResolvedProxyConfig {
  assertHttpUrl(config.issuer, 'issuer');
  const issuer = config.issuer.replace(/\/+$/, '');

  const { upstream } = config;
  assertHttpUrl(upstream.authorizationEndpoint, 'upstream.authorizationEndpoint');
  assertHttpUrl(upstream.tokenEndpoint, 'upstream.tokenEndpoint');
  if (upstream.userinfoEndpoint !== undefined) {
    assertHttpUrl(upstream.userinfoEndpoint, 'upstream.userinfoEndpoint');
  }
  if (upstream.revocationEndpoint !== undefined) {
    assertHttpUrl(upstream.revocationEndpoint, 'upstream.revocationEndpoint');
  }
  if (!upstream.clientId) {
    throw new Error('upstream.clientId is required');
  }
  if (!upstream.clientSecret) {
    throw new Error('upstream.clientSecret is required');
  }

  const callbackUrl = upstream.callbackUrl ?? `${issuer}${DEFAULT_CALLBACK_PATH}`;
  assertHttpUrl(callbackUrl, 'upstream.callbackUrl');

  const timeoutMs = upstream.timeoutMs ?? DEFAULT_UPSTREAM_TIMEOUT_MS;
  assertPositiveInteger(timeoutMs, 'upstream.timeoutMs');

  assertSecretKeys(config.signingKeys, 'signing');
  assertSecretKeys(config.encryptionKeys, 'encryption');

  const transactionTtlSeconds =
    config.transactionTtlSeconds ?? DEFAULT_TRANSACTION_TTL_SECONDS;
  if (
    !Number.isInteger(transactionTtlSeconds) ||
    transactionTtlSeconds < MIN_TRANSACTION_TTL_SECONDS ||
    transactionTtlSeconds > MAX_TRANSACTION_TTL_SECONDS
  ) {
    throw new Error(
      `transactionTtlSeconds must be between ${MIN_TRANSACTION_TTL_SECONDS} and ${MAX_TRANSACTION_TTL_SECONDS}`,
    );
  }

  const codeTtlSeconds = config.codeTtlSeconds ?? DEFAULT_CODE_TTL_SECONDS;
  const accessTokenTtlSeconds =
    config.accessTokenTtlSeconds ?? DEFAULT_ACCESS_TOKEN_TTL_SECONDS;
  const refreshTokenTtlSeconds =
    config.refreshTokenTtlSeconds ?? DEFAULT_REFRESH_TOKEN_TTL_SECONDS;
  assertPositiveInteger(codeTtlSeconds, 'codeTtlSeconds');
  assertPositiveInteger(accessTokenTtlSeconds, 'accessTokenTtlSeconds');
  assertPositiveInteger(refreshTokenTtlSeconds, 'refreshTokenTtlSeconds');

  const redirectPatterns = config.allowedRedirectPatterns?.map(
    compileRedirectPattern,
  );

  const defaultScopes = config.defaultScopes ?? [];
  if (config.allowedScopes) {
    const allowed = config.allowedScopes;
    const stray = defaultScopes.find((scope) => !allowed.includes(scope));
    if (stray !== undefined) {
      throw new Error(`default scope ${stray} is not in allowedScopes`);
    }
  }

  return {
    ...config,
    issuer,
    upstream: {
      ...upstream,
      tokenEndpointAuthMethod:
        upstream.tokenEndpointAuthMethod ?? 'client_secret_basic',
      forwardClientPkce: upstream.forwardClientPkce ?? false,
      timeoutMs,
      callbackUrl,
    },
    redirectPatterns,
    defaultScopes,
    transactionTtlSeconds,
    codeTtlSeconds,
    accessTokenTtlSeconds,
    refreshTokenTtlSeconds,
    revokeOnCodeReplay: config.revokeOnCodeReplay ?? true,
  };
}
