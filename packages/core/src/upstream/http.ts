/**
 * @module upstream/http
 * @description Upstream provider client speaking plain OAuth 2.0 over HTTP.
 * Every call is a single attempt bounded by a timeout; failures are classified as retryable
 * (network, timeout, 5xx) or as a provider rejection carrying the provider's error code.
 */

import { decodeJwt } from 'jose';

import { DEFAULT_UPSTREAM_TIMEOUT_MS } from '#constants';
import { UpstreamExchangeFailedError, UpstreamRefreshFailedError } from '#errors';
import { describeError, silentLog } from '#logging';
import { isJsonObject, isRecord } from '#validation';

import type { ProxyError } from '#errors';
import type { Log } from '#logging';
import type { JsonObject, UpstreamProfile, UpstreamTokenSet } from '#types';
import type {
  AuthorizationUrlParams,
  CodeExchangeParams,
  UpstreamProvider,
  UpstreamRefreshParams,
  UpstreamRevokeParams,
} from '#upstream/types';

// HTTP CONSTANTS //

const HTTP_BAD_REQUEST = 400;
const HTTP_INTERNAL_SERVER_ERROR = 500;
const CONTENT_TYPE_JSON = 'application/json';
const CONTENT_TYPE_FORM = 'application/x-www-form-urlencoded';

/** configuration options for the http upstream provider */
export interface HttpUpstreamProviderOptions {
  authorizationEndpoint: string;
  tokenEndpoint: string;
  /** queried for identity claims when the token response carries no id_token */
  userinfoEndpoint?: string;
  /** RFC 7009 endpoint, revocation is skipped when absent */
  revocationEndpoint?: string;
  /** per-call timeout in milliseconds */
  timeoutMs?: number;
  /** extra query parameters for the authorization redirect, e.g. prompt or access_type */
  authorizationParams?: Record<string, string>;
  log?: Log;
}

/** details of a failed token endpoint call */
interface UpstreamFailure {
  message: string;
  upstreamCode?: string;
  retryable: boolean;
  cause?: unknown;
}

// REQUEST BUILDING //

/**
 * creates basic authorization header from client credentials
 * @param clientId client identifier
 * @param clientSecret client secret
 * @returns basic authorization header value
 */
export function createBasicAuthHeader(
  clientId: string,
  clientSecret: string,
): string {
  const credentials = `${encodeURIComponent(clientId)}:${encodeURIComponent(clientSecret)}`;

  return `Basic ${Buffer.from(credentials).toString('base64')}`;
}

/**
 * builds a form-encoded request body
 * @param params key-value pairs to encode
 * @returns URLSearchParams-encoded string
 */
export function buildFormBody(
  params: Record<string, string | undefined>,
): string {
  const searchParams = new URLSearchParams();

  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) {
      searchParams.set(key, value);
    }
  }

  return searchParams.toString();
}

// RESPONSE PARSING //

/**
 * parses a token endpoint body, which some providers send form-encoded
 * @param text raw response body
 * @param contentType response content type
 * @returns parsed object, or null when unreadable
 */
export function parseResponseBody(
  text: string,
  contentType: string | null,
): Record<string, unknown> | null {
  if (!text) {
    return null;
  }

  if (contentType?.includes(CONTENT_TYPE_FORM)) {
    return Object.fromEntries(new URLSearchParams(text));
  }

  try {
    const parsed: unknown = JSON.parse(text);

    return isRecord(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

/**
 * extracts the lifetime of a token response
 * @param value expires_in as sent by the provider
 * @returns seconds, or undefined when absent or malformed
 */
function parseExpiresIn(value: unknown): number | undefined {
  const seconds = typeof value === 'string' ? Number(value) : value;

  return typeof seconds === 'number' && Number.isFinite(seconds) && seconds > 0
    ? seconds
    : undefined;
}

/**
 * splits a granted scope string, tolerating comma-delimited providers
 * @param value scope as sent by the provider
 * @returns scopes, or undefined when the provider did not report them
 */
function parseGrantedScopes(value: unknown): string[] | undefined {
  return typeof value === 'string'
    ? value.split(/[\s,]+/).filter(Boolean)
    : undefined;
}

// PROVIDER //

/** talks to a standard OAuth 2.0 provider with the operator's static credential */
export class HttpUpstreamProvider implements UpstreamProvider {
  readonly #options: HttpUpstreamProviderOptions;
  readonly #timeoutMs: number;
  readonly #log: Log;

  constructor(options: HttpUpstreamProviderOptions) {
    this.#options = options;
    this.#timeoutMs = options.timeoutMs ?? DEFAULT_UPSTREAM_TIMEOUT_MS;
    this.#log = options.log ?? silentLog;
  }

  public buildAuthorizationUrl(params: AuthorizationUrlParams): string {
    const url = new URL(this.#options.authorizationEndpoint);

    for (const [key, value] of Object.entries(
      this.#options.authorizationParams ?? {},
    )) {
      url.searchParams.set(key, value);
    }

    url.searchParams.set('response_type', 'code');
    url.searchParams.set('client_id', params.profile.clientId);
    url.searchParams.set('redirect_uri', params.redirectUri);
    url.searchParams.set('state', params.state);
    url.searchParams.set('code_challenge', params.codeChallenge);
    url.searchParams.set('code_challenge_method', params.codeChallengeMethod);
    if (params.scopes.length > 0) {
      url.searchParams.set('scope', params.scopes.join(' '));
    }

    return url.toString();
  }

  public async exchangeCode(
    params: CodeExchangeParams,
  ): Promise<UpstreamTokenSet> {
    const fail = (failure: UpstreamFailure): ProxyError =>
      new UpstreamExchangeFailedError(failure);

    const payload = await this.#postToken(
      params.profile,
      {
        grant_type: 'authorization_code',
        code: params.code,
        redirect_uri: params.redirectUri,
        code_verifier: params.codeVerifier,
      },
      fail,
    );

    const tokens = this.#parseTokenSet(payload, fail);

    return { ...tokens, claims: await this.#resolveClaims(tokens) };
  }

  public async refresh(
    params: UpstreamRefreshParams,
  ): Promise<UpstreamTokenSet> {
    const fail = (failure: UpstreamFailure): ProxyError =>
      new UpstreamRefreshFailedError(failure);

    const payload = await this.#postToken(
      params.profile,
      {
        grant_type: 'refresh_token',
        refresh_token: params.refreshToken,
        scope: params.scopes?.join(' '),
      },
      fail,
    );

    const tokens = this.#parseTokenSet(payload, fail);

    // claims are only refreshed when the provider sends a new id_token
    return {
      ...tokens,
      claims: tokens.idToken ? this.#decodeIdToken(tokens.idToken) : {},
    };
  }

  public async revoke(params: UpstreamRevokeParams): Promise<void> {
    const endpoint = this.#options.revocationEndpoint;
    if (!endpoint) {
      return;
    }

    const { headers, body } = this.#authenticate(params.profile, {
      token: params.token,
      token_type_hint: params.tokenTypeHint,
    });

    const response = await fetch(endpoint, {
      method: 'POST',
      headers,
      body: buildFormBody(body),
      signal: AbortSignal.timeout(this.#timeoutMs),
    });

    if (response.status >= HTTP_BAD_REQUEST) {
      throw new Error(`upstream revocation returned status ${response.status}`);
    }
  }

  /**
   * adds client authentication to a token endpoint request
   * @param profile upstream credential
   * @param params form parameters
   * @returns request headers and body
   */
  #authenticate(
    profile: UpstreamProfile,
    params: Record<string, string | undefined>,
  ): {
    headers: Record<string, string>;
    body: Record<string, string | undefined>;
  } {
    const headers: Record<string, string> = {
      'Content-Type': CONTENT_TYPE_FORM,
      'Accept': CONTENT_TYPE_JSON,
    };

    if (profile.authMethod === 'client_secret_basic') {
      return {
        headers: {
          ...headers,
          Authorization: createBasicAuthHeader(
            profile.clientId,
            profile.clientSecret,
          ),
        },
        body: params,
      };
    }

    return {
      headers,
      body: {
        ...params,
        client_id: profile.clientId,
        client_secret: profile.clientSecret,
      },
    };
  }

  /**
   * posts to the token endpoint once
   * @param profile upstream credential
   * @param params form parameters
   * @param fail maps a failure to the error the caller raises
   * @returns parsed success body
   */
  async #postToken(
    profile: UpstreamProfile,
    params: Record<string, string | undefined>,
    fail: (failure: UpstreamFailure) => ProxyError,
  ): Promise<Record<string, unknown>> {
    const { headers, body } = this.#authenticate(profile, params);

    let status: number;
    let payload: Record<string, unknown> | null;
    try {
      const response = await fetch(this.#options.tokenEndpoint, {
        method: 'POST',
        headers,
        body: buildFormBody(body),
        signal: AbortSignal.timeout(this.#timeoutMs),
      });
      status = response.status;
      payload = parseResponseBody(
        await response.text(),
        response.headers.get('content-type'),
      );
    } catch (error) {
      this.#log('warn', 'upstream token endpoint unreachable', describeError(error));
      throw fail({
        message: 'upstream token endpoint unreachable',
        retryable: true,
        cause: error,
      });
    }

    const upstreamCode =
      typeof payload?.error === 'string' ? payload.error : undefined;
    const description =
      typeof payload?.error_description === 'string'
        ? payload.error_description
        : undefined;

    if (status >= HTTP_INTERNAL_SERVER_ERROR) {
      this.#log('warn', 'upstream token endpoint failed', { status });
      throw fail({
        message: `upstream token endpoint returned status ${status}`,
        upstreamCode,
        retryable: true,
      });
    }

    // some providers report errors with a 200 status
    if (status >= HTTP_BAD_REQUEST || upstreamCode) {
      this.#log('warn', 'upstream rejected token request', {
        status,
        error: upstreamCode ?? null,
      });
      throw fail({
        message: description ?? `upstream rejected token request: ${upstreamCode ?? status}`,
        upstreamCode,
        retryable: false,
      });
    }

    if (!payload) {
      throw fail({
        message: 'upstream token endpoint returned an unreadable response',
        retryable: false,
      });
    }

    return payload;
  }

  /**
   * reads token material out of a success body
   * @param payload token endpoint response
   * @param fail maps a failure to the error the caller raises
   * @returns tokens without claims
   */
  #parseTokenSet(
    payload: Record<string, unknown>,
    fail: (failure: UpstreamFailure) => ProxyError,
  ): Omit<UpstreamTokenSet, 'claims'> {
    const {
      access_token: accessToken,
      refresh_token: refreshToken,
      id_token: idToken,
    } = payload;

    if (typeof accessToken !== 'string' || !accessToken) {
      throw fail({
        message: 'upstream token response is missing access_token',
        retryable: false,
      });
    }

    return {
      accessToken,
      refreshToken:
        typeof refreshToken === 'string' && refreshToken
          ? refreshToken
          : undefined,
      expiresIn: parseExpiresIn(payload.expires_in),
      scopes: parseGrantedScopes(payload.scope),
      idToken: typeof idToken === 'string' && idToken ? idToken : undefined,
    };
  }

  /**
   * finds identity claims for a fresh grant
   * @param tokens token material from the exchange
   * @param tokens.accessToken upstream access token
   * @param tokens.idToken upstream id token, if any
   * @returns identity claims, empty when none are available
   */
  async #resolveClaims(tokens: {
    accessToken: string;
    idToken?: string;
  }): Promise<JsonObject> {
    if (tokens.idToken) {
      return this.#decodeIdToken(tokens.idToken);
    }

    const endpoint = this.#options.userinfoEndpoint;
    if (!endpoint) {
      return {};
    }

    try {
      const response = await fetch(endpoint, {
        headers: {
          Authorization: `Bearer ${tokens.accessToken}`,
          Accept: CONTENT_TYPE_JSON,
        },
        signal: AbortSignal.timeout(this.#timeoutMs),
      });
      const body: unknown = await response.json();
      if (response.ok && isJsonObject(body)) {
        return body;
      }

      this.#log('warn', 'upstream userinfo request failed', {
        status: response.status,
      });
    } catch (error) {
      this.#log('warn', 'upstream userinfo request failed', describeError(error));
    }

    return {};
  }

  /**
   * decodes an id token received over the authenticated back channel
   * @param idToken compact jwt
   * @returns its claims, empty when undecodable
   */
  #decodeIdToken(idToken: string): JsonObject {
    try {
      const claims = decodeJwt(idToken);

      return isJsonObject(claims) ? claims : {};
    } catch (error) {
      this.#log('warn', 'discarding undecodable id_token', describeError(error));

      return {};
    }
  }
}
