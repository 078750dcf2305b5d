/**
 * @module proxy
 * @description The authorization orchestrator. Runs the client-facing and the provider-facing OAuth
 * flows side by side, START → AWAITING_UPSTREAM_CALLBACK → CODE_ISSUED → TOKEN_EXCHANGED, keeping
 * every piece of per-flow state in the stores so any instance can serve any step.
 */

import { setTimeout as sleep } from 'node:timers/promises';

import { TokenCipher } from '#cipher';
import {
  MS_PER_SECOND,
  REFRESH_LEASE_MARGIN_MS,
  REFRESH_LEASE_POLL_MS,
  UPSTREAM_EXPIRY_SKEW_MS,
} from '#constants';
import { AuthorizationCodeStore } from '#codes';
import { validateProxyConfig } from '#config';
import {
  CodeReplayError,
  InvalidClientError,
  InvalidGrantError,
  InvalidRedirectError,
  InvalidRequestError,
  InvalidScopeError,
  TokenInvalidError,
  TransactionExpiredOrNotFoundError,
  UnsupportedGrantTypeError,
  UpstreamExchangeFailedError,
  UpstreamRefreshFailedError,
} from '#errors';
import { generateOpaqueId } from '#id';
import { describeError, silentLog } from '#logging';
import { KeyedMutex } from '#mutex';
import { generatePkcePair, verifyPkce } from '#pkce';
import { buildClientRedirect, validateRedirectUri } from '#redirect';
import { ClientRegistry, toRegisteredClient, validateScopes } from '#registry';
import { MemoryKeyValueStore } from '#store/memory';
import { TokenIssuer } from '#tokens';
import { TransactionStore } from '#transactions';
import { HttpUpstreamProvider } from '#upstream/http';
import { UpstreamTokenStore, isRefreshLeased } from '#upstream-tokens';
import { parseScope } from '#validation';

import type { ProxyConfig, ResolvedProxyConfig } from '#config';
import type { Log } from '#logging';
import type { KeyValueStore } from '#store/types';
import type { VerifiedToken } from '#tokens';
import type {
  AuthenticatedIdentity,
  AuthorizeRequest,
  CallbackRequest,
  ClientRegistration,
  ClientRegistrationRequest,
  CodeExchangeRequest,
  JsonObject,
  OAuthErrorCode,
  ProxyAuthorizationCode,
  RedirectResult,
  RefreshRequest,
  RegisteredClient,
  TokenRequest,
  TokenResponseWire,
  UpstreamTokenRecord,
  UpstreamTokenSet,
} from '#types';
import type { UpstreamProvider } from '#upstream/types';
import type { UpstreamTokenInput } from '#upstream-tokens';

/** an S256 challenge is a base64url sha-256 digest */
const S256_CHALLENGE_PATTERN = /^[A-Za-z0-9_-]{43}$/;

/**
 * tells whether an upstream access token can still be used
 * @param record upstream grant
 * @returns true when it has no known expiry or outlives the skew window
 */
function isUpstreamTokenFresh(record: UpstreamTokenRecord): boolean {
  return (
    record.expiresAt === null ||
    record.expiresAt - UPSTREAM_EXPIRY_SKEW_MS > Date.now()
  );
}

/**
 * converts a reported lifetime to an absolute expiry
 * @param expiresIn seconds, if reported
 * @returns epoch milliseconds, or null when unknown
 */
function toExpiresAt(expiresIn: number | undefined): number | null {
  return expiresIn === undefined ? null : Date.now() + expiresIn * MS_PER_SECOND;
}

/**
 * reads the subject identifier out of identity claims
 * @param claims upstream claims
 * @returns the sub claim when it is a string
 */
function subjectOf(claims: JsonObject): string | undefined {
  return typeof claims.sub === 'string' ? claims.sub : undefined;
}

/**
 * OAuth 2.0 authorization proxy giving DCR and PKCE clients access to a provider
 * that knows one static credential
 * @example
 * ```typescript
 * const proxy = new AuthorizationProxy({
 *   issuer: 'https://proxy.example.com',
 *   upstream: { authorizationEndpoint, tokenEndpoint, clientId, clientSecret },
 *   signingKeys: [{ id: 'k1', secret: signingSecret }],
 *   encryptionKeys: [{ id: 'e1', secret: encryptionSecret }],
 * });
 * const { redirectTo } = await proxy.authorize(request);
 * ```
 */
export class AuthorizationProxy {
  /** configuration with defaults applied */
  public readonly config: ResolvedProxyConfig;

  readonly #registry: ClientRegistry;
  readonly #transactions: TransactionStore;
  readonly #codes: AuthorizationCodeStore;
  readonly #grants: UpstreamTokenStore;
  readonly #tokens: TokenIssuer;
  readonly #cipher: TokenCipher;
  readonly #upstream: UpstreamProvider;
  readonly #refreshLocks = new KeyedMutex();
  readonly #backends: Set<KeyValueStore>;
  readonly #log: Log;

  /**
   * creates a proxy
   * @param config proxy configuration
   * @throws {Error} when the configuration is invalid
   */
  constructor(config: ProxyConfig) {
    this.config = validateProxyConfig(config);
    const { upstream } = this.config;

    this.#log = config.log ?? silentLog;
    this.#cipher = new TokenCipher(config.encryptionKeys);

    const storage = config.storage ?? new MemoryKeyValueStore();
    const ephemeral = config.ephemeralStorage ?? new MemoryKeyValueStore();
    this.#backends = new Set([storage, ephemeral]);

    this.#registry = new ClientRegistry({
      store: storage,
      cipher: this.#cipher,
      upstream: {
        clientId: upstream.clientId,
        clientSecret: upstream.clientSecret,
        authMethod: upstream.tokenEndpointAuthMethod,
      },
      allowedScopes: this.config.allowedScopes,
      redirectPatterns: this.config.redirectPatterns,
      log: this.#log,
    });
    this.#transactions = new TransactionStore({
      store: ephemeral,
      ttlSeconds: this.config.transactionTtlSeconds,
    });
    this.#codes = new AuthorizationCodeStore({
      store: ephemeral,
      ttlSeconds: this.config.codeTtlSeconds,
    });
    this.#grants = new UpstreamTokenStore({
      store: storage,
      cipher: this.#cipher,
      ttlSeconds: this.config.refreshTokenTtlSeconds,
    });
    this.#tokens = new TokenIssuer({
      keys: config.signingKeys,
      issuer: this.config.issuer,
      accessTokenTtlSeconds: this.config.accessTokenTtlSeconds,
      refreshTokenTtlSeconds: this.config.refreshTokenTtlSeconds,
    });
    this.#upstream =
      config.upstreamProvider ??
      new HttpUpstreamProvider({
        authorizationEndpoint: upstream.authorizationEndpoint,
        tokenEndpoint: upstream.tokenEndpoint,
        userinfoEndpoint: upstream.userinfoEndpoint,
        revocationEndpoint: upstream.revocationEndpoint,
        timeoutMs: upstream.timeoutMs,
        authorizationParams: upstream.authorizationParams,
        log: this.#log,
      });
  }

  // REGISTRATION //

  /**
   * registers a client through DCR
   * @param request registration metadata
   * @returns the client-facing registration
   */
  public async register(
    request: ClientRegistrationRequest,
  ): Promise<RegisteredClient> {
    return toRegisteredClient(await this.#registry.register(request));
  }

  /**
   * reads a client's registration
   * @param clientId proxy client identifier
   * @returns the client-facing registration, or null when unknown
   */
  public async getClient(clientId: string): Promise<RegisteredClient | null> {
    const registration = await this.#registry.lookup(clientId);

    return registration && toRegisteredClient(registration);
  }

  /**
   * adds redirect uris to a client (operator action)
   * @param clientId proxy client identifier
   * @param uris redirect uris to add
   * @returns the updated client-facing registration
   */
  public async addRedirectUris(
    clientId: string,
    uris: string[],
  ): Promise<RegisteredClient> {
    return toRegisteredClient(
      await this.#registry.addRedirectUris(clientId, uris),
    );
  }

  // AUTHORIZATION //

  /**
   * starts an authorization, START → AWAITING_UPSTREAM_CALLBACK
   * @param request authorization request parameters
   * @returns where to send the user agent: the provider, or the client with an error
   * @throws {InvalidRequestError} when client_id is missing
   * @throws {InvalidClientError} when the client is unknown
   * @throws {InvalidRedirectError} when the redirect uri cannot be trusted, nothing may redirect then
   */
  public async authorize(request: AuthorizeRequest): Promise<RedirectResult> {
    if (!request.clientId) {
      throw new InvalidRequestError('client_id is required');
    }

    const client = await this.#registry.lookup(request.clientId);
    if (!client) {
      throw new InvalidClientError('unknown client_id');
    }

    const redirectUri = this.#resolveRedirectUri(client, request.redirectUri);
    validateRedirectUri(
      redirectUri,
      client.redirectUris,
      this.config.redirectPatterns,
    );

    // from here on errors go back to the client
    const reject = (
      error: OAuthErrorCode,
      description: string,
    ): RedirectResult => {
      this.#log('warn', 'authorization request rejected', {
        clientId: client.clientId,
        error,
        description,
      });

      return {
        redirectTo: buildClientRedirect(redirectUri, {
          error,
          error_description: description,
          state: request.state,
        }),
      };
    };

    if (request.responseType !== 'code') {
      return reject('unsupported_response_type', 'response_type must be code');
    }

    if (!request.codeChallenge) {
      return reject('invalid_request', 'code_challenge is required');
    }

    const method = request.codeChallengeMethod ?? 'S256';
    if (method !== 'S256') {
      return reject('invalid_request', 'code_challenge_method must be S256');
    }

    if (!S256_CHALLENGE_PATTERN.test(request.codeChallenge)) {
      return reject('invalid_request', 'code_challenge is malformed');
    }

    let scopes: string[];
    try {
      scopes = this.#resolveScopes(client, request.scope);
    } catch (error) {
      if (error instanceof InvalidScopeError) {
        return reject('invalid_scope', error.message);
      }
      throw error;
    }

    // the proxy runs its own PKCE against the provider unless told to forward the client's
    const proxyPkce = this.config.upstream.forwardClientPkce
      ? undefined
      : generatePkcePair();

    const transaction = await this.#transactions.create({
      clientId: client.clientId,
      clientCodeChallenge: request.codeChallenge,
      clientCodeChallengeMethod: method,
      clientState: request.state,
      clientRedirectUri: redirectUri,
      redirectUriRequired: request.redirectUri !== undefined,
      scopes,
      proxyCodeVerifier: proxyPkce?.verifier,
      proxyCodeChallenge: proxyPkce?.challenge,
    });

    this.#log('debug', 'authorization started', {
      clientId: client.clientId,
      scopes,
      forwardedPkce: !proxyPkce,
    });

    return {
      redirectTo: this.#upstream.buildAuthorizationUrl({
        profile: client.upstream,
        state: transaction.transactionId,
        redirectUri: this.config.upstream.callbackUrl,
        codeChallenge: proxyPkce?.challenge ?? request.codeChallenge,
        codeChallengeMethod: 'S256',
        scopes,
      }),
    };
  }

  /**
   * completes the upstream leg, AWAITING_UPSTREAM_CALLBACK → CODE_ISSUED
   * @param request parameters the provider sent to the callback
   * @returns where to send the user agent back to the client
   * @throws {TransactionExpiredOrNotFoundError} when the transaction is unknown, expired or already completed
   */
  public async callback(request: CallbackRequest): Promise<RedirectResult> {
    if (!request.state) {
      throw new TransactionExpiredOrNotFoundError('not_found');
    }

    const transaction = await this.#transactions.consume(request.state);

    const respond = (
      params: Record<string, string | undefined>,
    ): RedirectResult => ({
      redirectTo: buildClientRedirect(transaction.clientRedirectUri, {
        ...params,
        state: transaction.clientState,
      }),
    });

    if (request.error) {
      this.#log('warn', 'upstream reported an authorization error', {
        clientId: transaction.clientId,
        error: request.error,
      });

      return respond({
        error: request.error,
        error_description: request.errorDescription,
      });
    }

    if (!request.code) {
      return respond({
        error: 'invalid_request',
        error_description: 'upstream callback carried no authorization code',
      });
    }

    const client = await this.#registry.lookup(transaction.clientId);
    if (!client) {
      return respond({
        error: 'access_denied',
        error_description: 'client is no longer registered',
      });
    }

    const codeInput = {
      clientId: client.clientId,
      clientCodeChallenge: transaction.clientCodeChallenge,
      clientCodeChallengeMethod: transaction.clientCodeChallengeMethod,
      clientRedirectUri: transaction.clientRedirectUri,
      redirectUriRequired: transaction.redirectUriRequired,
      scopes: transaction.scopes,
    };

    // forwarded pkce: only the client's verifier can redeem the upstream code
    if (!transaction.proxyCodeVerifier) {
      const grant = await this.#codes.issue({
        ...codeInput,
        upstreamCode: await this.#cipher.encrypt(request.code),
      });
      this.#log('debug', 'authorization code issued', {
        clientId: client.clientId,
        deferredExchange: true,
      });

      return respond({ code: grant.code });
    }

    let tokens: UpstreamTokenSet;
    try {
      tokens = await this.#upstream.exchangeCode({
        profile: client.upstream,
        code: request.code,
        codeVerifier: transaction.proxyCodeVerifier,
        redirectUri: this.config.upstream.callbackUrl,
      });
    } catch (error) {
      if (error instanceof UpstreamExchangeFailedError) {
        this.#log('warn', 'upstream code exchange failed', {
          clientId: client.clientId,
          retryable: error.retryable,
          upstreamError: error.upstreamCode ?? null,
        });

        return respond({
          error: error.retryable ? 'temporarily_unavailable' : 'access_denied',
          error_description: error.message,
        });
      }
      throw error;
    }

    const record = await this.#storeGrant(
      client.clientId,
      tokens,
      transaction.scopes,
    );
    const grant = await this.#codes.issue({
      ...codeInput,
      referenceId: record.referenceId,
      scopes: record.scopes,
    });

    this.#log('debug', 'authorization code issued', {
      clientId: client.clientId,
      deferredExchange: false,
    });

    return respond({ code: grant.code });
  }

  // TOKEN ENDPOINT //

  /**
   * serves the token endpoint
   * @param request token request parameters
   * @returns token response
   * @throws {UnsupportedGrantTypeError} for any grant other than authorization_code and refresh_token
   */
  public async token(request: TokenRequest): Promise<TokenResponseWire> {
    switch (request.grantType) {
      case 'authorization_code':
        return this.exchangeCode(request);
      case 'refresh_token':
        return this.refresh(request);
      default:
        throw new UnsupportedGrantTypeError(request.grantType);
    }
  }

  /**
   * redeems a proxy authorization code, CODE_ISSUED → TOKEN_EXCHANGED
   * @param request code exchange parameters
   * @returns token response
   * @throws {InvalidRequestError} when code or code_verifier is missing
   * @throws {InvalidGrantError} when the code is unknown, expired or fails verification
   * @throws {CodeReplayError} when the code was already redeemed
   */
  public async exchangeCode(
    request: CodeExchangeRequest,
  ): Promise<TokenResponseWire> {
    const { code, codeVerifier } = request;
    if (!code) {
      throw new InvalidRequestError('code is required');
    }
    if (!codeVerifier) {
      throw new InvalidRequestError('code_verifier is required');
    }

    let grant: ProxyAuthorizationCode;
    try {
      grant = await this.#codes.redeem(code, (candidate) => {
        if (
          request.clientId !== undefined &&
          request.clientId !== candidate.clientId
        ) {
          throw new InvalidGrantError(
            'authorization code was issued to another client',
          );
        }
        if (candidate.redirectUriRequired && request.redirectUri === undefined) {
          throw new InvalidGrantError(
            'redirect_uri is required when the authorization request carried one',
          );
        }
        if (
          request.redirectUri !== undefined &&
          request.redirectUri !== candidate.clientRedirectUri
        ) {
          throw new InvalidGrantError(
            'redirect_uri does not match the authorization request',
          );
        }
        if (
          !verifyPkce(
            codeVerifier,
            candidate.clientCodeChallenge,
            candidate.clientCodeChallengeMethod,
          )
        ) {
          throw new InvalidGrantError(
            'code_verifier does not match the code challenge',
          );
        }
      });
    } catch (error) {
      if (error instanceof CodeReplayError) {
        this.#log('warn', 'authorization code replayed', {
          revoking: this.config.revokeOnCodeReplay && !!error.referenceId,
        });
        if (this.config.revokeOnCodeReplay && error.referenceId) {
          await this.#revokeGrant(error.referenceId);
        }
      }
      throw error;
    }

    let record: UpstreamTokenRecord | null;
    if (grant.upstreamCode) {
      record = await this.#exchangeDeferred(
        grant.clientId,
        grant.upstreamCode,
        codeVerifier,
        grant.scopes,
      );
      await this.#codes.attachReference(code, record.referenceId);
    } else {
      record = grant.referenceId
        ? await this.#grants.get(grant.referenceId)
        : null;
    }

    if (!record) {
      throw new InvalidGrantError('authorization grant no longer exists');
    }

    await this.#grants.linkRefreshToken(record.refreshJti, record.referenceId);
    // a replay may have revoked the grant between the read and the link
    if (!(await this.#grants.get(record.referenceId))) {
      await this.#grants.unlinkRefreshToken(record.refreshJti);
      throw new InvalidGrantError('authorization grant no longer exists');
    }

    this.#log('debug', 'authorization code exchanged', {
      clientId: record.clientId,
    });

    const { token: refreshToken } = await this.#tokens.issueRefresh({
      referenceId: record.referenceId,
      clientId: record.clientId,
      scopes: record.scopes,
      jti: record.refreshJti,
    });

    return this.#respond(record, record.scopes, refreshToken);
  }

  /**
   * exchanges a proxy refresh token for a new access token
   * @param request refresh parameters
   * @returns token response
   * @throws {TokenInvalidError} when the token is invalid, revoked, or its grant is gone
   * @throws {InvalidScopeError} when a requested scope exceeds the grant
   * @throws {UpstreamRefreshFailedError} when the provider refused or failed the refresh
   */
  public async refresh(request: RefreshRequest): Promise<TokenResponseWire> {
    if (!request.refreshToken) {
      throw new InvalidRequestError('refresh_token is required');
    }
    const presented = request.refreshToken;

    const verified = await this.#tokens.verify(presented, 'refresh');
    if (
      request.clientId !== undefined &&
      request.clientId !== verified.clientId
    ) {
      throw new InvalidGrantError('refresh token was issued to another client');
    }

    const record = await this.#resolveRefreshGrant(verified);
    const scopes = this.#narrowScopes(record.scopes, request.scope);

    if (isUpstreamTokenFresh(record)) {
      return this.#respond(record, scopes, presented);
    }

    // the in-process lock queues local callers; the lease in the record covers other workers
    return this.#refreshLocks.run(record.referenceId, async () => {
      for (;;) {
        const current = await this.#grants.get(record.referenceId);
        if (!current) {
          throw new TokenInvalidError('refresh token has been revoked');
        }

        if (isRefreshLeased(current)) {
          await sleep(REFRESH_LEASE_POLL_MS);
          continue;
        }

        // someone else refreshed while we waited
        if (isUpstreamTokenFresh(current)) {
          return this.#respond(
            current,
            scopes,
            await this.#refreshTokenFor(current, verified, presented),
          );
        }

        const leased = await this.#grants.claimRefresh(
          current.referenceId,
          current.version,
          this.config.upstream.timeoutMs + REFRESH_LEASE_MARGIN_MS,
        );
        const response = leased
          ? await this.#refreshUpstream(leased, scopes, verified, presented)
          : null;
        if (response) {
          return response;
        }
      }
    });
  }

  // REVOCATION AND AUTHENTICATION //

  /**
   * revokes the grant behind a proxy token (RFC 7009)
   * unknown or invalid tokens are ignored; outstanding access tokens stay valid until they expire
   * @param token proxy access or refresh token
   */
  public async revoke(token: string): Promise<void> {
    const verified = await this.#verifyAnyUse(token);
    if (!verified) {
      return;
    }

    if (verified.use === 'refresh') {
      const referenceId = await this.#grants.resolveRefreshToken(verified.jti);
      if (referenceId !== verified.referenceId) {
        return;
      }
    }

    await this.#revokeGrant(verified.referenceId);
  }

  /**
   * checks an access token presented to a protected resource
   * @param token proxy access token
   * @returns the identity and scopes the token carries
   * @throws {TokenInvalidError} when the token is invalid or expired
   */
  public async authenticate(token: string): Promise<AuthenticatedIdentity> {
    const verified = await this.#tokens.verify(token, 'access');

    return {
      subject: subjectOf(verified.claims) ?? verified.referenceId,
      referenceId: verified.referenceId,
      clientId: verified.clientId,
      scopes: verified.scopes,
      claims: verified.claims,
      expiresAt: verified.expiresAt,
    };
  }

  /** stops background sweepers of the backing stores */
  public async close(): Promise<void> {
    await Promise.all([...this.#backends].map(async (store) => store.close()));
  }

  // INTERNALS //

  /**
   * picks the redirect uri of an authorization request
   * @param client registered client
   * @param requested redirect_uri parameter
   * @returns the uri to validate
   * @throws {InvalidRedirectError} when omitted while several uris are declared
   */
  #resolveRedirectUri(
    client: ClientRegistration,
    requested: string | undefined,
  ): string {
    if (requested !== undefined) {
      return requested;
    }

    if (client.redirectUris.length !== 1) {
      throw new InvalidRedirectError(
        'redirect_uri is required when the client declares more than one',
      );
    }

    return client.redirectUris[0];
  }

  /**
   * determines the scopes of an authorization
   * @param client registered client
   * @param scope scope parameter
   * @returns requested scopes, or the defaults when none were requested
   * @throws {InvalidScopeError} when a scope is outside the allowlist or the client's registration
   */
  #resolveScopes(
    client: ClientRegistration,
    scope: string | undefined,
  ): string[] {
    const requested = parseScope(scope);
    if (requested.length === 0) {
      return client.scope
        ? parseScope(client.scope)
        : [...this.config.defaultScopes];
    }

    validateScopes(scope, this.config.allowedScopes);
    if (client.scope) {
      const registered = parseScope(client.scope);
      const stray = requested.find((item) => !registered.includes(item));
      if (stray !== undefined) {
        throw new InvalidScopeError(
          `scope ${stray} was not registered by the client`,
        );
      }
    }

    return requested;
  }

  /**
   * restricts a refresh to a subset of the granted scopes
   * @param granted scopes of the grant
   * @param scope scope parameter
   * @returns scopes for the new access token
   * @throws {InvalidScopeError} when a requested scope was not granted
   */
  #narrowScopes(granted: string[], scope: string | undefined): string[] {
    const requested = parseScope(scope);
    if (requested.length === 0) {
      return granted;
    }

    const stray = requested.find((item) => !granted.includes(item));
    if (stray !== undefined) {
      throw new InvalidScopeError(`scope ${stray} exceeds the original grant`);
    }

    return requested;
  }

  /**
   * persists fresh upstream tokens under a new reference id
   * @param clientId proxy client identifier
   * @param tokens upstream token material
   * @param requestedScopes scopes asked for, used when the provider reports none
   * @returns the stored record
   */
  async #storeGrant(
    clientId: string,
    tokens: UpstreamTokenSet,
    requestedScopes: string[],
  ): Promise<UpstreamTokenRecord> {
    return this.#grants.put(generateOpaqueId(), {
      clientId,
      accessToken: tokens.accessToken,
      refreshToken: tokens.refreshToken,
      expiresAt: toExpiresAt(tokens.expiresIn),
      scopes: tokens.scopes ?? requestedScopes,
      upstreamSubject: subjectOf(tokens.claims),
      claims: tokens.claims,
      refreshJti: generateOpaqueId(),
    });
  }

  /**
   * performs the upstream exchange postponed by pkce forwarding
   * @param clientId proxy client identifier
   * @param encryptedCode encrypted upstream authorization code
   * @param codeVerifier the client's verifier, which the provider checks
   * @param scopes scopes of the authorization
   * @returns the stored record
   * @throws {UpstreamExchangeFailedError} when the provider rejects the exchange
   */
  async #exchangeDeferred(
    clientId: string,
    encryptedCode: string,
    codeVerifier: string,
    scopes: string[],
  ): Promise<UpstreamTokenRecord> {
    const client = await this.#registry.lookup(clientId);
    if (!client) {
      throw new InvalidGrantError('client is no longer registered');
    }

    let tokens: UpstreamTokenSet;
    try {
      tokens = await this.#upstream.exchangeCode({
        profile: client.upstream,
        code: await this.#cipher.decrypt(encryptedCode),
        codeVerifier,
        redirectUri: this.config.upstream.callbackUrl,
      });
    } catch (error) {
      this.#log('warn', 'deferred upstream code exchange failed', {
        clientId,
        ...describeError(error),
      });
      throw error;
    }

    return this.#storeGrant(clientId, tokens, scopes);
  }

  /**
   * follows a verified refresh token to its live grant
   * @param verified verified refresh token
   * @returns the upstream record
   * @throws {TokenInvalidError} when the mapping or the record is gone
   */
  async #resolveRefreshGrant(
    verified: VerifiedToken,
  ): Promise<UpstreamTokenRecord> {
    const referenceId = await this.#grants.resolveRefreshToken(verified.jti);
    if (referenceId !== verified.referenceId) {
      throw new TokenInvalidError('refresh token has been revoked');
    }

    const record = await this.#grants.get(referenceId);
    if (!record || record.refreshJti !== verified.jti) {
      throw new TokenInvalidError('refresh token has been revoked');
    }

    return record;
  }

  /**
   * refreshes upstream once and rotates the proxy refresh token when the provider rotated its own
   * @param leased record whose refresh lease this call holds
   * @param scopes scopes for the new access token
   * @param verified presented refresh token
   * @param presented presented refresh token, returned when nothing rotated
   * @returns token response, or null when the record moved on before the result could be stored
   */
  async #refreshUpstream(
    leased: UpstreamTokenRecord,
    scopes: string[],
    verified: VerifiedToken,
    presented: string,
  ): Promise<TokenResponseWire | null> {
    const { referenceId, version } = leased;

    let tokens: UpstreamTokenSet;
    try {
      tokens = await this.#requestRefresh(leased);
    } catch (error) {
      if (error instanceof UpstreamRefreshFailedError && !error.retryable) {
        const removed = await this.#grants.deleteIfVersion(referenceId, version);
        this.#log('warn', 'upstream refused refresh', {
          clientId: leased.clientId,
          upstreamError: error.upstreamCode ?? null,
          grantRemoved: removed,
        });
      } else {
        await this.#grants.releaseRefresh(referenceId, version);
      }
      throw error;
    }

    const rotated =
      tokens.refreshToken !== undefined &&
      tokens.refreshToken !== leased.refreshToken;
    const refreshJti = rotated ? generateOpaqueId() : leased.refreshJti;

    const next: UpstreamTokenInput = {
      clientId: leased.clientId,
      accessToken: tokens.accessToken,
      refreshToken: tokens.refreshToken ?? leased.refreshToken,
      expiresAt: toExpiresAt(tokens.expiresIn),
      scopes: leased.scopes,
      upstreamSubject: leased.upstreamSubject ?? subjectOf(tokens.claims),
      claims:
        Object.keys(tokens.claims).length > 0 ? tokens.claims : leased.claims,
      refreshJti,
    };

    // the new mapping exists before the record points at it
    if (rotated) {
      await this.#grants.linkRefreshToken(refreshJti, referenceId);
    }

    const updated = await this.#grants.update(referenceId, version, next);
    if (!updated) {
      // the lease ran out or the grant was revoked meanwhile
      if (rotated) {
        await this.#grants.unlinkRefreshToken(refreshJti);
      }

      return null;
    }

    if (rotated) {
      await this.#grants.unlinkRefreshToken(leased.refreshJti);
    }

    this.#log('debug', 'upstream token refreshed', {
      clientId: leased.clientId,
      rotated,
    });

    return this.#respond(
      updated,
      scopes,
      await this.#refreshTokenFor(updated, verified, presented),
    );
  }

  /**
   * asks the provider for fresh tokens
   * @param record upstream grant to refresh
   * @returns the provider's token set
   * @throws {TokenInvalidError} when the client is gone
   * @throws {UpstreamRefreshFailedError} when the grant has no upstream refresh token or the provider failed
   */
  async #requestRefresh(record: UpstreamTokenRecord): Promise<UpstreamTokenSet> {
    const client = await this.#registry.lookup(record.clientId);
    if (!client) {
      throw new TokenInvalidError('client is no longer registered');
    }

    if (!record.refreshToken) {
      throw new UpstreamRefreshFailedError({
        message: 'upstream grant expired and cannot be refreshed',
      });
    }

    return this.#upstream.refresh({
      profile: client.upstream,
      refreshToken: record.refreshToken,
    });
  }

  /**
   * picks the refresh token to hand back for a record
   * @param record current upstream record
   * @param verified presented refresh token
   * @param presented presented refresh token
   * @returns the presented token while it is still the live one, otherwise a token for the live jti
   */
  async #refreshTokenFor(
    record: UpstreamTokenRecord,
    verified: VerifiedToken,
    presented: string,
  ): Promise<string> {
    if (record.refreshJti === verified.jti) {
      return presented;
    }

    const { token } = await this.#tokens.issueRefresh({
      referenceId: record.referenceId,
      clientId: record.clientId,
      scopes: record.scopes,
      jti: record.refreshJti,
    });

    return token;
  }

  /**
   * builds a token response with a new access token
   * @param record upstream record
   * @param scopes scopes for the access token
   * @param refreshToken refresh token to return
   * @returns token response
   */
  async #respond(
    record: UpstreamTokenRecord,
    scopes: string[],
    refreshToken: string,
  ): Promise<TokenResponseWire> {
    const { token, expiresIn } = await this.#tokens.issueAccess({
      referenceId: record.referenceId,
      clientId: record.clientId,
      scopes,
      claims: record.claims,
      upstreamExpiresAt: record.expiresAt,
    });

    return {
      access_token: token,
      token_type: 'Bearer',
      expires_in: expiresIn,
      refresh_token: refreshToken,
      scope: scopes.join(' '),
    };
  }

  /**
   * verifies a token of either use
   * @param token proxy token
   * @returns verified token and its use, or null when neither verifies
   */
  async #verifyAnyUse(
    token: string,
  ): Promise<(VerifiedToken & { use: 'access' | 'refresh' }) | null> {
    for (const use of ['refresh', 'access'] as const) {
      try {
        return { ...(await this.#tokens.verify(token, use)), use };
      } catch (error) {
        if (!(error instanceof TokenInvalidError)) {
          throw error;
        }
      }
    }

    return null;
  }

  /**
   * deletes a grant and its mapping, then revokes upstream on a best-effort basis
   * @param referenceId key of the grant
   */
  async #revokeGrant(referenceId: string): Promise<void> {
    const record = await this.#grants.get(referenceId);
    if (!record) {
      return;
    }

    await this.#grants.delete(referenceId);
    this.#log('info', 'grant revoked', { clientId: record.clientId });

    const client = await this.#registry.lookup(record.clientId);
    if (!client) {
      return;
    }

    try {
      await this.#upstream.revoke({
        profile: client.upstream,
        token: record.refreshToken ?? record.accessToken,
        tokenTypeHint: record.refreshToken ? 'refresh_token' : 'access_token',
      });
    } catch (error) {
      this.#log('warn', 'upstream revocation failed', describeError(error));
    }
  }
}
