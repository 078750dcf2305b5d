/**
 * @module tokens
 * @description Proxy-issued access and refresh tokens. HS256 JWTs whose subject is the reference id
 * of an upstream grant; the upstream tokens themselves never leave the proxy.
 */

import { SignJWT, errors, jwtVerify } from 'jose';

import { assertSecretKeys } from '#cipher';
import {
  DEFAULT_ACCESS_TOKEN_TTL_SECONDS,
  DEFAULT_REFRESH_TOKEN_TTL_SECONDS,
  MS_PER_SECOND,
} from '#constants';
import { TokenInvalidError } from '#errors';
import { generateOpaqueId } from '#id';
import { isJsonObject, parseScope } from '#validation';

import type { JWTPayload, JWTVerifyGetKey } from 'jose';

import type { SecretKey } from '#cipher';
import type { JsonObject } from '#types';

const ALGORITHM = 'HS256';

/** what a proxy token may be used for */
export type TokenUse = 'access' | 'refresh';

/** configuration options for the token issuer */
export interface TokenIssuerOptions {
  /** signing keys, the first one active */
  keys: SecretKey[];
  /** iss claim, the proxy's public base url */
  issuer: string;
  /** aud claim, defaults to the issuer */
  audience?: string;
  accessTokenTtlSeconds?: number;
  refreshTokenTtlSeconds?: number;
}

/** what an access token asserts */
export interface AccessGrant {
  referenceId: string;
  clientId: string;
  scopes: string[];
  /** upstream identity claims carried through unchanged */
  claims: JsonObject;
  /** epoch milliseconds the upstream access token dies, null when unknown */
  upstreamExpiresAt: number | null;
}

/** what a refresh token asserts */
export interface RefreshGrant {
  referenceId: string;
  clientId: string;
  scopes: string[];
  /** reuse an existing token id instead of minting a fresh one */
  jti?: string;
}

/** the verified content of a proxy token */
export interface VerifiedToken {
  referenceId: string;
  clientId: string;
  scopes: string[];
  jti: string;
  claims: JsonObject;
  /** epoch seconds */
  expiresAt: number;
}

/** signs and verifies proxy tokens with a rotatable key list */
export class TokenIssuer {
  readonly #activeKeyId: string;
  readonly #activeSecret: Uint8Array;
  readonly #keys: Map<string, Uint8Array>;
  readonly #issuer: string;
  readonly #audience: string;
  readonly #accessTtl: number;
  readonly #refreshTtl: number;

  constructor(options: TokenIssuerOptions) {
    assertSecretKeys(options.keys, 'signing');

    const encoder = new TextEncoder();
    this.#activeKeyId = options.keys[0].id;
    this.#activeSecret = encoder.encode(options.keys[0].secret);
    this.#keys = new Map(
      options.keys.map((key) => [key.id, encoder.encode(key.secret)]),
    );
    this.#issuer = options.issuer;
    this.#audience = options.audience ?? options.issuer;
    this.#accessTtl =
      options.accessTokenTtlSeconds ?? DEFAULT_ACCESS_TOKEN_TTL_SECONDS;
    this.#refreshTtl =
      options.refreshTokenTtlSeconds ?? DEFAULT_REFRESH_TOKEN_TTL_SECONDS;
  }

  /**
   * issues an access token that never outlives the upstream token behind it
   * @param grant what the token asserts
   * @returns signed token and its lifetime in seconds
   */
  public async issueAccess(
    grant: AccessGrant,
  ): Promise<{ token: string; expiresIn: number }> {
    const now = Date.now();
    const expiresIn =
      grant.upstreamExpiresAt === null
        ? this.#accessTtl
        : Math.max(
            1,
            Math.min(
              this.#accessTtl,
              Math.floor((grant.upstreamExpiresAt - now) / MS_PER_SECOND),
            ),
          );

    const token = await this.#sign(
      {
        scope: grant.scopes.join(' '),
        client_id: grant.clientId,
        token_use: 'access',
        upstream: grant.claims,
      },
      grant.referenceId,
      generateOpaqueId(16),
      now,
      expiresIn,
    );

    return { token, expiresIn };
  }

  /**
   * issues a refresh token
   * @param grant what the token asserts
   * @returns signed token and its id
   */
  public async issueRefresh(
    grant: RefreshGrant,
  ): Promise<{ token: string; jti: string }> {
    const jti = grant.jti ?? generateOpaqueId();
    const token = await this.#sign(
      {
        scope: grant.scopes.join(' '),
        client_id: grant.clientId,
        token_use: 'refresh',
      },
      grant.referenceId,
      jti,
      Date.now(),
      this.#refreshTtl,
    );

    return { token, jti };
  }

  /**
   * checks a token's signature, lifetime, issuer, audience and use
   * @param token compact jwt
   * @param use expected token use
   * @returns the verified claims
   * @throws {TokenInvalidError} when any check fails
   */
  public async verify(token: string, use: TokenUse): Promise<VerifiedToken> {
    let payload: JWTPayload;
    try {
      ({ payload } = await jwtVerify(token, this.#resolveKey, {
        algorithms: [ALGORITHM],
        issuer: this.#issuer,
        audience: this.#audience,
      }));
    } catch (error) {
      if (error instanceof TokenInvalidError) {
        throw error;
      }

      throw new TokenInvalidError(
        error instanceof errors.JWTExpired ? 'token expired' : 'invalid token',
      );
    }

    const { sub, jti, exp, scope, client_id: clientId, token_use: tokenUse } =
      payload;
    if (
      typeof sub !== 'string' ||
      typeof jti !== 'string' ||
      typeof exp !== 'number' ||
      typeof scope !== 'string' ||
      typeof clientId !== 'string'
    ) {
      throw new TokenInvalidError('token is missing required claims');
    }

    if (tokenUse !== use) {
      throw new TokenInvalidError(`token is not valid for ${use}`);
    }

    return {
      referenceId: sub,
      clientId,
      scopes: parseScope(scope),
      jti,
      claims: isJsonObject(payload.upstream) ? payload.upstream : {},
      expiresAt: exp,
    };
  }

  readonly #resolveKey: JWTVerifyGetKey = (header) => {
    const key = header.kid === undefined ? undefined : this.#keys.get(header.kid);
    if (!key) {
      throw new TokenInvalidError('token signed with an unknown key');
    }

    return key;
  };

  async #sign(
    claims: JWTPayload,
    subject: string,
    jti: string,
    now: number,
    ttlSeconds: number,
  ): Promise<string> {
    const issuedAt = Math.floor(now / MS_PER_SECOND);

    return new SignJWT(claims)
      .setProtectedHeader({
        alg: ALGORITHM,
        kid: this.#activeKeyId,
        typ: 'JWT',
      })
      .setSubject(subject)
      .setJti(jti)
      .setIssuer(this.#issuer)
      .setAudience(this.#audience)
      .setIssuedAt(issuedAt)
      .setExpirationTime(issuedAt + ttlSeconds)
      .sign(this.#activeSecret);
  }
}
