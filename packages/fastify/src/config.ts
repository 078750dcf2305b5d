/**
 * @module config
 * @description Reads the proxy and server settings from DCRBRIDGE_* environment variables.
 */

import {
  DEFAULT_DATA_DIR,
  DEFAULT_HOST,
  DEFAULT_HTTP_PORT,
  DEFAULT_LOG_LEVEL,
} from '#constants/defaults';

import type { ProxyConfig, SecretKey, UpstreamAuthMethod } from '@dcrbridge/core';

const PREFIX = 'DCRBRIDGE_';

/** settings of the listening server */
export interface ServerSettings {
  host: string;
  port: number;
  /** directory of the file-backed persistent store */
  dataDir: string;
  logLevel: string;
}

/** everything the cli needs to start */
export interface EnvConfig {
  /** proxy configuration without backends, which the caller provides */
  proxy: ProxyConfig;
  server: ServerSettings;
}

/** reads DCRBRIDGE_* variables out of one environment */
class EnvReader {
  readonly #env: NodeJS.ProcessEnv;

  constructor(env: NodeJS.ProcessEnv) {
    this.#env = env;
  }

  public optional(name: string): string | undefined {
    const value = this.#env[PREFIX + name]?.trim();

    return value ? value : undefined;
  }

  public required(name: string): string {
    const value = this.optional(name);
    if (value === undefined) {
      throw new Error(`${PREFIX + name} is required`);
    }

    return value;
  }

  public integer(name: string): number | undefined {
    const value = this.optional(name);
    if (value === undefined) {
      return undefined;
    }

    if (!/^\d+$/.test(value)) {
      throw new Error(`${PREFIX + name} must be a non-negative integer`);
    }

    return Number(value);
  }

  public boolean(name: string): boolean | undefined {
    const value = this.optional(name)?.toLowerCase();
    switch (value) {
      case undefined:
        return undefined;
      case 'true':
      case '1':
        return true;
      case 'false':
      case '0':
        return false;
      default:
        throw new Error(`${PREFIX + name} must be true or false`);
    }
  }

  /** comma or whitespace separated */
  public list(name: string): string[] | undefined {
    const value = this.optional(name);

    return value?.split(/[\s,]+/).filter((item) => item.length > 0);
  }

  /** comma separated id:secret pairs, the first one active */
  public keys(name: string): SecretKey[] {
    return this.required(name)
      .split(',')
      .map((entry) => {
        const separator = entry.indexOf(':');
        if (separator <= 0) {
          throw new Error(`${PREFIX + name} entries must look like id:secret`);
        }

        return {
          id: entry.slice(0, separator).trim(),
          secret: entry.slice(separator + 1).trim(),
        };
      });
  }

  public authMethod(name: string): UpstreamAuthMethod | undefined {
    const value = this.optional(name);
    if (
      value === undefined ||
      value === 'client_secret_basic' ||
      value === 'client_secret_post'
    ) {
      return value;
    }

    throw new Error(
      `${PREFIX + name} must be client_secret_basic or client_secret_post`,
    );
  }
}

/**
 * loads the proxy configuration from the environment
 * the result still passes through the proxy's own validation when it is constructed
 * @param env environment to read, defaults to process.env
 * @returns proxy and server settings
 * @throws {Error} when a required variable is missing or a value is malformed
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const read = new EnvReader(env);

  return {
    proxy: {
      issuer: read.required('ISSUER'),
      upstream: {
        authorizationEndpoint: read.required('UPSTREAM_AUTHORIZATION_ENDPOINT'),
        tokenEndpoint: read.required('UPSTREAM_TOKEN_ENDPOINT'),
        userinfoEndpoint: read.optional('UPSTREAM_USERINFO_ENDPOINT'),
        revocationEndpoint: read.optional('UPSTREAM_REVOCATION_ENDPOINT'),
        clientId: read.required('UPSTREAM_CLIENT_ID'),
        clientSecret: read.required('UPSTREAM_CLIENT_SECRET'),
        tokenEndpointAuthMethod: read.authMethod('UPSTREAM_AUTH_METHOD'),
        forwardClientPkce: read.boolean('UPSTREAM_FORWARD_PKCE'),
        timeoutMs: read.integer('UPSTREAM_TIMEOUT_MS'),
        callbackUrl: read.optional('UPSTREAM_CALLBACK_URL'),
      },
      signingKeys: read.keys('SIGNING_KEYS'),
      encryptionKeys: read.keys('ENCRYPTION_KEYS'),
      allowedRedirectPatterns: read.list('ALLOWED_REDIRECT_PATTERNS'),
      allowedScopes: read.list('ALLOWED_SCOPES'),
      defaultScopes: read.list('DEFAULT_SCOPES'),
      transactionTtlSeconds: read.integer('TRANSACTION_TTL_SECONDS'),
      codeTtlSeconds: read.integer('CODE_TTL_SECONDS'),
      accessTokenTtlSeconds: read.integer('ACCESS_TOKEN_TTL_SECONDS'),
      refreshTokenTtlSeconds: read.integer('REFRESH_TOKEN_TTL_SECONDS'),
      revokeOnCodeReplay: read.boolean('REVOKE_ON_CODE_REPLAY'),
    },
    server: {
      host: read.optional('HOST') ?? DEFAULT_HOST,
      port: read.integer('PORT') ?? DEFAULT_HTTP_PORT,
      dataDir: read.optional('DATA_DIR') ?? DEFAULT_DATA_DIR,
      logLevel: read.optional('LOG_LEVEL') ?? DEFAULT_LOG_LEVEL,
    },
  };
}
