import { generatePkcePair } from '@dcrbridge/core';
import { vi } from 'vitest';

import type { Mock } from 'vitest';

import { createProxyServer } from '#server';

import type {
  AuthorizationProxy,
  AuthorizationUrlParams,
  CodeExchangeParams,
  Log,
  ProxyConfig,
  UpstreamProvider,
  UpstreamRefreshParams,
  UpstreamRevokeParams,
  UpstreamTokenSet,
} from '@dcrbridge/core';
import type { FastifyInstance } from 'fastify';

// common values for route tests

export const ISSUER = 'https://proxy.test';
export const CLIENT_REDIRECT_URI = 'http://localhost:9000/cb';

/** in-process stand-in for the upstream provider */
export class FakeUpstreamProvider implements UpstreamProvider {
  public exchanges: CodeExchangeParams[] = [];
  public refreshes: UpstreamRefreshParams[] = [];
  public revocations: UpstreamRevokeParams[] = [];

  public exchangeResult: () => UpstreamTokenSet = () => ({
    accessToken: 'upstream-access-1',
    refreshToken: 'upstream-refresh-1',
    expiresIn: 3600,
    scopes: ['read'],
    claims: { sub: 'user-123' },
  });

  public buildAuthorizationUrl(params: AuthorizationUrlParams): string {
    const url = new URL('https://upstream.test/authorize');
    url.searchParams.set('client_id', params.profile.clientId);
    url.searchParams.set('redirect_uri', params.redirectUri);
    url.searchParams.set('state', params.state);
    url.searchParams.set('code_challenge', params.codeChallenge);

    return url.toString();
  }

  public async exchangeCode(
    params: CodeExchangeParams,
  ): Promise<UpstreamTokenSet> {
    this.exchanges.push(params);

    return this.exchangeResult();
  }

  public async refresh(
    params: UpstreamRefreshParams,
  ): Promise<UpstreamTokenSet> {
    this.refreshes.push(params);

    return { accessToken: 'upstream-access-2', expiresIn: 3600, claims: {} };
  }

  public async revoke(params: UpstreamRevokeParams): Promise<void> {
    this.revocations.push(params);
  }
}

/**
 * creates a proxy server backed by memory stores and a fake provider
 * @param overrides proxy configuration to replace
 * @returns the server, its proxy, the fake provider and the log spy
 */
export function createTestServer(overrides: Partial<ProxyConfig> = {}): {
  server: FastifyInstance;
  proxy: AuthorizationProxy;
  upstream: FakeUpstreamProvider;
  log: Mock<Log>;
} {
  const upstream = new FakeUpstreamProvider();
  const log = vi.fn<Log>();
  const { server, proxy } = createProxyServer({
    config: {
      issuer: ISSUER,
      upstream: {
        authorizationEndpoint: 'https://upstream.test/authorize',
        tokenEndpoint: 'https://upstream.test/token',
        clientId: 'upstream-client',
        clientSecret: 'test-secret',
      },
      signingKeys: [
        { id: 'sig-1', secret: 'test-signing-secret-0123456789abcdef' },
      ],
      encryptionKeys: [
        { id: 'enc-1', secret: 'test-encryption-secret-0123456789ab' },
      ],
      upstreamProvider: upstream,
      ...overrides,
    },
    log,
  });

  return { server, proxy, upstream, log };
}

/**
 * registers a client over http
 * @param server server under test
 * @returns the issued client id
 */
export async function registerClient(server: FastifyInstance): Promise<string> {
  const response = await server.inject({
    method: 'POST',
    url: '/oauth/register',
    payload: { redirect_uris: [CLIENT_REDIRECT_URI] },
  });
  const { client_id: clientId } = response.json<{ client_id: string }>();

  return clientId;
}

/**
 * runs registration, authorization and the provider callback over http
 * @param server server under test
 * @returns the client id, the proxy code and the client's verifier
 */
export async function authorizeOverHttp(server: FastifyInstance): Promise<{
  clientId: string;
  code: string;
  verifier: string;
}> {
  const clientId = await registerClient(server);
  const pkce = generatePkcePair();

  const authorize = await server.inject({
    method: 'GET',
    url: '/oauth/authorize',
    query: {
      client_id: clientId,
      redirect_uri: CLIENT_REDIRECT_URI,
      response_type: 'code',
      state: 'client-state',
      code_challenge: pkce.challenge,
      code_challenge_method: 'S256',
      scope: 'read',
    },
  });
  const state = new URL(String(authorize.headers.location)).searchParams.get(
    'state',
  );

  const callback = await server.inject({
    method: 'GET',
    url: '/oauth/callback',
    query: { code: 'upstream-code', state: state ?? '' },
  });
  const code = new URL(String(callback.headers.location)).searchParams.get(
    'code',
  );
  if (!code) {
    throw new Error(`callback did not issue a code: ${callback.body}`);
  }

  return { clientId, code, verifier: pkce.verifier };
}

/**
 * runs the whole flow up to the first token response over http
 * @param server server under test
 * @returns the token response and the client id
 */
export async function obtainTokensOverHttp(server: FastifyInstance): Promise<{
  clientId: string;
  accessToken: string;
  refreshToken: string;
}> {
  const { clientId, code, verifier } = await authorizeOverHttp(server);

  const response = await server.inject({
    method: 'POST',
    url: '/oauth/token',
    headers: { 'content-type': 'application/x-www-form-urlencoded' },
    payload: new URLSearchParams({
      grant_type: 'authorization_code',
      code,
      code_verifier: verifier,
      client_id: clientId,
      redirect_uri: CLIENT_REDIRECT_URI,
    }).toString(),
  });
  const tokens = response.json<{ access_token: string; refresh_token: string }>();

  return {
    clientId,
    accessToken: tokens.access_token,
    refreshToken: tokens.refresh_token,
  };
}
