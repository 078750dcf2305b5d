import { vi } from 'vitest';

import type { Mock } from 'vitest';

import { generatePkcePair } from '#pkce';
import { AuthorizationProxy } from '#proxy';

import type { SecretKey } from '#cipher';
import type { ProxyConfig, UpstreamConfig } from '#config';
import type { Log } from '#logging';
import type { RegisteredClient, UpstreamTokenSet } from '#types';
import type {
  AuthorizationUrlParams,
  CodeExchangeParams,
  UpstreamProvider,
  UpstreamRefreshParams,
  UpstreamRevokeParams,
} from '#upstream/types';

// common values for core tests

export const ISSUER = 'https://proxy.test';
export const CALLBACK_URL = 'https://proxy.test/oauth/callback';
export const CLIENT_REDIRECT_URI = 'http://localhost:9000/cb';

export const SIGNING_KEY: SecretKey = {
  id: 'sig-1',
  secret: 'test-signing-secret-0123456789abcdef',
};

export const ENCRYPTION_KEY: SecretKey = {
  id: 'enc-1',
  secret: 'test-encryption-secret-0123456789ab',
};

export const UPSTREAM_CONFIG: UpstreamConfig = {
  authorizationEndpoint: 'https://upstream.test/authorize',
  tokenEndpoint: 'https://upstream.test/token',
  clientId: 'upstream-client',
  clientSecret: 'test-secret',
};

export const UPSTREAM_CLAIMS = {
  sub: 'user-123',
  email: 'user@example.com',
};

/**
 * builds an upstream token set
 * @param overrides fields to replace
 * @returns token set as an upstream provider returns it
 */
export function createTokenSet(
  overrides: Partial<UpstreamTokenSet> = {},
): UpstreamTokenSet {
  return {
    accessToken: 'upstream-access-1',
    refreshToken: 'upstream-refresh-1',
    expiresIn: 3600,
    scopes: ['read'],
    claims: { ...UPSTREAM_CLAIMS },
    ...overrides,
  };
}

/** in-process stand-in for the upstream provider */
export class FakeUpstreamProvider implements UpstreamProvider {
  public exchanges: CodeExchangeParams[] = [];
  public refreshes: UpstreamRefreshParams[] = [];
  public revocations: UpstreamRevokeParams[] = [];

  public exchangeResult: () => UpstreamTokenSet = () => createTokenSet();
  public refreshResult: (params: UpstreamRefreshParams) => UpstreamTokenSet =
    () =>
      createTokenSet({ accessToken: 'upstream-access-2', refreshToken: undefined });
  /** awaited by every refresh call after it is recorded */
  public beforeRefresh: (params: UpstreamRefreshParams) => Promise<void> =
    async () => Promise.resolve();

  public buildAuthorizationUrl(params: AuthorizationUrlParams): string {
    const url = new URL('https://upstream.test/authorize');
    url.searchParams.set('client_id', params.profile.clientId);
    url.searchParams.set('redirect_uri', params.redirectUri);
    url.searchParams.set('state', params.state);
    url.searchParams.set('code_challenge', params.codeChallenge);
    url.searchParams.set('code_challenge_method', params.codeChallengeMethod);
    url.searchParams.set('scope', params.scopes.join(' '));

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
    // yield so concurrent callers can interleave
    await this.beforeRefresh(params);

    return this.refreshResult(params);
  }

  public async revoke(params: UpstreamRevokeParams): Promise<void> {
    this.revocations.push(params);
  }
}

/**
 * creates a proxy backed by memory stores and a fake provider
 * @param overrides configuration to replace
 * @returns the proxy, its fake provider and its log spy
 */
export function createTestProxy(overrides: Partial<ProxyConfig> = {}): {
  proxy: AuthorizationProxy;
  upstream: FakeUpstreamProvider;
  log: Mock<Log>;
} {
  const upstream = new FakeUpstreamProvider();
  const log = vi.fn<Log>();
  const proxy = new AuthorizationProxy({
    issuer: ISSUER,
    upstream: UPSTREAM_CONFIG,
    signingKeys: [SIGNING_KEY],
    encryptionKeys: [ENCRYPTION_KEY],
    upstreamProvider: upstream,
    log,
    ...overrides,
  });

  return { proxy, upstream, log };
}

/**
 * runs register, authorize and callback
 * @param proxy proxy under test
 * @returns the registered client, the proxy code and the client's verifier
 */
export async function completeAuthorization(proxy: AuthorizationProxy): Promise<{
  client: RegisteredClient;
  code: string;
  verifier: string;
  upstreamUrl: URL;
}> {
  const client = await proxy.register({ redirectUris: [CLIENT_REDIRECT_URI] });
  const pkce = generatePkcePair();

  const { redirectTo } = await proxy.authorize({
    clientId: client.clientId,
    redirectUri: CLIENT_REDIRECT_URI,
    responseType: 'code',
    state: 'client-state',
    codeChallenge: pkce.challenge,
    codeChallengeMethod: 'S256',
    scope: 'read',
  });
  const upstreamUrl = new URL(redirectTo);

  const callback = await proxy.callback({
    code: 'upstream-code',
    state: upstreamUrl.searchParams.get('state') ?? undefined,
  });
  const code = new URL(callback.redirectTo).searchParams.get('code');
  if (!code) {
    throw new Error(`callback did not issue a code: ${callback.redirectTo}`);
  }

  return { client, code, verifier: pkce.verifier, upstreamUrl };
}
