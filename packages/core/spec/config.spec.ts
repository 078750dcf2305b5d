import { describe, expect, it } from 'vitest';

import { validateProxyConfig } from '#config';

import { ENCRYPTION_KEY, SIGNING_KEY } from './fixtures';

import type { ProxyConfig } from '#config';

const createConfig = (overrides: Partial<ProxyConfig> = {}): ProxyConfig => ({
  issuer: 'https://proxy.test/',
  upstream: {
    authorizationEndpoint: 'https://upstream.test/authorize',
    tokenEndpoint: 'https://upstream.test/token',
    clientId: 'upstream-client',
    clientSecret: 'test-secret',
  },
  signingKeys: [SIGNING_KEY],
  encryptionKeys: [ENCRYPTION_KEY],
  ...overrides,
});

describe('fn:validateProxyConfig', () => {
  it('should apply defaults', () => {
    const resolved = validateProxyConfig(createConfig());

    expect(resolved).toMatchObject({
      issuer: 'https://proxy.test',
      upstream: {
        tokenEndpointAuthMethod: 'client_secret_basic',
        forwardClientPkce: false,
        timeoutMs: 10_000,
        callbackUrl: 'https://proxy.test/oauth/callback',
      },
      defaultScopes: [],
      transactionTtlSeconds: 600,
      codeTtlSeconds: 60,
      accessTokenTtlSeconds: 3600,
      refreshTokenTtlSeconds: 2_592_000,
      revokeOnCodeReplay: true,
    });
    expect(resolved.redirectPatterns).toBeUndefined();
  });

  it('should keep an explicit callback url', () => {
    const resolved = validateProxyConfig(
      createConfig({
        upstream: {
          ...createConfig().upstream,
          callbackUrl: 'https://auth.proxy.test/cb',
        },
      }),
    );

    expect(resolved.upstream.callbackUrl).toBe('https://auth.proxy.test/cb');
  });

  it('should compile redirect patterns', () => {
    const resolved = validateProxyConfig(
      createConfig({ allowedRedirectPatterns: ['http://localhost:*'] }),
    );

    expect(resolved.redirectPatterns).toEqual([
      expect.objectContaining({ host: 'localhost', port: null }),
    ]);
  });

  it('should reject an overly broad redirect pattern', () => {
    expect(() =>
      validateProxyConfig(
        createConfig({ allowedRedirectPatterns: ['https://*.com/*'] }),
      ),
    ).toThrow('redirect pattern wildcard is too broad');
  });

  it('should reject a relative issuer', () => {
    expect(() =>
      validateProxyConfig(createConfig({ issuer: '/proxy' })),
    ).toThrow('issuer must be an absolute url: /proxy');
  });

  it('should reject a non-http upstream endpoint', () => {
    expect(() =>
      validateProxyConfig(
        createConfig({
          upstream: {
            ...createConfig().upstream,
            tokenEndpoint: 'ftp://upstream.test/token',
          },
        }),
      ),
    ).toThrow('upstream.tokenEndpoint must use http or https');
  });

  it('should require the upstream credential', () => {
    expect(() =>
      validateProxyConfig(
        createConfig({
          upstream: { ...createConfig().upstream, clientSecret: '' },
        }),
      ),
    ).toThrow('upstream.clientSecret is required');
  });

  it('should keep the transaction lifetime between five and ten minutes', () => {
    expect(() =>
      validateProxyConfig(createConfig({ transactionTtlSeconds: 299 })),
    ).toThrow('transactionTtlSeconds must be between 300 and 600');
    expect(() =>
      validateProxyConfig(createConfig({ transactionTtlSeconds: 601 })),
    ).toThrow('transactionTtlSeconds must be between 300 and 600');
    expect(
      validateProxyConfig(createConfig({ transactionTtlSeconds: 300 }))
        .transactionTtlSeconds,
    ).toBe(300);
  });

  it('should reject non-positive token lifetimes', () => {
    expect(() =>
      validateProxyConfig(createConfig({ accessTokenTtlSeconds: 0 })),
    ).toThrow('accessTokenTtlSeconds must be a positive integer');
  });

  it('should require signing keys', () => {
    expect(() => validateProxyConfig(createConfig({ signingKeys: [] }))).toThrow(
      'at least one signing key is required',
    );
  });

  it('should keep default scopes within the allowed ones', () => {
    expect(() =>
      validateProxyConfig(
        createConfig({ allowedScopes: ['read'], defaultScopes: ['read', 'admin'] }),
      ),
    ).toThrow('default scope admin is not in allowedScopes');
  });
});
