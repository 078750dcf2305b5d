import { afterEach, describe, expect, it } from 'vitest';

import { createProtectedResourceMetadata } from '#handlers/metadata';

import { ISSUER, createTestServer } from '../fixtures';

import type { FastifyInstance } from 'fastify';

describe('fn:handleAuthorizationServerMetadata', () => {
  let server: FastifyInstance | undefined;

  afterEach(async () => {
    await server?.close();
  });

  it('should describe the proxy as the authorization server', async () => {
    ({ server } = createTestServer());

    const response = await server.inject({
      method: 'GET',
      url: '/.well-known/oauth-authorization-server',
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      issuer: ISSUER,
      authorization_endpoint: `${ISSUER}/oauth/authorize`,
      token_endpoint: `${ISSUER}/oauth/token`,
      registration_endpoint: `${ISSUER}/oauth/register`,
      revocation_endpoint: `${ISSUER}/oauth/revoke`,
      response_types_supported: ['code'],
      grant_types_supported: ['authorization_code', 'refresh_token'],
      code_challenge_methods_supported: ['S256'],
      token_endpoint_auth_methods_supported: ['none'],
      revocation_endpoint_auth_methods_supported: ['none'],
    });
  });

  it('should list the allowed scopes', async () => {
    ({ server } = createTestServer({ allowedScopes: ['read', 'write'] }));

    const response = await server.inject({
      method: 'GET',
      url: '/.well-known/oauth-authorization-server',
    });

    expect(response.json()).toMatchObject({
      scopes_supported: ['read', 'write'],
    });
  });

  it('should not mention the upstream provider', async () => {
    ({ server } = createTestServer());

    const response = await server.inject({
      method: 'GET',
      url: '/.well-known/oauth-authorization-server',
    });

    expect(response.body).not.toContain('upstream.test');
  });
});

describe('fn:handleProtectedResourceMetadata', () => {
  let server: FastifyInstance | undefined;

  afterEach(async () => {
    await server?.close();
  });

  it('should point at the proxy as the authorization server', async () => {
    ({ server } = createTestServer());

    const response = await server.inject({
      method: 'GET',
      url: '/.well-known/oauth-protected-resource',
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      resource: ISSUER,
      authorization_servers: [ISSUER],
      bearer_methods_supported: ['header'],
    });
  });
});

describe('fn:createProtectedResourceMetadata', () => {
  it('should take the resource and scopes from the options', async () => {
    const { server, proxy } = createTestServer({ allowedScopes: ['read'] });

    expect(
      createProtectedResourceMetadata(proxy, {
        resource: 'https://api.test/mcp',
        scopes: ['tools'],
      }),
    ).toEqual({
      resource: 'https://api.test/mcp',
      authorization_servers: [ISSUER],
      bearer_methods_supported: ['header'],
      scopes_supported: ['tools'],
    });

    await server.close();
  });

  it('should fall back to the allowed scopes', async () => {
    const { server, proxy } = createTestServer({ allowedScopes: ['read'] });

    expect(createProtectedResourceMetadata(proxy).scopes_supported).toEqual([
      'read',
    ]);

    await server.close();
  });
});
