import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { createRequireAuth } from '#middleware';

import { createTestServer, obtainTokensOverHttp } from './fixtures';

import type { FastifyInstance } from 'fastify';

describe('fn:createRequireAuth', () => {
  let server: FastifyInstance;

  beforeEach(() => {
    const test = createTestServer();
    server = test.server;

    server.get(
      '/resource',
      { preHandler: createRequireAuth(test.proxy, { requiredScopes: ['read'] }) },
      async (request) => ({
        subject: request.auth?.subject,
        scopes: request.auth?.scopes,
      }),
    );
    server.get(
      '/admin',
      { preHandler: createRequireAuth(test.proxy, { requiredScopes: ['admin'] }) },
      async () => ({ ok: true }),
    );
  });

  afterEach(async () => {
    await server.close();
  });

  it('should expose the identity behind a valid access token', async () => {
    const { accessToken } = await obtainTokensOverHttp(server);

    const response = await server.inject({
      method: 'GET',
      url: '/resource',
      headers: { authorization: `Bearer ${accessToken}` },
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ subject: 'user-123', scopes: ['read'] });
  });

  it('should challenge a request without a token', async () => {
    const response = await server.inject({ method: 'GET', url: '/resource' });

    expect(response.statusCode).toBe(401);
    expect(response.headers['www-authenticate']).toBe(
      'Bearer error="invalid_token", error_description="bearer token is required"',
    );
    expect(response.json()).toEqual({
      error: 'invalid_token',
      error_description: 'bearer token is required',
    });
  });

  it('should challenge a malformed token', async () => {
    const response = await server.inject({
      method: 'GET',
      url: '/resource',
      headers: { authorization: 'Bearer garbage' },
    });

    expect(response.statusCode).toBe(401);
    expect(response.json()).toEqual({
      error: 'invalid_token',
      error_description: 'invalid token',
    });
  });

  it('should refuse a refresh token presented as a bearer token', async () => {
    const { refreshToken } = await obtainTokensOverHttp(server);

    const response = await server.inject({
      method: 'GET',
      url: '/resource',
      headers: { authorization: `Bearer ${refreshToken}` },
    });

    expect(response.statusCode).toBe(401);
    expect(response.json()).toEqual({
      error: 'invalid_token',
      error_description: 'token is not valid for access',
    });
  });

  it('should answer 403 when a required scope is missing', async () => {
    const { accessToken } = await obtainTokensOverHttp(server);

    const response = await server.inject({
      method: 'GET',
      url: '/admin',
      headers: { authorization: `Bearer ${accessToken}` },
    });

    expect(response.statusCode).toBe(403);
    expect(response.headers['www-authenticate']).toBe(
      'Bearer error="insufficient_scope", error_description="required scope(s): admin", scope="admin"',
    );
    expect(response.json()).toEqual({
      error: 'insufficient_scope',
      error_description: 'required scope(s): admin',
    });
  });
});
