import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import {
  CLIENT_REDIRECT_URI,
  authorizeOverHttp,
  createTestServer,
  obtainTokensOverHttp,
} from '../fixtures';

import type { FastifyInstance, LightMyRequestResponse } from 'fastify';

import type { FakeUpstreamProvider } from '../fixtures';

const NOW = new Date('2024-01-15T12:00:00Z');

/**
 * posts a form-encoded body to the token endpoint
 * @param server server under test
 * @param params form fields
 * @param headers extra request headers
 * @returns the response
 */
async function postToken(
  server: FastifyInstance,
  params: Record<string, string>,
  headers: Record<string, string> = {},
): Promise<LightMyRequestResponse> {
  return server.inject({
    method: 'POST',
    url: '/oauth/token',
    headers: {
      'content-type': 'application/x-www-form-urlencoded',
      ...headers,
    },
    payload: new URLSearchParams(params).toString(),
  });
}

describe('fn:handleToken', () => {
  let server: FastifyInstance;
  let upstream: FakeUpstreamProvider;

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(NOW);
    ({ server, upstream } = createTestServer());
  });

  afterEach(async () => {
    await server.close();
    vi.useRealTimers();
  });

  describe('authorization_code grant', () => {
    it('should issue proxy tokens for a form-encoded request', async () => {
      const { clientId, code, verifier } = await authorizeOverHttp(server);

      const response = await postToken(server, {
        grant_type: 'authorization_code',
        code,
        code_verifier: verifier,
        client_id: clientId,
        redirect_uri: CLIENT_REDIRECT_URI,
      });

      expect(response.statusCode).toBe(200);
      expect(response.headers['cache-control']).toBe('no-store');
      expect(response.headers.pragma).toBe('no-cache');
      expect(response.json()).toEqual({
        access_token: expect.any(String),
        token_type: 'Bearer',
        expires_in: 3600,
        refresh_token: expect.any(String),
        scope: 'read',
      });
    });

    it('should never hand out the upstream tokens', async () => {
      const { clientId, code, verifier } = await authorizeOverHttp(server);

      const response = await postToken(server, {
        grant_type: 'authorization_code',
        code,
        code_verifier: verifier,
        client_id: clientId,
        redirect_uri: CLIENT_REDIRECT_URI,
      });

      expect(response.statusCode).toBe(200);
      expect(response.body).not.toContain('upstream-access-1');
      expect(response.body).not.toContain('upstream-refresh-1');
    });

    it('should accept a json body', async () => {
      const { clientId, code, verifier } = await authorizeOverHttp(server);

      const response = await server.inject({
        method: 'POST',
        url: '/oauth/token',
        payload: {
          grant_type: 'authorization_code',
          code,
          code_verifier: verifier,
          client_id: clientId,
          redirect_uri: CLIENT_REDIRECT_URI,
        },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({ token_type: 'Bearer' });
    });

    it('should read the client id from basic authentication', async () => {
      const { clientId, code, verifier } = await authorizeOverHttp(server);
      const credentials = Buffer.from(`${clientId}:`).toString('base64');

      const response = await postToken(
        server,
        {
          grant_type: 'authorization_code',
          code,
          code_verifier: verifier,
          redirect_uri: CLIENT_REDIRECT_URI,
        },
        { authorization: `Basic ${credentials}` },
      );

      expect(response.statusCode).toBe(200);
    });

    it('should refuse a code presented by another client', async () => {
      const { code, verifier } = await authorizeOverHttp(server);

      const response = await postToken(server, {
        grant_type: 'authorization_code',
        code,
        code_verifier: verifier,
        client_id: 'dcr_other',
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({
        error: 'invalid_grant',
        error_description: 'authorization code was issued to another client',
      });
    });

    it('should require redirect_uri when the authorization request carried one', async () => {
      const { clientId, code, verifier } = await authorizeOverHttp(server);

      const response = await postToken(server, {
        grant_type: 'authorization_code',
        code,
        code_verifier: verifier,
        client_id: clientId,
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({
        error: 'invalid_grant',
        error_description:
          'redirect_uri is required when the authorization request carried one',
      });
    });

    it('should refuse a replayed code', async () => {
      const { clientId, code, verifier } = await authorizeOverHttp(server);
      const params = {
        grant_type: 'authorization_code',
        code,
        code_verifier: verifier,
        client_id: clientId,
        redirect_uri: CLIENT_REDIRECT_URI,
      };

      await postToken(server, params);
      const replay = await postToken(server, params);

      expect(replay.statusCode).toBe(400);
      expect(replay.headers['cache-control']).toBe('no-store');
      expect(replay.json()).toEqual({
        error: 'invalid_grant',
        error_description: 'authorization code has already been used',
      });
    });

    it('should require the code', async () => {
      const response = await postToken(server, {
        grant_type: 'authorization_code',
        code_verifier: 'v'.repeat(43),
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({
        error: 'invalid_request',
        error_description: 'code is required',
      });
    });

    it('should reject a repeated parameter', async () => {
      const response = await server.inject({
        method: 'POST',
        url: '/oauth/token',
        headers: { 'content-type': 'application/x-www-form-urlencoded' },
        payload: 'grant_type=authorization_code&code=a&code=b',
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({
        error: 'invalid_request',
        error_description: 'code must be a single string',
      });
    });
  });

  describe('refresh_token grant', () => {
    it('should answer from the stored grant while the upstream token is fresh', async () => {
      const { clientId, refreshToken } = await obtainTokensOverHttp(server);

      const response = await postToken(server, {
        grant_type: 'refresh_token',
        refresh_token: refreshToken,
        client_id: clientId,
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({
        token_type: 'Bearer',
        refresh_token: refreshToken,
        scope: 'read',
      });
      expect(upstream.refreshes).toHaveLength(0);
    });

    it('should answer an invalid refresh token with 401 and a challenge', async () => {
      const response = await postToken(server, {
        grant_type: 'refresh_token',
        refresh_token: 'garbage',
      });

      expect(response.statusCode).toBe(401);
      expect(response.headers['www-authenticate']).toBe(
        'Bearer error="invalid_token", error_description="invalid token"',
      );
      expect(response.json()).toEqual({
        error: 'invalid_token',
        error_description: 'invalid token',
      });
    });
  });

  it('should reject an unsupported grant type', async () => {
    const response = await postToken(server, { grant_type: 'password' });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({
      error: 'unsupported_grant_type',
      error_description: 'unsupported grant_type: password',
    });
  });

  it('should reject a request without a grant type', async () => {
    const response = await postToken(server, {});

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({
      error: 'unsupported_grant_type',
      error_description: 'unsupported grant_type: (missing)',
    });
  });
});
