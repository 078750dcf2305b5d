import fastify from 'fastify';
import { afterEach, describe, expect, it, vi } from 'vitest';

import { createFastifyLog, createLoggerConfig } from '#logging';

import { authorizeOverHttp, createTestServer } from './fixtures';

import type { Log } from '@dcrbridge/core';
import type { FastifyInstance } from 'fastify';

describe('fn:createLoggerConfig', () => {
  let server: FastifyInstance | undefined;

  afterEach(async () => {
    await server?.close();
  });

  it('should disable logging without a log function', () => {
    expect(createLoggerConfig()).toBe(false);
  });

  it('should bridge pino records to the log function', () => {
    const log = vi.fn<Log>();
    server = fastify({ logger: createLoggerConfig(log) });

    server.log.warn({ clientId: 'dcr_1' }, 'client misbehaved');

    expect(log).toHaveBeenCalledWith(
      'warn',
      'client misbehaved',
      expect.objectContaining({ clientId: 'dcr_1' }),
    );
  });

  it('should keep authorization codes out of logged request urls', async () => {
    const test = createTestServer();
    server = test.server;

    await authorizeOverHttp(server);

    const logged = JSON.stringify(test.log.mock.calls);
    expect(logged).toContain('/oauth/callback');
    expect(logged).not.toContain('upstream-code');
  });
});

describe('fn:createFastifyLog', () => {
  let server: FastifyInstance | undefined;

  afterEach(async () => {
    await server?.close();
  });

  it('should write through the fastify logger', () => {
    const log = vi.fn<Log>();
    server = fastify({ logger: createLoggerConfig(log) });

    createFastifyLog(server.log)('error', 'upstream unreachable', {
      retryable: true,
    });

    expect(log).toHaveBeenCalledWith(
      'error',
      'upstream unreachable',
      expect.objectContaining({ retryable: true }),
    );
  });
});
