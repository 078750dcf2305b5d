import { isJsonObject } from '@dcrbridge/core';

import { HTTP_NOT_FOUND } from '#constants/http';

import type { Log, LogLevel } from '@dcrbridge/core';
import type {
  FastifyBaseLogger,
  FastifyInstance,
  FastifyServerOptions,
} from 'fastify';

const LOG_LEVELS: readonly string[] = [
  'trace',
  'debug',
  'info',
  'warn',
  'error',
  'fatal',
] satisfies LogLevel[];

/**
 * checks a pino level label
 * @param value label to check
 * @returns true when the label is a known log level
 */
function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.includes(value);
}

/**
 * drops the query string of a logged url, callbacks carry authorization codes there
 * @param url request url
 * @returns the path alone
 */
function stripQuery(url: string | undefined): string | undefined {
  return url?.split('?')[0];
}

/**
 * summarises a request for the log without its query string
 * @param request incoming request
 * @param request.method http method
 * @param request.url request url
 * @returns method and path
 */
function serializeRequest(request: { method?: string; url?: string }): {
  method?: string;
  url?: string;
} {
  return { method: request.method, url: stripQuery(request.url) };
}

/**
 * creates configuration for fastify's own pino logger
 * @param level minimum level to write
 * @returns fastify logger configuration object
 */
export function createPinoConfig(level: string): FastifyServerOptions['logger'] {
  return {
    level,
    serializers: {
      req: serializeRequest,
    },
  };
}

/**
 * creates fastify logger configuration that bridges to a custom log function
 * when no log function is provided, logging is disabled
 * @param log optional custom logging function
 * @returns fastify logger configuration object
 * @example
 * ```typescript
 * const server = fastify({
 *   logger: createLoggerConfig((level, message, meta) => {
 *     console.log(`[${level}] ${message}`, meta);
 *   }),
 * });
 * ```
 */
export function createLoggerConfig(log?: Log): FastifyServerOptions['logger'] {
  if (!log) {
    return false;
  }

  return {
    level: 'trace',
    messageKey: 'message',
    errorKey: 'error',
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    serializers: {
      req: serializeRequest,
    },
    // bridge fastify's pino logger to our custom Log function
    stream: {
      write: (line: string) => {
        let parsed: unknown;
        try {
          parsed = JSON.parse(line);
        } catch {
          // fallback for non-JSON log lines
          log('info', line.trim());

          return;
        }

        if (!isJsonObject(parsed)) {
          log('info', line.trim());

          return;
        }

        const { level, message, ...meta } = parsed;

        log(
          isLogLevel(level) ? level : 'info',
          typeof message === 'string' ? message : '',
          Object.keys(meta).length > 0 ? meta : undefined,
        );
      },
    },
  };
}

/**
 * exposes fastify's logger as a log function for the proxy
 * @param logger fastify (pino) logger
 * @returns log function writing through the logger
 */
export function createFastifyLog(logger: FastifyBaseLogger): Log {
  return (level, message, meta) => {
    logger[level](meta ?? {}, message);
  };
}

/**
 * sets up the catch-all route handler for undefined routes
 * @param server the fastify server instance to configure
 */
export function setupNotFoundHandler(server: FastifyInstance): void {
  server.setNotFoundHandler(async (request, reply) => {
    return reply.code(HTTP_NOT_FOUND).send({
      error: 'not_found',
      error_description: `route ${request.method} ${request.url} not found`,
    });
  });
}
