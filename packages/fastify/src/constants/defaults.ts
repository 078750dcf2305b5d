/**
 * default HTTP server port
 * @description used when DCRBRIDGE_PORT is not set.
 */
export const DEFAULT_HTTP_PORT = 8080;
/**
 * default HTTP server host address
 * @description binds every interface when DCRBRIDGE_HOST is not set.
 * @example
 * ```typescript
 * const host = process.env.DCRBRIDGE_HOST ?? DEFAULT_HOST;
 * ```
 */
export const DEFAULT_HOST = '0.0.0.0';
/**
 * default directory of the file-backed store
 * @description holds registered clients and upstream grants across restarts.
 */
export const DEFAULT_DATA_DIR = './data';
/** default fastify log level of the cli */
export const DEFAULT_LOG_LEVEL = 'info';
