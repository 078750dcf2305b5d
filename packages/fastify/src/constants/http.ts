// status codes the proxy routes answer with; redirects use fastify's default 302 //

/** successful token, revocation, metadata and client info responses */
export const HTTP_OK = 200;

/** a client was registered */
export const HTTP_CREATED = 201;

/**
 * malformed request
 * @example
 * ```typescript
 * reply.code(HTTP_BAD_REQUEST).send({ error: 'invalid_request', error_description: 'code is required' });
 * ```
 */
export const HTTP_BAD_REQUEST = 400;

/** the bearer token is valid but lacks a required scope */
export const HTTP_FORBIDDEN = 403;

/** unknown route or client */
export const HTTP_NOT_FOUND = 404;

/** unexpected failure while serving a request */
export const HTTP_INTERNAL_SERVER_ERROR = 500;
