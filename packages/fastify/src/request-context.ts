import type { IncomingHttpHeaders } from 'node:http';

import type { FastifyRequest } from 'fastify';

/**
 * extracts the last value from http headers when multiple values exist
 * @param headers incoming http headers object
 * @param header header name to extract
 * @returns last header value or undefined if not found
 */
export function lastHeader(
  headers: IncomingHttpHeaders,
  header: string,
): string | undefined {
  const value = headers[header.toLowerCase()];

  return Array.isArray(value) ? value[value.length - 1] : value;
}

/**
 * extracts bearer token from authorization header
 * @param header authorization header value
 * @returns extracted token or undefined if invalid format
 */
export function extractBearerToken(
  header: string | undefined,
): string | undefined {
  if (!header?.match(/^bearer /i)) {
    return undefined;
  }

  return header.replace(/^bearer /i, '').trim() || undefined;
}

/**
 * reads the client id a public client sent through HTTP Basic authentication
 * @param header authorization header value
 * @returns the url-decoded user name, or undefined for any other scheme
 */
export function extractBasicClientId(
  header: string | undefined,
): string | undefined {
  if (!header?.match(/^basic /i)) {
    return undefined;
  }

  const encoded = header.slice('basic '.length).trim();
  const decoded = Buffer.from(encoded, 'base64').toString('utf8');
  const separator = decoded.indexOf(':');
  const username = separator === -1 ? decoded : decoded.slice(0, separator);

  try {
    return decodeURIComponent(username) || undefined;
  } catch {
    return undefined;
  }
}

/**
 * resolves the client id of a token endpoint request
 * @param request fastify request
 * @param bodyClientId client_id body parameter
 * @returns client id from the body, else from basic authentication
 */
export function resolveClientId(
  request: FastifyRequest,
  bodyClientId: string | undefined,
): string | undefined {
  return (
    bodyClientId ??
    extractBasicClientId(lastHeader(request.headers, 'authorization'))
  );
}
