/**
 * @module redirect
 * @description Redirect URI validation. A candidate must be byte-identical to a URI the client
 * declared and, when the operator configured an allowlist, match one of its patterns.
 *
 * Pattern grammar: `scheme://host[:port][/path]`
 * - port `*` matches any port, e.g. `http://localhost:*`; no port means the scheme's default port
 * - a host of the form `*.example.com` matches any subdomain of example.com, never example.com itself
 * - a path ending in `/*` is a prefix, any other path is exact, no path matches every path
 */

import { LOOPBACK_HOSTS } from '#constants';
import { InvalidRedirectError } from '#errors';

/** a parsed allowlist pattern */
export interface RedirectPattern {
  source: string;
  protocol: string;
  /** lowercase host, or the suffix (with leading dot) for wildcard hosts */
  host: string;
  wildcardHost: boolean;
  /** null matches any port, '' only the scheme's default */
  port: string | null;
  /** null matches any path */
  path: string | null;
  pathPrefix: boolean;
}

const DEFAULT_PORTS: Record<string, string> = { http: '80', https: '443' };

const PATTERN_SHAPE = /^(https?):\/\/([^/:?#]+)(?::(\d+|\*))?(\/[^?#]*)?$/;

/** minimum fixed labels below a wildcard host, so `*.com` is refused */
const MIN_WILDCARD_SUFFIX_LABELS = 2;

/**
 * parses and checks an allowlist pattern
 * @param pattern pattern source
 * @returns parsed pattern
 * @throws {Error} when the pattern is malformed or too broad
 */
export function compileRedirectPattern(pattern: string): RedirectPattern {
  const match = PATTERN_SHAPE.exec(pattern.trim());
  if (!match) {
    throw new Error(`invalid redirect pattern: ${pattern}`);
  }

  const [, scheme, rawHost, port, rawPath] = match;
  const host = rawHost.toLowerCase();
  const wildcardHost = host.startsWith('*.');
  const fixedHost = wildcardHost ? host.slice(2) : host;

  if (fixedHost.includes('*')) {
    throw new Error(
      `redirect pattern may only wildcard the leftmost host label: ${pattern}`,
    );
  }
  if (
    wildcardHost &&
    fixedHost.split('.').filter(Boolean).length < MIN_WILDCARD_SUFFIX_LABELS
  ) {
    throw new Error(`redirect pattern wildcard is too broad: ${pattern}`);
  }

  let path: string | null = null;
  let pathPrefix = false;
  if (rawPath !== undefined) {
    pathPrefix = rawPath.endsWith('/*');
    path = pathPrefix ? rawPath.slice(0, -1) : rawPath;
    if (path.includes('*')) {
      throw new Error(
        `redirect pattern may only wildcard a trailing path segment: ${pattern}`,
      );
    }
  }

  return {
    source: pattern,
    protocol: `${scheme}:`,
    host: wildcardHost ? `.${fixedHost}` : fixedHost,
    wildcardHost,
    port: port === '*' ? null : normalizePort(scheme, port),
    path,
    pathPrefix,
  };
}

/**
 * normalises a pattern port the way URL does, so an explicit default port reads as ''
 * @param scheme pattern scheme
 * @param port port digits, if any
 * @returns port as URL#port reports it
 */
function normalizePort(scheme: string, port: string | undefined): string {
  if (port === undefined) {
    return '';
  }

  const digits = String(Number(port));

  return digits === DEFAULT_PORTS[scheme] ? '' : digits;
}

/**
 * parses a uri without throwing
 * @param uri candidate uri
 * @returns parsed url or null
 */
function parseUrl(uri: string): URL | null {
  try {
    return new URL(uri);
  } catch {
    return null;
  }
}

/**
 * tests a uri against a compiled pattern
 * @param url parsed candidate
 * @param pattern compiled pattern
 * @returns true on match
 */
function matchesCompiled(url: URL, pattern: RedirectPattern): boolean {
  if (url.protocol !== pattern.protocol) {
    return false;
  }

  const host = url.hostname.toLowerCase();
  const hostMatches = pattern.wildcardHost
    ? host.endsWith(pattern.host) && host.length > pattern.host.length
    : host === pattern.host;
  if (!hostMatches) {
    return false;
  }

  if (pattern.port !== null && url.port !== pattern.port) {
    return false;
  }

  if (pattern.path === null) {
    return true;
  }

  return pattern.pathPrefix
    ? url.pathname.startsWith(pattern.path)
    : url.pathname === pattern.path;
}

/**
 * tests whether a uri matches an allowlist pattern
 * @param uri candidate redirect uri
 * @param pattern allowlist pattern (string or compiled)
 * @returns true when the uri matches; malformed uris and patterns never match
 * @example
 * ```typescript
 * matchesRedirectPattern('https://app.example.com/callback', 'https://*.example.com/*'); // true
 * matchesRedirectPattern('https://example.com.evil.net/callback', 'https://*.example.com/*'); // false
 * ```
 */
export function matchesRedirectPattern(
  uri: string,
  pattern: string | RedirectPattern,
): boolean {
  const url = parseUrl(uri);
  if (!url || url.username || url.password || url.hash) {
    return false;
  }

  let compiled: RedirectPattern;
  try {
    compiled =
      typeof pattern === 'string' ? compileRedirectPattern(pattern) : pattern;
  } catch {
    return false;
  }

  return matchesCompiled(url, compiled);
}

/**
 * tests whether a uri matches any allowlist pattern
 * @param uri candidate redirect uri
 * @param patterns allowlist, undefined or empty means no allowlist
 * @returns true when no allowlist is configured or a pattern matches
 */
export function isAllowedByPatterns(
  uri: string,
  patterns?: readonly (string | RedirectPattern)[],
): boolean {
  if (!patterns?.length) {
    return true;
  }

  return patterns.some((pattern) => matchesRedirectPattern(uri, pattern));
}

/**
 * validates a redirect uri requested at authorization time
 * @param candidate redirect uri from the authorization request
 * @param declaredUris uris the client declared at registration
 * @param patterns optional operator allowlist
 * @throws {InvalidRedirectError} when the candidate is not declared or not allowed
 */
export function validateRedirectUri(
  candidate: string,
  declaredUris: readonly string[],
  patterns?: readonly (string | RedirectPattern)[],
): void {
  if (!declaredUris.includes(candidate)) {
    throw new InvalidRedirectError(
      'redirect_uri not registered for this client',
    );
  }

  if (!isAllowedByPatterns(candidate, patterns)) {
    throw new InvalidRedirectError(
      'redirect_uri is not permitted by the redirect allowlist',
    );
  }
}

/**
 * validates a redirect uri a client declares at registration
 * @param uri declared redirect uri
 * @param patterns optional operator allowlist
 * @throws {InvalidRedirectError} with code invalid_redirect_uri when the uri is unacceptable
 */
export function validateDeclaredRedirectUri(
  uri: string,
  patterns?: readonly (string | RedirectPattern)[],
): void {
  const parsed = parseUrl(uri);
  if (!parsed) {
    throw new InvalidRedirectError(
      `invalid redirect_uri format: ${uri}`,
      'invalid_redirect_uri',
    );
  }

  // only allow https, or plain http on loopback for native and development clients
  const isLoopback = LOOPBACK_HOSTS.includes(parsed.hostname);
  if (parsed.protocol !== 'https:' && !(parsed.protocol === 'http:' && isLoopback)) {
    throw new InvalidRedirectError(
      `redirect_uri must use https: ${uri}`,
      'invalid_redirect_uri',
    );
  }

  if (parsed.hash) {
    throw new InvalidRedirectError(
      `redirect_uri must not contain a fragment: ${uri}`,
      'invalid_redirect_uri',
    );
  }

  if (parsed.username || parsed.password) {
    throw new InvalidRedirectError(
      `redirect_uri must not contain credentials: ${uri}`,
      'invalid_redirect_uri',
    );
  }

  if (!isAllowedByPatterns(uri, patterns)) {
    throw new InvalidRedirectError(
      `redirect_uri is not permitted by the redirect allowlist: ${uri}`,
      'invalid_redirect_uri',
    );
  }
}

/**
 * appends response parameters to a validated client redirect uri
 * @param redirectUri client redirect uri
 * @param params parameters to add, undefined values are skipped
 * @returns the redirect url
 */
export function buildClientRedirect(
  redirectUri: string,
  params: Record<string, string | undefined>,
): string {
  const url = new URL(redirectUri);

  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) {
      url.searchParams.set(key, value);
    }
  }

  return url.toString();
}
