/** milliseconds per second conversion constant */
export const MS_PER_SECOND = 1000;

/** default lifetime of an in-flight authorization transaction */
export const DEFAULT_TRANSACTION_TTL_SECONDS = 600;

/** shortest transaction lifetime an operator may configure */
export const MIN_TRANSACTION_TTL_SECONDS = 300;

/** longest transaction lifetime an operator may configure */
export const MAX_TRANSACTION_TTL_SECONDS = 600;

/**
 * extra time a consumed-or-expired record stays in the backend
 * @description lets a late callback be reported as expired rather than unknown
 */
export const EXPIRY_GRACE_SECONDS = 60;

/** default lifetime of a proxy authorization code */
export const DEFAULT_CODE_TTL_SECONDS = 60;

/** default lifetime of a proxy access token */
export const DEFAULT_ACCESS_TOKEN_TTL_SECONDS = 3600;

/** default lifetime of a proxy refresh token (30 days) */
export const DEFAULT_REFRESH_TOKEN_TTL_SECONDS = 2_592_000;

/** default timeout for a single call to the upstream provider */
export const DEFAULT_UPSTREAM_TIMEOUT_MS = 10_000;

/**
 * upstream access tokens expiring within this window are treated as expired
 * @description avoids handing out tokens that die in flight
 */
export const UPSTREAM_EXPIRY_SKEW_MS = 30_000;

/** time a refresh lease outlives the upstream timeout before other workers may take it over */
export const REFRESH_LEASE_MARGIN_MS = 5_000;

/** how often a worker rechecks a grant another worker is refreshing */
export const REFRESH_LEASE_POLL_MS = 50;

/** minimum length of signing and encryption secrets */
export const MINIMUM_SECRET_LENGTH = 32;

/** default sweep interval for the in-memory key-value store */
export const DEFAULT_SWEEP_INTERVAL_MS = 60_000;

/** path of the proxy callback relative to the issuer */
export const DEFAULT_CALLBACK_PATH = '/oauth/callback';

/** prefix of proxy-issued client identifiers */
export const CLIENT_ID_PREFIX = 'dcr_';

/** grant types a registered client may request */
export const SUPPORTED_GRANT_TYPES = [
  'authorization_code',
  'refresh_token',
] as const;

/** response types a registered client may request */
export const SUPPORTED_RESPONSE_TYPES = ['code'] as const;

/** PKCE challenge methods accepted from clients */
export const SUPPORTED_CODE_CHALLENGE_METHODS = ['S256'] as const;

/** hosts that may use plain http redirect URIs */
export const LOOPBACK_HOSTS = ['localhost', '127.0.0.1', '[::1]'];
