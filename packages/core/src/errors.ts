import type { OAuthErrorCode, OAuthErrorResponseWire } from '#types';

// HTTP STATUS //

const HTTP_BAD_REQUEST = 400;
const HTTP_UNAUTHORIZED = 401;
const HTTP_SERVICE_UNAVAILABLE = 503;

/**
 * base class of every failure scoped to a single authorization flow
 * carries the oauth error code and the http status the error maps to
 */
export class ProxyError extends Error {
  /** OAuth error code */
  public readonly code: OAuthErrorCode;
  /** HTTP status code */
  public readonly statusCode: number;

  /**
   * creates a proxy error
   * @param code oauth error code
   * @param message human-readable description, sent as error_description
   * @param statusCode http status code
   */
  constructor(
    code: OAuthErrorCode,
    message: string,
    statusCode: number = HTTP_BAD_REQUEST,
  ) {
    super(message);
    this.name = 'ProxyError';
    this.code = code;
    this.statusCode = statusCode;
  }

  /**
   * converts the error to an OAuth error response wire format
   * @returns OAuth error response
   */
  public toWireFormat(): OAuthErrorResponseWire {
    return { error: this.code, error_description: this.message };
  }
}

/** a required parameter is missing or malformed */
export class InvalidRequestError extends ProxyError {
  constructor(message: string) {
    super('invalid_request', message);
    this.name = 'InvalidRequestError';
  }
}

/** the client identifier is unknown */
export class InvalidClientError extends ProxyError {
  constructor(message: string) {
    super('invalid_client', message);
    this.name = 'InvalidClientError';
  }
}

/** registration metadata is unsupported */
export class InvalidClientMetadataError extends ProxyError {
  constructor(message: string) {
    super('invalid_client_metadata', message);
    this.name = 'InvalidClientMetadataError';
  }
}

/**
 * the redirect uri is not allowed
 * raised before any redirect is issued
 */
export class InvalidRedirectError extends ProxyError {
  constructor(
    message: string,
    code: 'invalid_request' | 'invalid_redirect_uri' = 'invalid_request',
  ) {
    super(code, message);
    this.name = 'InvalidRedirectError';
  }
}

/** requested scopes fall outside what is allowed or granted */
export class InvalidScopeError extends ProxyError {
  constructor(message: string) {
    super('invalid_scope', message);
    this.name = 'InvalidScopeError';
  }
}

/** the callback references a transaction that is unknown, already consumed or expired */
export class TransactionExpiredOrNotFoundError extends ProxyError {
  public readonly reason: 'expired' | 'not_found';

  constructor(reason: 'expired' | 'not_found') {
    super(
      'invalid_request',
      reason === 'expired'
        ? 'authorization transaction expired'
        : 'unknown or already completed authorization transaction',
    );
    this.name = 'TransactionExpiredOrNotFoundError';
    this.reason = reason;
  }
}

/** the upstream provider rejected or failed the code exchange */
export class UpstreamExchangeFailedError extends ProxyError {
  /** error code reported by the provider, if any */
  public readonly upstreamCode?: string;
  /** whether the failure was transient (network, timeout, 5xx) */
  public readonly retryable: boolean;

  constructor(options: {
    message: string;
    upstreamCode?: string;
    retryable: boolean;
    cause?: unknown;
  }) {
    super('invalid_grant', options.message);
    this.name = 'UpstreamExchangeFailedError';
    this.upstreamCode = options.upstreamCode;
    this.retryable = options.retryable;
    this.cause = options.cause;
  }
}

/**
 * the upstream refresh failed
 * a rejection means the grant is gone and the user must re-authorize; a transient failure leaves it intact
 */
export class UpstreamRefreshFailedError extends ProxyError {
  public readonly upstreamCode?: string;
  public readonly retryable: boolean;

  constructor(options: {
    message: string;
    upstreamCode?: string;
    retryable?: boolean;
    cause?: unknown;
  }) {
    const retryable = options.retryable ?? false;
    super(
      retryable ? 'temporarily_unavailable' : 'invalid_grant',
      options.message,
      retryable ? HTTP_SERVICE_UNAVAILABLE : HTTP_BAD_REQUEST,
    );
    this.name = 'UpstreamRefreshFailedError';
    this.upstreamCode = options.upstreamCode;
    this.retryable = retryable;
    this.cause = options.cause;
  }
}

/** the authorization code is unknown, expired or fails verification */
export class InvalidGrantError extends ProxyError {
  constructor(message: string) {
    super('invalid_grant', message);
    this.name = 'InvalidGrantError';
  }
}

/** a second redemption of an already used authorization code */
export class CodeReplayError extends ProxyError {
  /** grant issued from the first redemption, when one exists */
  public readonly referenceId?: string;

  constructor(referenceId?: string) {
    super('invalid_grant', 'authorization code has already been used');
    this.name = 'CodeReplayError';
    this.referenceId = referenceId;
  }
}

/** a proxy token with a bad signature, wrong use, expired, or revoked */
export class TokenInvalidError extends ProxyError {
  constructor(message: string) {
    super('invalid_token', message, HTTP_UNAUTHORIZED);
    this.name = 'TokenInvalidError';
  }
}

/** the grant_type is not supported */
export class UnsupportedGrantTypeError extends ProxyError {
  constructor(grantType: string | undefined) {
    super(
      'unsupported_grant_type',
      `unsupported grant_type: ${grantType ?? '(missing)'}`,
    );
    this.name = 'UnsupportedGrantTypeError';
  }
}
