import type { UpstreamProfile, UpstreamTokenSet } from '#types';

/** parameters of the upstream authorization redirect */
export interface AuthorizationUrlParams {
  /** upstream client credential the redirect is made for */
  profile: UpstreamProfile;
  /** opaque value echoed back to the callback, the transaction id */
  state: string;
  /** the proxy's fixed callback url */
  redirectUri: string;
  codeChallenge: string;
  codeChallengeMethod: 'S256';
  scopes: string[];
}

/** parameters of an upstream authorization code exchange */
export interface CodeExchangeParams {
  profile: UpstreamProfile;
  code: string;
  codeVerifier: string;
  redirectUri: string;
}

/** parameters of an upstream refresh */
export interface UpstreamRefreshParams {
  profile: UpstreamProfile;
  refreshToken: string;
  /** narrower scope set, omitted to keep the original grant */
  scopes?: string[];
}

/** parameters of an upstream revocation */
export interface UpstreamRevokeParams {
  profile: UpstreamProfile;
  token: string;
  tokenTypeHint: 'access_token' | 'refresh_token';
}

/**
 * the provider-facing half of the proxy
 * implementations raise UpstreamExchangeFailedError / UpstreamRefreshFailedError on failure
 */
export interface UpstreamProvider {
  /** builds the url the user agent is sent to at the provider */
  buildAuthorizationUrl(params: AuthorizationUrlParams): string;
  /** redeems an upstream authorization code */
  exchangeCode(params: CodeExchangeParams): Promise<UpstreamTokenSet>;
  /** refreshes an upstream access token */
  refresh(params: UpstreamRefreshParams): Promise<UpstreamTokenSet>;
  /** revokes an upstream token where the provider supports it */
  revoke(params: UpstreamRevokeParams): Promise<void>;
}
