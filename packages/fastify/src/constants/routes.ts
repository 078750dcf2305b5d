/** oauth route paths */
export const PROXY_ROUTES = {
  /** dynamic client registration */
  register: '/oauth/register',

  /** client info */
  clientInfo: '/oauth/clients/:clientId',

  /** authorization endpoint */
  authorize: '/oauth/authorize',

  /** token endpoint */
  token: '/oauth/token',

  /** revocation endpoint */
  revoke: '/oauth/revoke',

  /** authorization server metadata */
  authorizationServerMetadata: '/.well-known/oauth-authorization-server',

  /** protected resource metadata */
  protectedResourceMetadata: '/.well-known/oauth-protected-resource',
} as const;
