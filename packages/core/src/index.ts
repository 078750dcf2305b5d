export type { SecretKey } from '#cipher';
export type { CodeVerifier } from '#codes';
export type { ProxyConfig, ResolvedProxyConfig, UpstreamConfig } from '#config';
export type { Log, LogLevel } from '#logging';
export type { PkcePair } from '#pkce';
export type { RedirectPattern } from '#redirect';
export type { SetOptions } from '#store/types';
export type { FileKeyValueStoreOptions } from '#store/file';
export type { MemoryKeyValueStoreOptions } from '#store/memory';
export type {
  AccessGrant,
  RefreshGrant,
  TokenUse,
  VerifiedToken,
} from '#tokens';
export type * from '#types';
export type {
  AuthorizationUrlParams,
  CodeExchangeParams,
  UpstreamProvider,
  UpstreamRefreshParams,
  UpstreamRevokeParams,
} from '#upstream/types';
export type { HttpUpstreamProviderOptions } from '#upstream/http';

export { TokenCipher } from '#cipher';
export { AuthorizationCodeStore } from '#codes';
export { validateProxyConfig } from '#config';
export * from '#constants';
export * from '#errors';
export { generateClientId, generateOpaqueId } from '#id';
export { describeError, silentLog } from '#logging';
export { KeyedMutex } from '#mutex';
export {
  computeS256Challenge,
  generatePkcePair,
  isValidCodeVerifier,
  verifyPkce,
} from '#pkce';
export { AuthorizationProxy } from '#proxy';
export {
  buildClientRedirect,
  compileRedirectPattern,
  matchesRedirectPattern,
  validateDeclaredRedirectUri,
  validateRedirectUri,
} from '#redirect';
export {
  ClientRegistry,
  toRegisteredClient,
  validateRegistrationRequest,
} from '#registry';
export { FileKeyValueStore } from '#store/file';
export { MemoryKeyValueStore } from '#store/memory';
export { KeyValueStore } from '#store/types';
export { TokenIssuer } from '#tokens';
export { TransactionStore } from '#transactions';
export { HttpUpstreamProvider } from '#upstream/http';
export { UpstreamTokenStore } from '#upstream-tokens';
export { isJsonObject, isRecord, parseScope } from '#validation';
