/**
 * @module registry
 * @description Dynamic client registration (RFC 7591). Every registered client shares the operator's
 * single upstream credential; the proxy issues its own client identifiers and never a client secret,
 * so registered clients are public clients bound by PKCE.
 */

import { SUPPORTED_GRANT_TYPES, SUPPORTED_RESPONSE_TYPES } from '#constants';
import {
  InvalidClientError,
  InvalidClientMetadataError,
  InvalidRedirectError,
  InvalidScopeError,
} from '#errors';
import { generateClientId } from '#id';
import { silentLog } from '#logging';
import { validateDeclaredRedirectUri } from '#redirect';
import {
  isOptionalString,
  isRecord,
  isStringArray,
  parseJson,
  parseScope,
} from '#validation';

import type { TokenCipher } from '#cipher';
import type { Log } from '#logging';
import type { RedirectPattern } from '#redirect';
import type { KeyValueStore } from '#store/types';
import type {
  ClientRegistration,
  ClientRegistrationRequest,
  GrantType,
  RegisteredClient,
  ResponseType,
  UpstreamAuthMethod,
  UpstreamProfile,
} from '#types';

/** token endpoint auth method of every registered client */
export const CLIENT_AUTH_METHOD = 'none';

const KEY_PREFIX = 'client:';

/** attempts at a conditional update before giving up */
const MAX_UPDATE_ATTEMPTS = 5;

/** configuration options for the client registry */
export interface ClientRegistryOptions {
  /** persistent backend, records never expire */
  store: KeyValueStore;
  /** protects the upstream client secret at rest */
  cipher: TokenCipher;
  /** the operator's upstream credential attached to every client */
  upstream: UpstreamProfile;
  /** scopes a client may request, undefined allows any */
  allowedScopes?: string[];
  /** operator redirect allowlist */
  redirectPatterns?: RedirectPattern[];
  log?: Log;
}

// TYPE GUARDS //

/**
 * checks if a value is a supported grant type
 * @param value value to check
 * @returns true for authorization_code and refresh_token
 */
export function isGrantType(value: string): value is GrantType {
  return SUPPORTED_GRANT_TYPES.some((grantType) => grantType === value);
}

/**
 * checks if a value is a supported response type
 * @param value value to check
 * @returns true for code
 */
export function isResponseType(value: string): value is ResponseType {
  return SUPPORTED_RESPONSE_TYPES.some((responseType) => responseType === value);
}

function isUpstreamAuthMethod(value: unknown): value is UpstreamAuthMethod {
  return value === 'client_secret_basic' || value === 'client_secret_post';
}

/**
 * narrows a stored record to a registration
 * @param value parsed record
 * @returns true for a well-formed registration
 */
function isStoredRegistration(value: unknown): value is ClientRegistration {
  if (!isRecord(value) || !isRecord(value.upstream)) {
    return false;
  }

  const upstream = value.upstream;

  return (
    typeof value.clientId === 'string' &&
    typeof upstream.clientId === 'string' &&
    typeof upstream.clientSecret === 'string' &&
    isUpstreamAuthMethod(upstream.authMethod) &&
    isStringArray(value.redirectUris) &&
    isStringArray(value.grantTypes) &&
    value.grantTypes.every(isGrantType) &&
    isStringArray(value.responseTypes) &&
    value.responseTypes.every(isResponseType) &&
    (value.contacts === undefined || isStringArray(value.contacts)) &&
    [
      value.scope,
      value.clientName,
      value.clientUri,
      value.logoUri,
      value.tosUri,
      value.policyUri,
      value.softwareId,
      value.softwareVersion,
    ].every(isOptionalString) &&
    typeof value.createdAt === 'number'
  );
}

// VALIDATION //

/**
 * validates array values against supported options
 * @param values values to validate
 * @param supported predicate for supported values
 * @param fieldName field name for error messages
 * @returns the narrowed values
 * @throws {InvalidClientMetadataError} if any value is unsupported
 */
function validateSupportedValues<T extends string>(
  values: string[],
  supported: (value: string) => value is T,
  fieldName: string,
): T[] {
  const accepted: T[] = [];
  for (const value of values) {
    if (!supported(value)) {
      throw new InvalidClientMetadataError(`unsupported ${fieldName}: ${value}`);
    }
    accepted.push(value);
  }

  return [...new Set(accepted)];
}

/**
 * validates requested scopes against the operator's allowlist
 * @param scope space-delimited scope string
 * @param allowedScopes optional list of allowed scopes
 * @throws {InvalidScopeError} if a scope is not allowed
 */
export function validateScopes(
  scope: string | undefined,
  allowedScopes?: string[],
): void {
  if (!allowedScopes) {
    return;
  }

  for (const requested of parseScope(scope)) {
    if (!allowedScopes.includes(requested)) {
      throw new InvalidScopeError(`unsupported scope: ${requested}`);
    }
  }
}

/**
 * validates a client registration request
 * @param request registration request to validate
 * @param options allowlists to apply
 * @param options.allowedScopes optional list of allowed scopes
 * @param options.redirectPatterns optional redirect allowlist
 * @returns the validated grant and response types, with defaults applied
 * @throws {InvalidRedirectError} if a redirect uri is unacceptable
 * @throws {InvalidClientMetadataError} if the metadata is unsupported
 * @throws {InvalidScopeError} if a scope is not allowed
 */
export function validateRegistrationRequest(
  request: ClientRegistrationRequest,
  options: { allowedScopes?: string[]; redirectPatterns?: RedirectPattern[] } = {},
): { grantTypes: GrantType[]; responseTypes: ResponseType[] } {
  if (request.redirectUris.length === 0) {
    throw new InvalidRedirectError(
      'redirect_uris is required and must not be empty',
      'invalid_redirect_uri',
    );
  }

  for (const uri of request.redirectUris) {
    validateDeclaredRedirectUri(uri, options.redirectPatterns);
  }

  const grantTypes = validateSupportedValues(
    request.grantTypes ?? [...SUPPORTED_GRANT_TYPES],
    isGrantType,
    'grant_type',
  );
  if (!grantTypes.includes('authorization_code')) {
    throw new InvalidClientMetadataError(
      'grant_types must include authorization_code',
    );
  }

  const responseTypes = validateSupportedValues(
    request.responseTypes ?? [...SUPPORTED_RESPONSE_TYPES],
    isResponseType,
    'response_type',
  );

  // no client secret is ever issued
  const authMethod = request.tokenEndpointAuthMethod ?? CLIENT_AUTH_METHOD;
  if (authMethod !== CLIENT_AUTH_METHOD) {
    throw new InvalidClientMetadataError(
      `unsupported token_endpoint_auth_method: ${authMethod}`,
    );
  }

  validateScopes(request.scope, options.allowedScopes);

  return { grantTypes, responseTypes };
}

/**
 * strips the upstream secret from a registration
 * @param registration stored registration
 * @returns the client-facing view
 */
export function toRegisteredClient(
  registration: ClientRegistration,
): RegisteredClient {
  const { upstream, ...rest } = registration;

  return { ...rest, upstreamClientId: upstream.clientId };
}

// REGISTRY //

/**
 * persistent store of registered clients
 * registrations are never destroyed automatically
 */
export class ClientRegistry {
  readonly #store: KeyValueStore;
  readonly #cipher: TokenCipher;
  readonly #upstream: UpstreamProfile;
  readonly #allowedScopes?: string[];
  readonly #redirectPatterns?: RedirectPattern[];
  readonly #log: Log;

  constructor(options: ClientRegistryOptions) {
    this.#store = options.store;
    this.#cipher = options.cipher;
    this.#upstream = options.upstream;
    this.#allowedScopes = options.allowedScopes;
    this.#redirectPatterns = options.redirectPatterns;
    this.#log = options.log ?? silentLog;
  }

  /**
   * registers a new client
   * @param request registration metadata
   * @returns the stored registration with the upstream secret in plaintext
   */
  public async register(
    request: ClientRegistrationRequest,
  ): Promise<ClientRegistration> {
    const { grantTypes, responseTypes } = validateRegistrationRequest(request, {
      allowedScopes: this.#allowedScopes,
      redirectPatterns: this.#redirectPatterns,
    });

    const registration: ClientRegistration = {
      clientId: generateClientId(),
      upstream: { ...this.#upstream },
      redirectUris: [...new Set(request.redirectUris)],
      grantTypes,
      responseTypes,
      scope: request.scope,
      clientName: request.clientName,
      clientUri: request.clientUri,
      logoUri: request.logoUri,
      contacts: request.contacts,
      tosUri: request.tosUri,
      policyUri: request.policyUri,
      softwareId: request.softwareId,
      softwareVersion: request.softwareVersion,
      createdAt: Date.now(),
    };

    await this.#store.set(
      KEY_PREFIX + registration.clientId,
      await this.#serialize(registration),
    );

    this.#log('info', 'client registered', {
      clientId: registration.clientId,
      redirectUris: registration.redirectUris,
    });

    return registration;
  }

  /**
   * finds a registered client
   * @param clientId proxy client identifier
   * @returns registration, or null when unknown
   */
  public async lookup(clientId: string): Promise<ClientRegistration | null> {
    const raw = await this.#store.get(KEY_PREFIX + clientId);

    return raw === null ? null : this.#deserialize(raw);
  }

  /**
   * grows a client's declared redirect set (operator action)
   * @param clientId proxy client identifier
   * @param uris redirect uris to add
   * @returns updated registration
   * @throws {InvalidClientError} when the client is unknown
   * @throws {InvalidRedirectError} when a uri is unacceptable
   */
  public async addRedirectUris(
    clientId: string,
    uris: string[],
  ): Promise<ClientRegistration> {
    for (const uri of uris) {
      validateDeclaredRedirectUri(uri, this.#redirectPatterns);
    }

    const key = KEY_PREFIX + clientId;
    for (let attempt = 0; attempt < MAX_UPDATE_ATTEMPTS; attempt++) {
      const raw = await this.#store.get(key);
      const current = raw === null ? null : await this.#deserialize(raw);
      if (raw === null || !current) {
        throw new InvalidClientError(`unknown client: ${clientId}`);
      }

      const next: ClientRegistration = {
        ...current,
        redirectUris: [...new Set([...current.redirectUris, ...uris])],
      };

      if (await this.#store.replace(key, raw, await this.#serialize(next))) {
        this.#log('info', 'client redirect uris extended', {
          clientId,
          redirectUris: next.redirectUris,
        });

        return next;
      }
    }

    throw new Error(`concurrent updates kept conflicting for client ${clientId}`);
  }

  async #serialize(registration: ClientRegistration): Promise<string> {
    return JSON.stringify({
      ...registration,
      upstream: {
        ...registration.upstream,
        clientSecret: await this.#cipher.encrypt(registration.upstream.clientSecret),
      },
    });
  }

  async #deserialize(raw: string): Promise<ClientRegistration | null> {
    const stored = parseJson(raw, isStoredRegistration);
    if (!stored) {
      this.#log('warn', 'discarding malformed client registration');

      return null;
    }

    return {
      ...stored,
      upstream: {
        ...stored.upstream,
        clientSecret: await this.#cipher.decrypt(stored.upstream.clientSecret),
      },
    };
  }
}
