import {
  DEFAULT_CODE_TTL_SECONDS,
  EXPIRY_GRACE_SECONDS,
  MS_PER_SECOND,
} from '#constants';
import { CodeReplayError, InvalidGrantError } from '#errors';
import { generateOpaqueId } from '#id';
import {
  isOptionalString,
  isRecord,
  isStringArray,
  parseJson,
} from '#validation';

import type { KeyValueStore } from '#store/types';
import type { ProxyAuthorizationCode, ProxyAuthorizationCodeInput } from '#types';

const KEY_PREFIX = 'code:';

/** configuration options for the authorization code store */
export interface AuthorizationCodeStoreOptions {
  /** ephemeral backend */
  store: KeyValueStore;
  /** code lifetime in seconds */
  ttlSeconds?: number;
}

/** checks a code against the token request before it is spent */
export type CodeVerifier = (grant: ProxyAuthorizationCode) => void | Promise<void>;

/**
 * narrows a stored record to an authorization code
 * @param value parsed record
 * @returns true for a well-formed code record
 */
function isAuthorizationCode(value: unknown): value is ProxyAuthorizationCode {
  return (
    isRecord(value) &&
    typeof value.code === 'string' &&
    typeof value.clientId === 'string' &&
    isOptionalString(value.referenceId) &&
    isOptionalString(value.upstreamCode) &&
    typeof value.clientCodeChallenge === 'string' &&
    value.clientCodeChallengeMethod === 'S256' &&
    typeof value.clientRedirectUri === 'string' &&
    typeof value.redirectUriRequired === 'boolean' &&
    isStringArray(value.scopes) &&
    typeof value.expiresAt === 'number' &&
    typeof value.used === 'boolean'
  );
}

/**
 * single-use proxy authorization codes
 * a redeemed code stays behind, marked used, until it would have expired so replays are recognised
 */
export class AuthorizationCodeStore {
  readonly #store: KeyValueStore;
  readonly #ttlSeconds: number;

  constructor(options: AuthorizationCodeStoreOptions) {
    this.#store = options.store;
    this.#ttlSeconds = options.ttlSeconds ?? DEFAULT_CODE_TTL_SECONDS;
  }

  /**
   * mints a new code
   * @param input what the code grants
   * @returns the stored code record
   */
  public async issue(
    input: ProxyAuthorizationCodeInput,
  ): Promise<ProxyAuthorizationCode> {
    const grant: ProxyAuthorizationCode = {
      ...input,
      code: generateOpaqueId(),
      expiresAt: Date.now() + this.#ttlSeconds * MS_PER_SECOND,
      used: false,
    };

    await this.#store.set(KEY_PREFIX + grant.code, JSON.stringify(grant), {
      ttlSeconds: this.#ttlSeconds + EXPIRY_GRACE_SECONDS,
    });

    return grant;
  }

  /**
   * spends a code
   * @param code code presented at the token endpoint
   * @param verify checks the request against the code, throwing to refuse it
   * @returns the code record, now marked used
   * @throws {InvalidGrantError} when the code is unknown or expired
   * @throws {CodeReplayError} when the code was already spent, carrying the grant reference only
   * when the code was read as used rather than lost to a concurrent caller
   */
  public async redeem(
    code: string,
    verify: CodeVerifier,
  ): Promise<ProxyAuthorizationCode> {
    const key = KEY_PREFIX + code;
    const raw = await this.#store.get(key);
    const grant = raw === null ? null : parseJson(raw, isAuthorizationCode);
    if (raw === null || !grant) {
      throw new InvalidGrantError('invalid authorization code');
    }

    const now = Date.now();
    if (grant.expiresAt <= now) {
      throw new InvalidGrantError('authorization code expired');
    }

    if (grant.used) {
      throw new CodeReplayError(grant.referenceId);
    }

    await verify(grant);

    const spent: ProxyAuthorizationCode = { ...grant, used: true };
    const remainingSeconds = Math.ceil((grant.expiresAt - now) / MS_PER_SECOND);
    const won = await this.#store.replace(key, raw, JSON.stringify(spent), {
      ttlSeconds: remainingSeconds + EXPIRY_GRACE_SECONDS,
    });
    // a concurrent redemption got there first; only a code already read as used revokes its grant
    if (!won) {
      throw new CodeReplayError();
    }

    return spent;
  }

  /**
   * records the grant a spent code produced, so a later replay can revoke it
   * @param code spent code
   * @param referenceId grant issued from the code
   * @returns true when the record was updated
   */
  public async attachReference(
    code: string,
    referenceId: string,
  ): Promise<boolean> {
    const key = KEY_PREFIX + code;
    const raw = await this.#store.get(key);
    const grant = raw === null ? null : parseJson(raw, isAuthorizationCode);
    if (raw === null || !grant) {
      return false;
    }

    const remainingSeconds = Math.max(
      1,
      Math.ceil((grant.expiresAt - Date.now()) / MS_PER_SECOND),
    );

    return this.#store.replace(
      key,
      raw,
      JSON.stringify({ ...grant, referenceId, upstreamCode: undefined }),
      { ttlSeconds: remainingSeconds + EXPIRY_GRACE_SECONDS },
    );
  }
}
