import {
  DEFAULT_TRANSACTION_TTL_SECONDS,
  EXPIRY_GRACE_SECONDS,
  MS_PER_SECOND,
} from '#constants';
import { TransactionExpiredOrNotFoundError } from '#errors';
import { generateOpaqueId } from '#id';
import {
  isOptionalString,
  isRecord,
  isStringArray,
  parseJson,
} from '#validation';

import type { KeyValueStore } from '#store/types';
import type { Transaction, TransactionInput } from '#types';

const KEY_PREFIX = 'txn:';

/** configuration options for the transaction store */
export interface TransactionStoreOptions {
  /** ephemeral backend */
  store: KeyValueStore;
  /** transaction lifetime in seconds */
  ttlSeconds?: number;
}

/**
 * narrows a stored record to a transaction
 * @param value parsed record
 * @returns true for a well-formed transaction
 */
function isTransaction(value: unknown): value is Transaction {
  return (
    isRecord(value) &&
    typeof value.transactionId === 'string' &&
    typeof value.clientId === 'string' &&
    typeof value.clientCodeChallenge === 'string' &&
    value.clientCodeChallengeMethod === 'S256' &&
    isOptionalString(value.clientState) &&
    typeof value.clientRedirectUri === 'string' &&
    typeof value.redirectUriRequired === 'boolean' &&
    isStringArray(value.scopes) &&
    isOptionalString(value.proxyCodeVerifier) &&
    isOptionalString(value.proxyCodeChallenge) &&
    typeof value.expiresAt === 'number'
  );
}

/**
 * short-lived records of authorization requests awaiting the upstream callback
 * each transaction can be consumed exactly once
 */
export class TransactionStore {
  readonly #store: KeyValueStore;
  readonly #ttlSeconds: number;

  constructor(options: TransactionStoreOptions) {
    this.#store = options.store;
    this.#ttlSeconds = options.ttlSeconds ?? DEFAULT_TRANSACTION_TTL_SECONDS;
  }

  /**
   * records a new transaction
   * @param input authorization request details
   * @returns the stored transaction with its id and expiry
   */
  public async create(input: TransactionInput): Promise<Transaction> {
    const transaction: Transaction = {
      ...input,
      transactionId: generateOpaqueId(),
      expiresAt: Date.now() + this.#ttlSeconds * MS_PER_SECOND,
    };

    // the backend keeps the record a little longer so a late callback reads as expired
    await this.#store.set(
      KEY_PREFIX + transaction.transactionId,
      JSON.stringify(transaction),
      { ttlSeconds: this.#ttlSeconds + EXPIRY_GRACE_SECONDS },
    );

    return transaction;
  }

  /**
   * atomically reads and removes a transaction
   * @param transactionId id carried back in the upstream state parameter
   * @returns the transaction
   * @throws {TransactionExpiredOrNotFoundError} when unknown, already consumed or expired
   */
  public async consume(transactionId: string): Promise<Transaction> {
    const raw = await this.#store.take(KEY_PREFIX + transactionId);
    const transaction = raw === null ? null : parseJson(raw, isTransaction);
    if (!transaction) {
      throw new TransactionExpiredOrNotFoundError('not_found');
    }

    if (transaction.expiresAt <= Date.now()) {
      throw new TransactionExpiredOrNotFoundError('expired');
    }

    return transaction;
  }
}
