/**
 * @caixa-escolar/store — Core types.
 *
 * The ledger store is an opaque key-value collaborator: one record per
 * account ID. Calls are synchronous and blocking, with no retries or
 * timeouts; a failing call throws a StoreError and leaves the caller's
 * in-memory state untouched.
 */

import type { Account } from "@caixa-escolar/types";

// =============================================================================
// Store Interface
// =============================================================================

/**
 * Durable storage for accounts.
 *
 * Last write wins. There is no optimistic-concurrency check; at most one
 * writer per account is assumed.
 */
export interface LedgerStore {
  /**
   * Load every stored account, keyed by account ID.
   */
  loadAllAccounts(): Map<string, Account>;

  /**
   * Create or overwrite the record for an account.
   */
  saveAccount(id: string, account: Account): void;

  /**
   * Remove an account record. Deleting a missing account is a no-op.
   */
  deleteAccount(id: string): void;

  /**
   * Move a record to a new ID: the new record is written first, then the
   * old one deleted.
   *
   * @throws StoreError ACCOUNT_NOT_FOUND if `oldId` has no record
   * @throws StoreError ACCOUNT_EXISTS if `newId` already has one
   */
  renameAccount(oldId: string, newId: string): void;

  /**
   * Whether the store can currently be reached.
   */
  isAvailable(): boolean;
}

// =============================================================================
// Errors
// =============================================================================

/**
 * Error codes for store operations.
 */
export type StoreErrorCode =
  | "STORE_UNAVAILABLE"
  | "INVALID_RECORD"
  | "INTEGRITY_FAILURE"
  | "ACCOUNT_EXISTS"
  | "ACCOUNT_NOT_FOUND";

/**
 * Error thrown by LedgerStore operations and the record codec.
 */
export class StoreError extends Error {
  constructor(
    public readonly code: StoreErrorCode,
    message: string,
    public readonly accountId?: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "StoreError";
  }
}
