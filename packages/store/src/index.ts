/**
 * @caixa-escolar/store — Account persistence.
 *
 * Provides:
 * - LedgerStore interface (synchronous key-value store of accounts)
 * - Record codec for the persisted document shape
 * - InMemoryLedgerStore for tests and development
 * - FileLedgerStore for durable file-based persistence
 *
 * @packageDocumentation
 */

export type { LedgerStore, StoreErrorCode } from "./types.js";
export { StoreError } from "./types.js";

export { encodeAccount, decodeAccount, PersistedAccountSchema } from "./codec.js";
export type {
  DecodeOptions,
  PersistedAccount,
  PersistedMovement,
  PersistedOpeningBalance,
} from "./codec.js";

export { InMemoryLedgerStore } from "./in-memory-store.js";
export { FileLedgerStore, computeRecordHash } from "./file-store.js";
export type { FileLedgerStoreOptions, StoredRecord } from "./file-store.js";
