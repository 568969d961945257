/**
 * @caixa-escolar/store — In-memory ledger store.
 *
 * Holds encoded documents in a Map, so every save and load goes through
 * the record codec exactly as the file store does. Suitable for tests
 * and development.
 */

import type { Account } from "@caixa-escolar/types";
import { decodeAccount, encodeAccount } from "./codec.js";
import type { DecodeOptions } from "./codec.js";
import type { LedgerStore } from "./types.js";
import { StoreError } from "./types.js";

export class InMemoryLedgerStore implements LedgerStore {
  /** accountId → encoded document */
  private readonly _documents = new Map<string, unknown>();
  private readonly _decode: DecodeOptions;

  constructor(options?: DecodeOptions) {
    this._decode = { clock: options?.clock };
  }

  loadAllAccounts(): Map<string, Account> {
    const accounts = new Map<string, Account>();
    for (const [id, document] of this._documents) {
      accounts.set(id, decodeAccount(id, document, this._decode));
    }
    return accounts;
  }

  saveAccount(id: string, account: Account): void {
    this._documents.set(id, encodeAccount(account));
  }

  deleteAccount(id: string): void {
    this._documents.delete(id);
  }

  renameAccount(oldId: string, newId: string): void {
    const document = this._documents.get(oldId);
    if (document === undefined) {
      throw new StoreError("ACCOUNT_NOT_FOUND", `No record for account "${oldId}"`, oldId);
    }
    if (this._documents.has(newId)) {
      throw new StoreError("ACCOUNT_EXISTS", `Account "${newId}" already exists`, newId);
    }

    this._documents.set(newId, document);
    this._documents.delete(oldId);
  }

  isAvailable(): boolean {
    return true;
  }

  /** Number of stored records */
  get size(): number {
    return this._documents.size;
  }

  /**
   * Store a raw document as-is, bypassing the encoder.
   * Lets tests seed records written by older versions.
   */
  putDocument(id: string, document: unknown): void {
    this._documents.set(id, document);
  }
}
