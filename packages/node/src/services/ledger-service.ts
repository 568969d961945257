/**
 * LedgerService — Composition root for the ledger and its store.
 *
 * Route handlers delegate to this service; they never touch the store
 * directly. Every mutation is applied to the in-memory AccountBook first
 * and then persisted. A store failure does not undo the in-memory change:
 * the result reports `persisted: false` and a warning is logged.
 */

import type { Logger } from "pino";
import type { Account, MovementInput, OpeningBalance, ResourceKind } from "@caixa-escolar/types";
import { AccountBook } from "@caixa-escolar/ledger";
import type {
  AllocationSummary,
  PeriodView,
  ProgramSelector,
  StatementRow,
  YearSummary,
} from "@caixa-escolar/ledger";
import { StoreError } from "@caixa-escolar/store";
import type { LedgerStore } from "@caixa-escolar/store";

// =============================================================================
// Configuration
// =============================================================================

export interface LedgerServiceConfig {
  readonly store: LedgerStore;
  readonly logger: Logger;
  /** Clock for the current fiscal year and undated records. Default: system time */
  readonly clock?: (() => Date) | undefined;
}

/**
 * Result of a mutation, with whether it reached the store.
 */
export interface Persisted<T> {
  readonly value: T;
  readonly persisted: boolean;
}

// =============================================================================
// Service
// =============================================================================

export class LedgerService {
  private readonly _book: AccountBook;
  private readonly _store: LedgerStore;
  private readonly _logger: Logger;

  constructor(config: LedgerServiceConfig) {
    this._store = config.store;
    this._logger = config.logger;
    this._book = new AccountBook({
      accounts: this._loadAccounts(),
      clock: config.clock,
    });
  }

  // ─── Accounts ──────────────────────────────────────────────────────

  listAccounts(): readonly Account[] {
    return this._book.getAll();
  }

  getAccount(id: string): Account {
    return this._book.assertExists(id);
  }

  registerAccount(id: string): Persisted<Account> {
    const account = this._book.registerAccount(id);
    return this._persistAccount("registerAccount", account);
  }

  deleteAccount(id: string): Persisted<Account> {
    const account = this._book.deleteAccount(id);
    const persisted = this._persist("deleteAccount", account.id, () =>
      this._store.deleteAccount(account.id),
    );
    return { value: account, persisted };
  }

  renameAccount(oldId: string, newId: string): Persisted<Account> {
    const account = this._book.renameAccount(oldId, newId);
    const persisted = this._persist("renameAccount", account.id, () => {
      try {
        this._store.renameAccount(oldId, account.id);
      } catch (err) {
        // An account whose first save failed has no record to move
        if (!(err instanceof StoreError && err.code === "ACCOUNT_NOT_FOUND")) throw err;
      }
      // The in-memory account may be ahead of the moved record
      this._store.saveAccount(account.id, account);
    });
    return { value: account, persisted };
  }

  addProgram(accountId: string, program: string): Persisted<Account> {
    return this._persistAccount("addProgram", this._book.addProgram(accountId, program));
  }

  setOpeningBalance(
    accountId: string,
    program: string,
    balance: OpeningBalance,
  ): Persisted<Account> {
    return this._persistAccount(
      "setOpeningBalance",
      this._book.setOpeningBalance(accountId, program, balance),
    );
  }

  balance(
    accountId: string,
    program: string,
    kind: ResourceKind,
    month: number,
    year: number,
  ): number {
    return this._book.balance(accountId, program, kind, month, year);
  }

  // ─── Periods ───────────────────────────────────────────────────────

  describePeriod(accountId: string, month: number, year: number): PeriodView {
    return this._book.describePeriod(accountId, month, year);
  }

  savePeriod(
    accountId: string,
    month: number,
    year: number,
    bankInterestTotal: number,
    input: ReadonlyMap<string, MovementInput>,
  ): Persisted<AllocationSummary> {
    const summary = this._book.savePeriod(accountId, month, year, bankInterestTotal, input);

    if (summary.dropped) {
      this._logger.warn(
        { accountId, year, month, bankInterestTotal },
        "No program had a positive balance; bank interest was not allocated",
      );
    }

    const { persisted } = this._persistAccount("savePeriod", this._book.assertExists(accountId));
    return { value: summary, persisted };
  }

  // ─── Reports ───────────────────────────────────────────────────────

  statement(accountId: string, selector: ProgramSelector, year: number): readonly StatementRow[] {
    return this._book.statement(accountId, selector, year);
  }

  yearSummary(accountId: string, year: number): YearSummary {
    return this._book.yearSummary(accountId, year);
  }

  // ─── Fiscal Years ──────────────────────────────────────────────────

  years(): readonly number[] {
    return this._book.years();
  }

  openYear(year: number): readonly number[] {
    return this._book.openYear(year);
  }

  // ─── Health ────────────────────────────────────────────────────────

  isReady(): boolean {
    return this._store.isAvailable();
  }

  // ─── Internal ──────────────────────────────────────────────────────

  private _loadAccounts(): Account[] {
    try {
      const accounts = [...this._store.loadAllAccounts().values()];
      this._logger.info({ accounts: accounts.length }, "Accounts loaded");
      return accounts;
    } catch (err) {
      if (err instanceof StoreError && err.code === "STORE_UNAVAILABLE") {
        this._logger.warn({ err, code: err.code }, "Store unavailable; starting with no accounts");
        return [];
      }
      throw err;
    }
  }

  private _persistAccount(action: string, account: Account): Persisted<Account> {
    const persisted = this._persist(action, account.id, () =>
      this._store.saveAccount(account.id, account),
    );
    return { value: account, persisted };
  }

  /**
   * Run a store call. StoreErrors are logged and reported as `false`;
   * anything else propagates.
   */
  private _persist(action: string, accountId: string, write: () => void): boolean {
    try {
      write();
      return true;
    } catch (err) {
      if (err instanceof StoreError) {
        this._logger.warn(
          { err, code: err.code, action, accountId },
          "Change kept in memory but not saved to the store",
        );
        return false;
      }
      throw err;
    }
  }
}
