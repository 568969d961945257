/**
 * @caixa-escolar/ledger — Account book.
 *
 * The in-memory application context: every account the caller is working
 * with, plus the fiscal years opened in this session. Callers own the book
 * and pass it explicitly; persistence happens outside, through a store.
 *
 * Rules:
 * - No duplicate account IDs; no duplicate programs within an account
 * - Accounts are values: every mutation stores a new Account
 * - Rename is copy-first, delete-second, and fails before touching either
 *   account when the target name is taken
 */

import type {
  Account,
  MovementInput,
  OpeningBalance,
  ResourceKind,
} from "@caixa-escolar/types";
import { allocationSummary } from "./allocation.js";
import { resolveBalance, resolvePriorBalances } from "./balance-resolver.js";
import { inputOf, ZERO_INPUT } from "./movement.js";
import { sumBy, validateAmount } from "./money-math.js";
import { assertPeriod } from "./period.js";
import { movementsForPeriod, replacePeriod } from "./period-writer.js";
import { buildStatement, summarizeYear } from "./statement.js";
import type {
  AllocationSummary,
  PeriodInput,
  PeriodView,
  ProgramSelector,
  StatementRow,
  YearSummary,
} from "./types.js";
import { LedgerError } from "./types.js";

/** Lowest and highest fiscal year that can be opened. */
export const MIN_YEAR = 2000;
export const MAX_YEAR = 2050;

export interface AccountBookOptions {
  /** Accounts to start with (e.g. loaded from a store) */
  readonly accounts?: Iterable<Account> | undefined;
  /** Clock used for the current fiscal year. Default: system time */
  readonly clock?: (() => Date) | undefined;
}

/**
 * Build an empty account with no programs.
 */
export function emptyAccount(id: string): Account {
  return { id, programs: [], openingBalances: {}, movements: [] };
}

function normalizeLabel(value: string, what: string): string {
  const label = typeof value === "string" ? value.trim() : "";
  if (label === "") {
    throw new LedgerError("INVALID_INPUT", `${what} must not be empty`);
  }
  return label;
}

export class AccountBook {
  private readonly _accounts: Map<string, Account> = new Map();
  private readonly _openedYears: Set<number> = new Set();
  private readonly _clock: () => Date;

  constructor(options?: AccountBookOptions) {
    this._clock = options?.clock ?? (() => new Date());
    for (const account of options?.accounts ?? []) {
      this._accounts.set(account.id, account);
    }
  }

  // ─── Accounts ────────────────────────────────────────────────────────

  /**
   * Get an account by ID.
   * Returns undefined if not found.
   */
  get(id: string): Account | undefined {
    return this._accounts.get(id);
  }

  has(id: string): boolean {
    return this._accounts.has(id);
  }

  /**
   * Assert an account exists. Throws if not found.
   */
  assertExists(id: string): Account {
    const account = this._accounts.get(id);
    if (account === undefined) {
      throw new LedgerError("UNKNOWN_ACCOUNT", `Unknown account: "${id}"`);
    }
    return account;
  }

  /**
   * All accounts in registration order.
   */
  getAll(): readonly Account[] {
    return [...this._accounts.values()];
  }

  get count(): number {
    return this._accounts.size;
  }

  /**
   * Register a new, empty account.
   * Throws if the ID is empty or already taken.
   */
  registerAccount(id: string): Account {
    const accountId = normalizeLabel(id, "Account ID");
    if (this._accounts.has(accountId)) {
      throw new LedgerError("DUPLICATE_ACCOUNT", `Account already exists: "${accountId}"`);
    }

    const account = emptyAccount(accountId);
    this._accounts.set(accountId, account);
    return account;
  }

  /**
   * Remove an account and everything it holds. Returns the removed account.
   */
  deleteAccount(id: string): Account {
    const account = this.assertExists(id);
    this._accounts.delete(id);
    return account;
  }

  /**
   * Move an account to a new ID.
   *
   * Throws DUPLICATE_ACCOUNT when `newId` exists and UNKNOWN_ACCOUNT when
   * `oldId` does not; neither account changes in that case.
   */
  renameAccount(oldId: string, newId: string): Account {
    const source = this.assertExists(oldId);
    const targetId = normalizeLabel(newId, "Account ID");
    if (this._accounts.has(targetId)) {
      throw new LedgerError("DUPLICATE_ACCOUNT", `Account already exists: "${targetId}"`);
    }

    const renamed: Account = { ...source, id: targetId };
    this._accounts.set(targetId, renamed);
    this._accounts.delete(oldId);
    return renamed;
  }

  // ─── Programs ────────────────────────────────────────────────────────

  /**
   * Add a program with a zero opening balance.
   */
  addProgram(accountId: string, program: string): Account {
    const account = this.assertExists(accountId);
    const label = normalizeLabel(program, "Program name");
    if (account.programs.includes(label)) {
      throw new LedgerError(
        "DUPLICATE_PROGRAM",
        `Program "${label}" already exists on account "${accountId}"`,
      );
    }

    return this._store({
      ...account,
      programs: [...account.programs, label],
      openingBalances: {
        ...account.openingBalances,
        [label]: { capital: 0, custeio: 0 },
      },
    });
  }

  /**
   * Replace a program's opening balance. Negative values are allowed
   * (administrative adjustments).
   */
  setOpeningBalance(accountId: string, program: string, balance: OpeningBalance): Account {
    const account = this._assertProgram(accountId, program);
    validateAmount(balance.capital, "Opening capital");
    validateAmount(balance.custeio, "Opening custeio");

    return this._store({
      ...account,
      openingBalances: {
        ...account.openingBalances,
        [program]: { capital: balance.capital, custeio: balance.custeio },
      },
    });
  }

  // ─── Periods ─────────────────────────────────────────────────────────

  /**
   * Balance of a program accumulated strictly before (year, month).
   */
  balance(
    accountId: string,
    program: string,
    kind: ResourceKind,
    month: number,
    year: number,
  ): number {
    const account = this._assertProgram(accountId, program);
    return resolveBalance(account, program, kind, month, year);
  }

  /**
   * The month editor's view: saved figures (or zeros), prior balances,
   * and the bank figure implied by the saved interest.
   */
  describePeriod(accountId: string, month: number, year: number): PeriodView {
    const account = this.assertExists(accountId);
    assertPeriod({ year, month });

    const saved = movementsForPeriod(account, year, month);

    return {
      accountId,
      period: { year, month },
      editing: saved.length > 0,
      bankInterestTotal: sumBy(saved, (m) => m.totalInterest),
      programs: account.programs.map((program) => {
        const prior = resolvePriorBalances(account, program, month, year);
        const movement = saved.find((m) => m.program === program);
        return {
          program,
          priorCapital: prior.capital,
          priorCusteio: prior.custeio,
          input: movement !== undefined ? inputOf(movement) : ZERO_INPUT,
          movement,
        };
      }),
    };
  }

  /**
   * Allocate the bank figure across `input` and replace the month's
   * movements with the result. Nothing changes when validation fails.
   */
  savePeriod(
    accountId: string,
    month: number,
    year: number,
    bankInterestTotal: number,
    input: PeriodInput,
  ): AllocationSummary {
    const account = this.assertExists(accountId);
    const summary = allocationSummary(account, month, year, bankInterestTotal, input);
    this._store(replacePeriod(account, year, month, summary.movements));
    return summary;
  }

  // ─── Reports ─────────────────────────────────────────────────────────

  statement(accountId: string, selector: ProgramSelector, year: number): readonly StatementRow[] {
    return buildStatement(this.assertExists(accountId), selector, year);
  }

  yearSummary(accountId: string, year: number): YearSummary {
    return summarizeYear(this.assertExists(accountId), year);
  }

  // ─── Fiscal Years ────────────────────────────────────────────────────

  /**
   * Sorted union of the current year, every year with movements and
   * the years opened in this session.
   */
  years(): readonly number[] {
    const years = new Set<number>([this._clock().getFullYear(), ...this._openedYears]);
    for (const account of this._accounts.values()) {
      for (const m of account.movements) {
        years.add(m.year);
      }
    }
    return [...years].sort((a, b) => a - b);
  }

  /**
   * Open a fiscal year for entry. Session-only; not persisted.
   */
  openYear(year: number): readonly number[] {
    if (!Number.isInteger(year) || year < MIN_YEAR || year > MAX_YEAR) {
      throw new LedgerError(
        "INVALID_PERIOD",
        `Fiscal year must be an integer between ${String(MIN_YEAR)} and ${String(MAX_YEAR)}, got: ${String(year)}`,
      );
    }
    if (this.years().includes(year)) {
      throw new LedgerError("DUPLICATE_YEAR", `Fiscal year ${String(year)} is already open`);
    }
    this._openedYears.add(year);
    return this.years();
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private _assertProgram(accountId: string, program: string): Account {
    const account = this.assertExists(accountId);
    if (!account.programs.includes(program)) {
      throw new LedgerError(
        "UNKNOWN_PROGRAM",
        `Program "${program}" is not registered on account "${accountId}"`,
      );
    }
    return account;
  }

  private _store(account: Account): Account {
    this._accounts.set(account.id, account);
    return account;
  }
}
