/**
 * @caixa-escolar/ledger — Internal types for the ledger engine.
 *
 * These extend the shared @caixa-escolar/types with engine-specific
 * structures used by the resolver, allocator, writer and reports.
 *
 * Rules:
 * - All types are readonly
 * - No mutation of stored movements
 * - Fail-closed: invalid input throws, never silently succeeds
 */

import type { Movement, MovementInput, Period } from "@caixa-escolar/types";

// ─── Selectors ───────────────────────────────────────────────────────────

/** Program selector meaning "every program of the account". */
export const ALL_PROGRAMS = "*";

export type ProgramSelector = string;

// ─── Allocation Types ────────────────────────────────────────────────────

/**
 * Raw per-program figures for one month, keyed by program label.
 * Iteration order determines the order of emitted movements.
 */
export type PeriodInput = ReadonlyMap<string, MovementInput>;

/**
 * Pre-interest base balances and shares for one program.
 */
export interface ProgramAllocation {
  readonly program: string;
  /** max(0, prior capital + credit − debit) */
  readonly baseCapital: number;
  /** max(0, prior custeio + credit − debit) */
  readonly baseCusteio: number;
  readonly capitalShare: number;
  readonly custeioShare: number;
}

/**
 * Full result of distributing one bank-reported figure.
 */
export interface AllocationSummary {
  readonly period: Period;
  readonly bankInterestTotal: number;
  /** Σ(baseCapital + baseCusteio) over all programs */
  readonly totalBase: number;
  /** True when a nonzero bank figure had no base to be attributed to. */
  readonly dropped: boolean;
  readonly programs: readonly ProgramAllocation[];
  readonly movements: readonly Movement[];
}

// ─── Report Types ────────────────────────────────────────────────────────

export type StatementRowKind = "period" | "total";

/**
 * One line of a running-balance statement.
 *
 * `period` rows mirror a single movement; `total` rows close a program's
 * series with the summed flows and the last running balances.
 */
export interface StatementRow {
  readonly kind: StatementRowKind;
  /** Program label, or "TOTAL" for closing rows */
  readonly program: string;
  /** Set on period rows only */
  readonly period?: Period | undefined;
  /** Month display name, or "---" for closing rows */
  readonly monthName: string;
  readonly credit: number;
  readonly interest: number;
  readonly debit: number;
  readonly runningCapital: number;
  readonly runningCusteio: number;
  readonly runningTotal: number;
}

/**
 * Year totals for a single program.
 */
export interface ProgramYearSummary {
  readonly program: string;
  readonly openingCapital: number;
  readonly openingCusteio: number;
  readonly credit: number;
  readonly interest: number;
  readonly debit: number;
  readonly closingCapital: number;
  readonly closingCusteio: number;
  readonly closingTotal: number;
}

/**
 * Year totals for an account, per program and overall.
 */
export interface YearSummary {
  readonly accountId: string;
  readonly year: number;
  readonly programs: readonly ProgramYearSummary[];
  readonly credit: number;
  readonly interest: number;
  readonly debit: number;
  readonly closingTotal: number;
}

// ─── Period View ─────────────────────────────────────────────────────────

/**
 * What the month editor needs for one program.
 */
export interface ProgramPeriodView {
  readonly program: string;
  readonly priorCapital: number;
  readonly priorCusteio: number;
  /** Saved figures, or zeros when the month has no movement yet */
  readonly input: MovementInput;
  readonly movement?: Movement | undefined;
}

/**
 * Editing view of one (account, year, month) slot.
 */
export interface PeriodView {
  readonly accountId: string;
  readonly period: Period;
  /** True when the month already has saved movements */
  readonly editing: boolean;
  /** Σ totalInterest of the saved movements (the last bank figure entered) */
  readonly bankInterestTotal: number;
  readonly programs: readonly ProgramPeriodView[];
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "INVALID_INPUT"
  | "INVALID_PERIOD"
  | "UNKNOWN_ACCOUNT"
  | "UNKNOWN_PROGRAM"
  | "DUPLICATE_ACCOUNT"
  | "DUPLICATE_PROGRAM"
  | "DUPLICATE_YEAR";

/**
 * Structured error from the ledger engine.
 * Always thrown, never returned.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}
