/**
 * Grant Ledger Types
 *
 * Records for tracking school funding programs inside shared bank accounts.
 *
 * Rules:
 * - Amounts are plain numbers (bank statement figures in reais)
 * - Every program balance splits into capital and custeio resources
 * - Movements are keyed by (account, program, year, month)
 * - Records are never mutated; replacing a month produces a new Account
 */

/**
 * Resource component a balance is computed for.
 * `Total` is the sum of capital and custeio.
 */
export type ResourceKind = "Capital" | "Custeio" | "Total";

/**
 * A (year, month) ledger slot. Month is 1-based (1 = January).
 */
export interface Period {
  readonly year: number;
  readonly month: number;
}

/**
 * Manually entered starting balance for a program, predating any
 * tracked movement.
 */
export interface OpeningBalance {
  readonly capital: number;
  readonly custeio: number;
}

/**
 * User-entered figures for one program in one month.
 * All four values are non-negative.
 */
export interface MovementInput {
  readonly creditCapital: number;
  readonly creditCusteio: number;
  readonly debitCapital: number;
  readonly debitCusteio: number;
}

/**
 * One month's finalized record for a program.
 *
 * Interest fields are computed by the allocation engine and may be
 * negative when the bank reports a negative adjustment.
 * Totals are derived; never edit them independently.
 */
export interface Movement extends MovementInput, Period {
  readonly program: string;
  readonly interestCapital: number;
  readonly interestCusteio: number;
  readonly totalCredit: number;
  readonly totalDebit: number;
  readonly totalInterest: number;
}

/**
 * A bank account holding one or more funding programs.
 */
export interface Account {
  /** Account number or name, e.g. "27.922-6" */
  readonly id: string;

  /** Program labels in registration order */
  readonly programs: readonly string[];

  /** Opening balance per program */
  readonly openingBalances: Readonly<Record<string, OpeningBalance>>;

  /** Unordered movement records */
  readonly movements: readonly Movement[];
}
