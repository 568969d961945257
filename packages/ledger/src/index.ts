/**
 * @caixa-escolar/ledger — Grant ledger and interest allocation engine.
 *
 * A pure TypeScript engine with no runtime dependencies beyond the
 * shared types. Maintains these invariants:
 * - At most one movement per (account, program, year, month)
 * - Derived totals are always recomputed, never edited
 * - Allocated interest sums to the bank figure whenever any base is positive
 * - Saving a month replaces every program's entry for that month
 * - Statements and the balance resolver agree on every running balance
 */

// Account book (application context)
export { AccountBook, emptyAccount, MIN_YEAR, MAX_YEAR } from "./account-book.js";
export type { AccountBookOptions } from "./account-book.js";

// Balance resolution
export { resolveBalance, resolvePriorBalances } from "./balance-resolver.js";
export type { PriorBalances } from "./balance-resolver.js";

// Allocation
export { allocate, allocationSummary } from "./allocation.js";

// Period replacement
export { replacePeriod, movementsForPeriod } from "./period-writer.js";

// Reports
export { buildStatement, summarizeYear, TOTAL_LABEL } from "./statement.js";

// Movements and periods
export {
  computeTotals,
  finalizeMovement,
  netCapital,
  netCusteio,
  inputOf,
  ZERO_INPUT,
} from "./movement.js";
export type { MovementTotals, InterestSplit } from "./movement.js";
export {
  MONTH_NAMES,
  assertPeriod,
  comparePeriods,
  isBefore,
  samePeriod,
  nextPeriod,
  monthName,
} from "./period.js";

// Amount helpers
export {
  AMOUNT_TOLERANCE,
  validateAmount,
  validateNonNegative,
  validateMovementInput,
  clampAtZero,
  amountsEqual,
  sumBy,
} from "./money-math.js";

// Types
export type {
  ProgramSelector,
  PeriodInput,
  ProgramAllocation,
  AllocationSummary,
  StatementRowKind,
  StatementRow,
  ProgramYearSummary,
  YearSummary,
  ProgramPeriodView,
  PeriodView,
  LedgerErrorCode,
} from "./types.js";

export { LedgerError, ALL_PROGRAMS } from "./types.js";
