/**
 * @caixa-escolar/ledger — Statement and year report aggregation.
 *
 * Replays a program's movements for one year in month order, seeded with
 * the balance carried in from earlier years.
 *
 * Rules:
 * - Rows are sparse: one per saved movement, no filler months
 * - Each non-empty program series ends with a TOTAL row
 * - Running balances agree with resolveBalance at the following period
 */

import type { Account, Movement } from "@caixa-escolar/types";
import { resolvePriorBalances } from "./balance-resolver.js";
import { netCapital, netCusteio } from "./movement.js";
import { sumBy } from "./money-math.js";
import { assertPeriod, monthName } from "./period.js";
import type {
  ProgramSelector,
  ProgramYearSummary,
  StatementRow,
  YearSummary,
} from "./types.js";
import { ALL_PROGRAMS, LedgerError } from "./types.js";

export const TOTAL_LABEL = "TOTAL";
const TOTAL_MONTH = "---";

function programsFor(account: Account, selector: ProgramSelector): readonly string[] {
  if (selector === ALL_PROGRAMS) {
    return account.programs;
  }
  if (!account.programs.includes(selector)) {
    throw new LedgerError(
      "UNKNOWN_PROGRAM",
      `Program "${selector}" is not registered on account "${account.id}"`,
    );
  }
  return [selector];
}

/**
 * A program's movements for `year`, ascending by month.
 */
function yearMovements(account: Account, program: string, year: number): Movement[] {
  return account.movements
    .filter((m) => m.program === program && m.year === year)
    .sort((a, b) => a.month - b.month);
}

function programSeries(account: Account, program: string, year: number): StatementRow[] {
  const movements = yearMovements(account, program, year);
  if (movements.length === 0) {
    return [];
  }

  const seed = resolvePriorBalances(account, program, 1, year);
  let runningCapital = seed.capital;
  let runningCusteio = seed.custeio;
  const rows: StatementRow[] = [];

  for (const m of movements) {
    runningCapital += netCapital(m);
    runningCusteio += netCusteio(m);

    rows.push({
      kind: "period",
      program,
      period: { year: m.year, month: m.month },
      monthName: monthName(m.month),
      credit: m.totalCredit,
      interest: m.totalInterest,
      debit: m.totalDebit,
      runningCapital,
      runningCusteio,
      runningTotal: runningCapital + runningCusteio,
    });
  }

  rows.push({
    kind: "total",
    program: TOTAL_LABEL,
    monthName: TOTAL_MONTH,
    credit: sumBy(rows, (r) => r.credit),
    interest: sumBy(rows, (r) => r.interest),
    debit: sumBy(rows, (r) => r.debit),
    runningCapital,
    runningCusteio,
    runningTotal: runningCapital + runningCusteio,
  });

  return rows;
}

/**
 * Build the running-balance statement of one program, or of every
 * program (ALL_PROGRAMS) concatenated in account order.
 */
export function buildStatement(
  account: Account,
  selector: ProgramSelector,
  year: number,
): readonly StatementRow[] {
  assertPeriod({ year, month: 1 });

  const rows: StatementRow[] = [];
  for (const program of programsFor(account, selector)) {
    rows.push(...programSeries(account, program, year));
  }
  return rows;
}

/**
 * Per-program and account-wide totals for one year.
 */
export function summarizeYear(account: Account, year: number): YearSummary {
  assertPeriod({ year, month: 1 });

  const programs: ProgramYearSummary[] = account.programs.map((program) => {
    const opening = resolvePriorBalances(account, program, 1, year);
    const movements = yearMovements(account, program, year);
    const closingCapital = opening.capital + sumBy(movements, netCapital);
    const closingCusteio = opening.custeio + sumBy(movements, netCusteio);

    return {
      program,
      openingCapital: opening.capital,
      openingCusteio: opening.custeio,
      credit: sumBy(movements, (m) => m.totalCredit),
      interest: sumBy(movements, (m) => m.totalInterest),
      debit: sumBy(movements, (m) => m.totalDebit),
      closingCapital,
      closingCusteio,
      closingTotal: closingCapital + closingCusteio,
    };
  });

  return {
    accountId: account.id,
    year,
    programs,
    credit: sumBy(programs, (p) => p.credit),
    interest: sumBy(programs, (p) => p.interest),
    debit: sumBy(programs, (p) => p.debit),
    closingTotal: sumBy(programs, (p) => p.closingTotal),
  };
}
