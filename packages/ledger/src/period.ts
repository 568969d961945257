/**
 * @caixa-escolar/ledger — Period keys.
 *
 * A period is a (year, month) slot. Chronological order is
 * lexicographic on (year, month).
 */

import type { Period } from "@caixa-escolar/types";
import { isPeriod } from "@caixa-escolar/types";
import { LedgerError } from "./types.js";

export const MONTH_NAMES: readonly string[] = [
  "Janeiro",
  "Fevereiro",
  "Março",
  "Abril",
  "Maio",
  "Junho",
  "Julho",
  "Agosto",
  "Setembro",
  "Outubro",
  "Novembro",
  "Dezembro",
];

/**
 * Throw INVALID_PERIOD unless month is an integer in 1..12
 * and year is an integer.
 */
export function assertPeriod(period: Period): void {
  if (!isPeriod(period)) {
    throw new LedgerError(
      "INVALID_PERIOD",
      `Invalid period: year=${String(period.year)}, month=${String(period.month)}`,
    );
  }
}

/**
 * Compare two periods. Returns -1, 0, or 1.
 */
export function comparePeriods(a: Period, b: Period): -1 | 0 | 1 {
  if (a.year !== b.year) return a.year < b.year ? -1 : 1;
  if (a.month !== b.month) return a.month < b.month ? -1 : 1;
  return 0;
}

/**
 * True when `period` is strictly before `target`.
 */
export function isBefore(period: Period, target: Period): boolean {
  return comparePeriods(period, target) < 0;
}

export function samePeriod(a: Period, b: Period): boolean {
  return a.year === b.year && a.month === b.month;
}

/**
 * The period immediately following. December rolls into January.
 */
export function nextPeriod(period: Period): Period {
  return period.month === 12
    ? { year: period.year + 1, month: 1 }
    : { year: period.year, month: period.month + 1 };
}

export function monthName(month: number): string {
  const name = MONTH_NAMES[month - 1];
  if (name === undefined) {
    throw new LedgerError("INVALID_PERIOD", `Invalid month: ${String(month)}`);
  }
  return name;
}
