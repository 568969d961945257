/**
 * @caixa-escolar/ledger — Period ledger writer.
 *
 * Replaces the whole movement set of one (account, year, month) slot.
 * There is no per-program merge: re-saving a month supersedes every
 * program's entry for it, including programs absent from the new set.
 */

import type { Account, Movement } from "@caixa-escolar/types";
import { isMovement } from "@caixa-escolar/types";
import { assertPeriod, samePeriod } from "./period.js";
import { LedgerError } from "./types.js";

function validateReplacement(
  year: number,
  month: number,
  movements: readonly Movement[],
): void {
  const seen = new Set<string>();

  for (const m of movements) {
    if (!isMovement(m)) {
      throw new LedgerError("INVALID_INPUT", "Replacement contains a malformed movement");
    }
    if (!samePeriod(m, { year, month })) {
      throw new LedgerError(
        "INVALID_INPUT",
        `Movement for "${m.program}" is dated ${String(m.month)}/${String(m.year)}, expected ${String(month)}/${String(year)}`,
      );
    }
    if (seen.has(m.program)) {
      throw new LedgerError(
        "INVALID_INPUT",
        `Program "${m.program}" appears twice in ${String(month)}/${String(year)}`,
      );
    }
    seen.add(m.program);
  }
}

/**
 * Return a new account whose movements for (year, month) are exactly
 * `newMovements`. All other periods are kept as they were.
 */
export function replacePeriod(
  account: Account,
  year: number,
  month: number,
  newMovements: readonly Movement[],
): Account {
  assertPeriod({ year, month });
  validateReplacement(year, month, newMovements);

  const kept = account.movements.filter((m) => !samePeriod(m, { year, month }));

  return {
    ...account,
    movements: [...kept, ...newMovements],
  };
}

/**
 * Movements saved for one (year, month) slot, in stored order.
 */
export function movementsForPeriod(
  account: Account,
  year: number,
  month: number,
): readonly Movement[] {
  return account.movements.filter((m) => samePeriod(m, { year, month }));
}
