/**
 * @caixa-escolar/ledger — Balance resolver.
 *
 * Reconstructs a program's balance accumulated strictly before a target
 * month: opening balance plus (credit + interest − debit) of every
 * earlier movement.
 *
 * Rules:
 * - Pure function of the account value; full scan per call
 * - No clamping: debits beyond income give a negative balance
 * - Programs without an opening balance entry start at zero
 */

import type { Account, Movement, ResourceKind } from "@caixa-escolar/types";
import { isResourceKind } from "@caixa-escolar/types";
import { netCapital, netCusteio } from "./movement.js";
import { assertPeriod, isBefore } from "./period.js";
import { LedgerError } from "./types.js";

/**
 * Prior balances of a program split by resource.
 */
export interface PriorBalances {
  readonly capital: number;
  readonly custeio: number;
  readonly total: number;
}

function netFor(kind: ResourceKind, m: Movement): number {
  switch (kind) {
    case "Capital":
      return netCapital(m);
    case "Custeio":
      return netCusteio(m);
    case "Total":
      return netCapital(m) + netCusteio(m);
  }
}

function openingFor(account: Account, program: string, kind: ResourceKind): number {
  const opening = account.openingBalances[program];
  if (opening === undefined) return 0;
  switch (kind) {
    case "Capital":
      return opening.capital;
    case "Custeio":
      return opening.custeio;
    case "Total":
      return opening.capital + opening.custeio;
  }
}

/**
 * Balance of `program` for `kind` accumulated strictly before
 * (targetYear, targetMonth).
 */
export function resolveBalance(
  account: Account,
  program: string,
  kind: ResourceKind,
  targetMonth: number,
  targetYear: number,
): number {
  if (!isResourceKind(kind)) {
    throw new LedgerError("INVALID_INPUT", `Unknown resource kind: "${String(kind)}"`);
  }
  const target = { year: targetYear, month: targetMonth };
  assertPeriod(target);

  let balance = openingFor(account, program, kind);

  for (const m of account.movements) {
    if (m.program === program && isBefore(m, target)) {
      balance += netFor(kind, m);
    }
  }

  return balance;
}

/**
 * Capital, custeio and total prior balances in one call.
 */
export function resolvePriorBalances(
  account: Account,
  program: string,
  month: number,
  year: number,
): PriorBalances {
  const capital = resolveBalance(account, program, "Capital", month, year);
  const custeio = resolveBalance(account, program, "Custeio", month, year);
  return { capital, custeio, total: capital + custeio };
}
