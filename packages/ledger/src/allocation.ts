/**
 * Allocation Engine — distributes one bank-reported interest figure.
 *
 * The bank credits a single interest (or adjustment) amount per account
 * per month. It is split across the account's programs in proportion to
 * each program's pre-interest base balance, per resource:
 *
 *   baseCapital  = max(0, prior capital + creditCapital − debitCapital)
 *   baseCusteio  = max(0, prior custeio + creditCusteio − debitCusteio)
 *   total        = Σ (baseCapital + baseCusteio)
 *   interestCapital = bank × baseCapital / total
 *
 * Rules:
 * - Pure: nothing is persisted here
 * - Shares sum to 1 whenever total > 0, so interest is conserved
 * - When total is 0 every share is 0 and the bank figure is dropped
 *   (reported as `dropped` in the summary, never thrown)
 */

import type { Account, Movement, MovementInput, Period } from "@caixa-escolar/types";
import { resolvePriorBalances } from "./balance-resolver.js";
import { finalizeMovement } from "./movement.js";
import { clampAtZero, validateAmount, validateMovementInput } from "./money-math.js";
import { assertPeriod } from "./period.js";
import type { AllocationSummary, PeriodInput, ProgramAllocation } from "./types.js";
import { LedgerError } from "./types.js";

/** bank × share, with a zero share always giving +0. */
function applyShare(bankInterestTotal: number, share: number): number {
  return share === 0 ? 0 : bankInterestTotal * share;
}

function validateAllocationInput(
  account: Account,
  period: Period,
  bankInterestTotal: number,
  input: PeriodInput,
): void {
  assertPeriod(period);
  validateAmount(bankInterestTotal, "bankInterestTotal");

  if (input.size === 0) {
    throw new LedgerError("INVALID_INPUT", "Allocation needs at least one program");
  }

  for (const [program, values] of input) {
    if (!account.programs.includes(program)) {
      throw new LedgerError(
        "UNKNOWN_PROGRAM",
        `Program "${program}" is not registered on account "${account.id}"`,
      );
    }
    validateMovementInput(program, values);
  }
}

/**
 * Compute base balances, shares and the finalized movements for one month.
 *
 * Throws LedgerError (INVALID_INPUT, INVALID_PERIOD, UNKNOWN_PROGRAM)
 * before any computation when the input is invalid.
 */
export function allocationSummary(
  account: Account,
  month: number,
  year: number,
  bankInterestTotal: number,
  input: PeriodInput,
): AllocationSummary {
  const period: Period = { year, month };
  validateAllocationInput(account, period, bankInterestTotal, input);

  // Step 1: base balances
  const bases: { program: string; values: MovementInput; capital: number; custeio: number }[] = [];
  let totalBase = 0;

  for (const [program, values] of input) {
    const prior = resolvePriorBalances(account, program, month, year);
    const capital = clampAtZero(prior.capital + values.creditCapital - values.debitCapital);
    const custeio = clampAtZero(prior.custeio + values.creditCusteio - values.debitCusteio);
    bases.push({ program, values, capital, custeio });
    totalBase += capital + custeio;
  }

  // Step 2: shares; Step 3: emit
  const programs: ProgramAllocation[] = [];
  const movements: Movement[] = [];

  for (const base of bases) {
    const capitalShare = totalBase > 0 ? base.capital / totalBase : 0;
    const custeioShare = totalBase > 0 ? base.custeio / totalBase : 0;

    programs.push({
      program: base.program,
      baseCapital: base.capital,
      baseCusteio: base.custeio,
      capitalShare,
      custeioShare,
    });

    movements.push(
      finalizeMovement(base.program, period, base.values, {
        interestCapital: applyShare(bankInterestTotal, capitalShare),
        interestCusteio: applyShare(bankInterestTotal, custeioShare),
      }),
    );
  }

  return {
    period,
    bankInterestTotal,
    totalBase,
    dropped: totalBase <= 0 && bankInterestTotal !== 0,
    programs,
    movements,
  };
}

/**
 * Distribute `bankInterestTotal` across the programs in `input` and
 * return one finalized movement per program, in input order.
 */
export function allocate(
  account: Account,
  month: number,
  year: number,
  bankInterestTotal: number,
  input: PeriodInput,
): readonly Movement[] {
  return allocationSummary(account, month, year, bankInterestTotal, input).movements;
}
