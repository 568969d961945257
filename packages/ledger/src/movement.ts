/**
 * @caixa-escolar/ledger — Movement construction.
 *
 * The only place derived totals are computed. Everything that builds a
 * Movement (the allocation engine, the record codec) goes through here.
 */

import type { Movement, MovementInput, Period } from "@caixa-escolar/types";

export interface MovementTotals {
  readonly totalCredit: number;
  readonly totalDebit: number;
  readonly totalInterest: number;
}

export interface InterestSplit {
  readonly interestCapital: number;
  readonly interestCusteio: number;
}

export function computeTotals(input: MovementInput, interest: InterestSplit): MovementTotals {
  return {
    totalCredit: input.creditCapital + input.creditCusteio,
    totalDebit: input.debitCapital + input.debitCusteio,
    totalInterest: interest.interestCapital + interest.interestCusteio,
  };
}

/**
 * Build a finalized movement from user input and computed interest.
 */
export function finalizeMovement(
  program: string,
  period: Period,
  input: MovementInput,
  interest: InterestSplit,
): Movement {
  return {
    program,
    year: period.year,
    month: period.month,
    creditCapital: input.creditCapital,
    creditCusteio: input.creditCusteio,
    debitCapital: input.debitCapital,
    debitCusteio: input.debitCusteio,
    interestCapital: interest.interestCapital,
    interestCusteio: interest.interestCusteio,
    ...computeTotals(input, interest),
  };
}

/** Net capital change of a movement: credit + interest − debit. */
export function netCapital(m: Movement): number {
  return m.creditCapital + m.interestCapital - m.debitCapital;
}

/** Net custeio change of a movement: credit + interest − debit. */
export function netCusteio(m: Movement): number {
  return m.creditCusteio + m.interestCusteio - m.debitCusteio;
}

/** The user-entered part of a movement. */
export function inputOf(m: Movement): MovementInput {
  return {
    creditCapital: m.creditCapital,
    creditCusteio: m.creditCusteio,
    debitCapital: m.debitCapital,
    debitCusteio: m.debitCusteio,
  };
}

export const ZERO_INPUT: MovementInput = {
  creditCapital: 0,
  creditCusteio: 0,
  debitCapital: 0,
  debitCusteio: 0,
};
