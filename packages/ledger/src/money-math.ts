/**
 * @caixa-escolar/ledger — Amount checks and arithmetic helpers.
 *
 * Amounts are plain numbers as reported on bank statements.
 * Sums may drift by floating-point rounding; compare with
 * `amountsEqual` instead of `===`.
 *
 * Rules:
 * - Every amount must be finite
 * - User-entered credits and debits must be non-negative
 * - Allocation weights are floored at zero
 */

import type { MovementInput } from "@caixa-escolar/types";
import { LedgerError } from "./types.js";

/** Default tolerance for comparing computed amounts. */
export const AMOUNT_TOLERANCE = 1e-6;

/**
 * Throw INVALID_INPUT unless `value` is a finite number.
 */
export function validateAmount(value: number, label: string): void {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new LedgerError("INVALID_INPUT", `${label} must be a finite number, got: ${String(value)}`);
  }
}

/**
 * Throw INVALID_INPUT unless `value` is finite and ≥ 0.
 */
export function validateNonNegative(value: number, label: string): void {
  validateAmount(value, label);
  if (value < 0) {
    throw new LedgerError("INVALID_INPUT", `${label} must not be negative, got: ${String(value)}`);
  }
}

/**
 * Validate the four user-entered figures of a program's month.
 */
export function validateMovementInput(program: string, input: MovementInput): void {
  validateNonNegative(input.creditCapital, `${program}: creditCapital`);
  validateNonNegative(input.creditCusteio, `${program}: creditCusteio`);
  validateNonNegative(input.debitCapital, `${program}: debitCapital`);
  validateNonNegative(input.debitCusteio, `${program}: debitCusteio`);
}

/**
 * max(0, value). Maps -0 to 0.
 */
export function clampAtZero(value: number): number {
  return value > 0 ? value : 0;
}

/**
 * Compare two amounts within a tolerance.
 */
export function amountsEqual(a: number, b: number, tolerance: number = AMOUNT_TOLERANCE): boolean {
  return Math.abs(a - b) <= tolerance;
}

/**
 * Sum a projection over a list.
 */
export function sumBy<T>(items: readonly T[], pick: (item: T) => number): number {
  let total = 0;
  for (const item of items) {
    total += pick(item);
  }
  return total;
}
