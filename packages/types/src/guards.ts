/**
 * Runtime Type Guards
 *
 * Narrowing functions for grant ledger types.
 * These enable safe runtime validation at system boundaries
 * (API inputs, deserialized data, engine arguments).
 */

import type {
  Movement,
  MovementInput,
  OpeningBalance,
  Period,
  ResourceKind,
} from "./grant.js";

const RESOURCE_KINDS = new Set<string>(["Capital", "Custeio", "Total"]);

function isFiniteNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

function isNonNegative(value: unknown): value is number {
  return isFiniteNumber(value) && value >= 0;
}

export function isResourceKind(value: unknown): value is ResourceKind {
  return typeof value === "string" && RESOURCE_KINDS.has(value);
}

/** Integer month in 1..12. */
export function isMonth(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 1 && value <= 12;
}

export function isPeriod(value: unknown): value is Period {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return typeof v.year === "number" && Number.isInteger(v.year) && isMonth(v.month);
}

export function isOpeningBalance(value: unknown): value is OpeningBalance {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return isFiniteNumber(v.capital) && isFiniteNumber(v.custeio);
}

export function isMovementInput(value: unknown): value is MovementInput {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isNonNegative(v.creditCapital) &&
    isNonNegative(v.creditCusteio) &&
    isNonNegative(v.debitCapital) &&
    isNonNegative(v.debitCusteio)
  );
}

export function isMovement(value: unknown): value is Movement {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isMovementInput(value) &&
    isPeriod(value) &&
    typeof v.program === "string" &&
    v.program.length > 0 &&
    isFiniteNumber(v.interestCapital) &&
    isFiniteNumber(v.interestCusteio) &&
    isFiniteNumber(v.totalCredit) &&
    isFiniteNumber(v.totalDebit) &&
    isFiniteNumber(v.totalInterest)
  );
}
