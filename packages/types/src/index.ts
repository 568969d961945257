/**
 * @caixa-escolar/types — Shared domain types for the grant ledger.
 *
 * These types are used across all caixa-escolar packages:
 * - Accounts, programs and opening balances
 * - Monthly movements and period keys
 * - Runtime guards for system boundaries
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types; meaning lives in consuming code
 */

export type {
  Account,
  Movement,
  MovementInput,
  OpeningBalance,
  Period,
  ResourceKind,
} from "./grant.js";

export {
  isResourceKind,
  isMonth,
  isPeriod,
  isOpeningBalance,
  isMovementInput,
  isMovement,
} from "./guards.js";
