/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Maps LedgerError and StoreError codes to HTTP status codes.
 */

import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { LedgerError } from "@caixa-escolar/ledger";
import { StoreError } from "@caixa-escolar/store";
import type { ApiErrorCode } from "../types/error.js";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

const STATUS_MAP: Partial<Record<ApiErrorCode, ContentfulStatusCode>> = {
  // Ledger errors
  INVALID_INPUT: 400,
  INVALID_PERIOD: 400,
  UNKNOWN_ACCOUNT: 404,
  UNKNOWN_PROGRAM: 404,
  DUPLICATE_ACCOUNT: 409,
  DUPLICATE_PROGRAM: 409,
  DUPLICATE_YEAR: 409,

  // Store errors
  STORE_UNAVAILABLE: 503,
  ACCOUNT_EXISTS: 409,
  ACCOUNT_NOT_FOUND: 404,
};

function domainCode(err: Error): ApiErrorCode | undefined {
  if (err instanceof LedgerError || err instanceof StoreError) {
    return err.code;
  }
  return undefined;
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Global error handler. Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context): Response {
  const code = domainCode(err);
  const status = (code !== undefined ? STATUS_MAP[code] : undefined) ?? 500;

  // Don't leak internal details
  if (status === 500) {
    return c.json(createErrorEnvelope(code ?? "INTERNAL_ERROR", "Internal server error"), 500);
  }

  return c.json(createErrorEnvelope(code ?? "INTERNAL_ERROR", err.message), status);
}
