/**
 * Zod validation middleware.
 *
 * Validates request bodies and queries against Zod schemas.
 * Returns 400 with error envelope on validation failure.
 */

import type { Context, MiddlewareHandler } from "hono";
import type { ZodError, ZodType, ZodTypeDef } from "zod";
import type { ValidatedEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

/**
 * Validate JSON request body against a Zod schema.
 *
 * On success, sets `validatedBody` in context variables.
 * On failure, returns 400 with structured validation errors.
 */
export function validateBody<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
): MiddlewareHandler<ValidatedEnv<T>> {
  return async (c, next) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid JSON in request body"),
        400,
      );
    }

    const result = schema.safeParse(body);
    if (!result.success) {
      return validationError(c, "Request body validation failed", result.error);
    }

    c.set("validatedBody", result.data);
    return next();
  };
}

/**
 * 400 response for a failed query or path parameter parse.
 */
export function validationError(c: Context, message: string, error: ZodError): Response {
  return c.json(
    createErrorEnvelope("VALIDATION_ERROR", message, {
      issues: formatZodErrors(error),
    }),
    400,
  );
}

function formatZodErrors(
  error: ZodError,
): readonly { path: string; message: string }[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}
