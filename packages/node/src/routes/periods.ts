/**
 * Month entry routes.
 *
 * GET /api/v1/accounts/:id/periods/:year/:month — Month editor view
 * PUT /api/v1/accounts/:id/periods/:year/:month — Allocate and save a month
 *
 * Saving replaces every program's entry for the month, including programs
 * left out of the request body.
 */

import { Hono } from "hono";
import type { MovementInput } from "@caixa-escolar/types";
import type { AppEnv } from "../types/api-contract.js";
import { PeriodParamsSchema, SavePeriodSchema } from "../types/dto.js";
import { validateBody, validationError } from "../middleware/validate.js";

export function createPeriodRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/:id/periods/:year/:month", (c) => {
    const params = PeriodParamsSchema.safeParse({
      year: c.req.param("year"),
      month: c.req.param("month"),
    });
    if (!params.success) {
      return validationError(c, "Invalid period", params.error);
    }

    const { year, month } = params.data;
    const view = c.get("service").describePeriod(c.req.param("id"), month, year);
    return c.json({ data: view });
  });

  routes.put("/:id/periods/:year/:month", validateBody(SavePeriodSchema), (c) => {
    const params = PeriodParamsSchema.safeParse({
      year: c.req.param("year"),
      month: c.req.param("month"),
    });
    if (!params.success) {
      return validationError(c, "Invalid period", params.error);
    }

    const body = c.get("validatedBody");
    const input = new Map<string, MovementInput>(
      body.programs.map(({ program, ...figures }) => [program, figures]),
    );

    const { year, month } = params.data;
    const { value, persisted } = c
      .get("service")
      .savePeriod(c.req.param("id"), month, year, body.bankInterestTotal, input);

    return c.json({ data: value, persisted });
  });

  return routes;
}
