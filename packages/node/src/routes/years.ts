/**
 * Fiscal year routes.
 *
 * GET  /api/v1/years — Years available for entry and reports
 * POST /api/v1/years — Open a new year (2000–2050)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { OpenYearSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";

export function createYearRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    return c.json({ data: { years: c.get("service").years() } });
  });

  routes.post("/", validateBody(OpenYearSchema), (c) => {
    const years = c.get("service").openYear(c.get("validatedBody").year);
    return c.json({ data: { years } }, 201);
  });

  return routes;
}
