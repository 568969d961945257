/**
 * Report routes.
 *
 * GET /api/v1/accounts/:id/statement?year&program — Running-balance statement
 * GET /api/v1/accounts/:id/summary?year           — Year summary per program
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { StatementQuerySchema, SummaryQuerySchema } from "../types/dto.js";
import { validationError } from "../middleware/validate.js";
import { setETag } from "../middleware/etag.js";

export function createReportRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/:id/statement", (c) => {
    const queryResult = StatementQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return validationError(c, "Invalid query parameters", queryResult.error);
    }

    const accountId = c.req.param("id");
    const { year, program } = queryResult.data;
    const rows = c.get("service").statement(accountId, program, year);

    const statement = { accountId, year, program, rows };
    setETag(c, statement);
    return c.json({ data: statement });
  });

  routes.get("/:id/summary", (c) => {
    const queryResult = SummaryQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return validationError(c, "Invalid query parameters", queryResult.error);
    }

    const summary = c.get("service").yearSummary(c.req.param("id"), queryResult.data.year);
    setETag(c, summary);
    return c.json({ data: summary });
  });

  return routes;
}
