/**
 * Account routes.
 *
 * GET    /api/v1/accounts                                    — List accounts
 * POST   /api/v1/accounts                                    — Register an account
 * GET    /api/v1/accounts/:id                                — Get one account
 * DELETE /api/v1/accounts/:id                                — Delete an account
 * POST   /api/v1/accounts/:id/rename                         — Rename an account
 * POST   /api/v1/accounts/:id/programs                       — Add a program
 * PUT    /api/v1/accounts/:id/programs/:program/opening-balance — Set an opening balance
 * GET    /api/v1/accounts/:id/balance                        — Balance before a month
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  AddProgramSchema,
  BalanceQuerySchema,
  OpeningBalanceSchema,
  RegisterAccountSchema,
  RenameAccountSchema,
} from "../types/dto.js";
import { validateBody, validationError } from "../middleware/validate.js";
import { setETag } from "../middleware/etag.js";

export function createAccountRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // GET /api/v1/accounts — List
  routes.get("/", (c) => {
    const accounts = c.get("service").listAccounts();
    return c.json({
      data: accounts.map((a) => ({ id: a.id, programs: a.programs })),
    });
  });

  // POST /api/v1/accounts — Register
  routes.post("/", validateBody(RegisterAccountSchema), (c) => {
    const body = c.get("validatedBody");
    const { value, persisted } = c.get("service").registerAccount(body.id);
    return c.json({ data: value, persisted }, 201);
  });

  // GET /api/v1/accounts/:id — Get one
  routes.get("/:id", (c) => {
    const account = c.get("service").getAccount(c.req.param("id"));
    setETag(c, account);
    return c.json({ data: account });
  });

  // DELETE /api/v1/accounts/:id
  routes.delete("/:id", (c) => {
    const { value, persisted } = c.get("service").deleteAccount(c.req.param("id"));
    return c.json({ data: { id: value.id }, persisted });
  });

  // POST /api/v1/accounts/:id/rename
  routes.post("/:id/rename", validateBody(RenameAccountSchema), (c) => {
    const body = c.get("validatedBody");
    const { value, persisted } = c
      .get("service")
      .renameAccount(c.req.param("id"), body.newId);
    return c.json({ data: value, persisted });
  });

  // POST /api/v1/accounts/:id/programs
  routes.post("/:id/programs", validateBody(AddProgramSchema), (c) => {
    const body = c.get("validatedBody");
    const { value, persisted } = c
      .get("service")
      .addProgram(c.req.param("id"), body.program);
    return c.json({ data: value, persisted }, 201);
  });

  // PUT /api/v1/accounts/:id/programs/:program/opening-balance
  routes.put(
    "/:id/programs/:program/opening-balance",
    validateBody(OpeningBalanceSchema),
    (c) => {
      const body = c.get("validatedBody");
      const { value, persisted } = c
        .get("service")
        .setOpeningBalance(c.req.param("id"), c.req.param("program"), body);
      return c.json({ data: value, persisted });
    },
  );

  // GET /api/v1/accounts/:id/balance?program&kind&month&year
  routes.get("/:id/balance", (c) => {
    const queryResult = BalanceQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return validationError(c, "Invalid query parameters", queryResult.error);
    }

    const accountId = c.req.param("id");
    const { program, kind, month, year } = queryResult.data;
    const balance = c.get("service").balance(accountId, program, kind, month, year);

    return c.json({ data: { accountId, program, kind, month, year, balance } });
  });

  return routes;
}
