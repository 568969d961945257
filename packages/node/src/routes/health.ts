/**
 * Health check routes.
 *
 * GET /health — Liveness probe (always 200 if server is running)
 * GET /ready  — Readiness probe (the ledger store can be reached)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { LedgerService } from "../services/ledger-service.js";

export function createHealthRoutes(
  service: LedgerService,
  clock: () => Date,
): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: clock().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const ready = service.isReady();

    return c.json(
      {
        status: ready ? "ready" : "not_ready",
        accounts: service.listAccounts().length,
        subsystems: { store: { status: ready ? "ok" : "down" } },
        timestamp: clock().toISOString(),
      },
      ready ? 200 : 503,
    );
  });

  return routes;
}
