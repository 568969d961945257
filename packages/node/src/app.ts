/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts so tests can create the app
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import pino from "pino";
import type { Logger } from "pino";
import type { LedgerStore } from "@caixa-escolar/store";
import type { AppEnv } from "./types/api-contract.js";
import { LedgerService } from "./services/ledger-service.js";
import { handleError } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { createHealthRoutes } from "./routes/health.js";
import { createAccountRoutes } from "./routes/accounts.js";
import { createPeriodRoutes } from "./routes/periods.js";
import { createReportRoutes } from "./routes/reports.js";
import { createYearRoutes } from "./routes/years.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly store: LedgerStore;
  /** Clock for the current fiscal year and timestamps. Default: system time */
  readonly clock?: (() => Date) | undefined;
  /** Receives one entry per request. No request logging when omitted. */
  readonly logFn?: ((entry: RequestLogEntry) => void) | undefined;
  /** Logger for service warnings. Default: silent */
  readonly logger?: Logger | undefined;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: LedgerService;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const clock = options.clock ?? (() => new Date());
  const service = new LedgerService({
    store: options.store,
    logger: options.logger ?? pino({ level: "silent" }),
    clock,
  });

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(handleError);

  // ─── Health Routes ──────────────────────────────────────────────
  app.route("/", createHealthRoutes(service, clock));

  // ─── API Routes ─────────────────────────────────────────────────
  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  app.route("/api/v1/accounts", createAccountRoutes());
  app.route("/api/v1/accounts", createPeriodRoutes());
  app.route("/api/v1/accounts", createReportRoutes());
  app.route("/api/v1/years", createYearRoutes());

  return { app, service };
}
