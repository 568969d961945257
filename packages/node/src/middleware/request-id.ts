/**
 * Request ID middleware.
 *
 * Propagates an incoming X-Request-Id header, or generates a UUID when
 * the header is missing, empty or longer than 128 characters. The ID is
 * echoed on the response and included in request log entries.
 */

import { randomUUID } from "node:crypto";
import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export const REQUEST_ID_HEADER = "X-Request-Id";

const MAX_REQUEST_ID_LENGTH = 128;

export function requestIdMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const incoming = c.req.header(REQUEST_ID_HEADER)?.trim();
    const requestId =
      incoming !== undefined && incoming !== "" && incoming.length <= MAX_REQUEST_ID_LENGTH
        ? incoming
        : randomUUID();

    c.set("requestId", requestId);

    await next();

    c.header(REQUEST_ID_HEADER, requestId);
  };
}
