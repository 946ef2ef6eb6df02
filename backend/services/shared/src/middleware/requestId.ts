// backend/services/shared/src/middleware/requestId.ts

/**
 * Every inbound request carries a stable correlation key so log lines and
 * error pages can be tied together.
 *
 * Notes:
 * - Must run **before** the http logger, or its records lack the id.
 * - Never overwrites a caller-supplied id; mints a UUID only when the request
 *   has none of `x-request-id`, `x-correlation-id`, `x-amzn-trace-id`.
 */

import type { RequestHandler } from "express";
import { randomUUID } from "node:crypto";

export function requestIdMiddleware(): RequestHandler {
  return (req, res, next) => {
    const hdr =
      req.headers["x-request-id"] ||
      req.headers["x-correlation-id"] ||
      req.headers["x-amzn-trace-id"];

    const id = (Array.isArray(hdr) ? hdr[0] : hdr) || randomUUID();

    req.id = String(id);
    res.setHeader("x-request-id", String(id));

    next();
  };
}
