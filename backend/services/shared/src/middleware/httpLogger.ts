// backend/services/shared/src/middleware/httpLogger.ts
import pinoHttp from "pino-http";
import { randomUUID } from "node:crypto";
import type { IncomingMessage, ServerResponse } from "node:http";
import { logger } from "../utils/logger";

const QUIET_PATHS = new Set(["/health", "/healthz", "/readyz", "/favicon.ico"]);

export function makeHttpLogger(serviceName: string) {
  return pinoHttp({
    logger,
    // requestIdMiddleware runs first; reuse its id so headers and logs agree
    genReqId: (req, res) => {
      if (req.id != null) return req.id;
      const id = randomUUID();
      res.setHeader("x-request-id", id);
      return id;
    },
    customLogLevel: (
      _req: IncomingMessage,
      res: ServerResponse,
      err?: Error
    ) => {
      if (err) return "error";
      const s = res.statusCode;
      if (s >= 500) return "error";
      if (s >= 400) return "warn";
      return "info";
    },
    customProps: () => ({ service: serviceName }),
    autoLogging: {
      ignore: (req: IncomingMessage) => QUIET_PATHS.has(req.url ?? ""),
    },
    serializers: {
      req(req: IncomingMessage) {
        return { id: req.id, method: req.method, url: req.url };
      },
      res(res: ServerResponse) {
        return { statusCode: res.statusCode };
      },
    },
  });
}
