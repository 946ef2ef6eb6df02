// backend/services/shared/src/app/createServiceApp.ts

/**
 * Assembles the standard stack for a server-rendered service:
 *   requestId → http logger → health (open) → static → body parsers →
 *   cookies → service middleware (session, ...) → routes → 404 page → error page.
 *
 * Notes:
 * - Body parsers run before service middleware so guards and CSRF checks can
 *   read form fields.
 * - Health endpoints stay open and are mounted before any session work.
 */

import express, { type Express, type RequestHandler } from "express";
import cookieParser from "cookie-parser";
import { requestIdMiddleware } from "../middleware/requestId";
import { makeHttpLogger } from "../middleware/httpLogger";
import {
  errorPage,
  notFoundPage,
  type RenderErrorPage,
} from "../middleware/errorPage";
import { createHealthRouter, type ReadinessFn } from "../health";

export type CreateServiceAppOptions = {
  /** Service slug (e.g., "blog"). Used in logs. */
  serviceName: string;
  /** Mounts the service's routes onto the provided Router. Routes are one-liners. */
  mountRoutes: (router: express.Router) => void;
  /** Runs after body/cookie parsing and before routes. */
  middleware?: RequestHandler[];
  /** Directory served under `/static`. */
  staticDir?: string;
  readiness?: ReadinessFn;
  renderError: RenderErrorPage;
  /** Express `trust proxy` setting, for secure cookies behind a proxy. */
  trustProxy?: boolean;
};

export function createServiceApp(opts: CreateServiceAppOptions): Express {
  const {
    serviceName,
    mountRoutes,
    middleware = [],
    staticDir,
    readiness,
    renderError,
    trustProxy,
  } = opts;

  const app = express();
  app.disable("x-powered-by");
  if (trustProxy) app.set("trust proxy", 1);

  // ── Transport & Telemetry ──────────────────────────────────────────────────
  app.use(requestIdMiddleware());
  app.use(makeHttpLogger(serviceName));

  // ── Health (public, no session) ────────────────────────────────────────────
  app.use(createHealthRouter({ service: serviceName, readiness }));

  if (staticDir) {
    app.use("/static", express.static(staticDir, { fallthrough: true }));
  }

  // ── Parsers ────────────────────────────────────────────────────────────────
  app.use(express.urlencoded({ extended: false, limit: "1mb" }));
  app.use(cookieParser());

  for (const mw of middleware) app.use(mw);

  // ── Routes ─────────────────────────────────────────────────────────────────
  const router = express.Router();
  mountRoutes(router);
  app.use(router);

  // ── Tails ──────────────────────────────────────────────────────────────────
  app.use(notFoundPage(renderError));
  app.use(errorPage(renderError));

  return app;
}
