// backend/services/shared/src/middleware/errorPage.ts

/**
 * Tail middleware for HTML services: a 404 page for unmatched routes and an
 * error page for anything thrown or passed to `next(err)`.
 *
 * Notes:
 * - Status is normalized; arbitrary values never reach the client.
 * - 5xx detail is replaced with a generic sentence; the real error is logged.
 * - Rendering is delegated to the service so pages share its layout.
 */

import type { ErrorRequestHandler, Request, RequestHandler } from "express";
import { extractLogContext } from "../utils/logger";
import { HttpError, statusOf } from "../http/errors";

export interface ErrorPageInfo {
  status: number;
  title: string;
  detail: string;
}

export type RenderErrorPage = (info: ErrorPageInfo, req: Request) => string;

const GENERIC_5XX = "Something went wrong on our side. Please try again.";

function titleFor(status: number): string {
  if (status === 400) return "Bad Request";
  if (status === 404) return "Not Found";
  if (status === 413) return "Payload Too Large";
  return status >= 500 ? "Internal Server Error" : "Request Error";
}

export function notFoundPage(render: RenderErrorPage): RequestHandler {
  return (req, res) => {
    const info: ErrorPageInfo = {
      status: 404,
      title: "Not Found",
      detail: "The requested page could not be found.",
    };
    res.status(404).type("html").send(render(info, req));
  };
}

export function errorPage(render: RenderErrorPage): ErrorRequestHandler {
  return (err: unknown, req, res, next) => {
    if (res.headersSent) return next(err);

    const status = statusOf(err);
    const ctx = extractLogContext(req);
    if (status >= 500) {
      req.log.error({ ...ctx, status, err }, "request error");
    } else {
      req.log.warn(
        { ...ctx, status, message: err instanceof Error ? err.message : String(err) },
        "request rejected"
      );
    }

    const info: ErrorPageInfo = {
      status,
      title: err instanceof HttpError ? err.title : titleFor(status),
      detail:
        status >= 500
          ? GENERIC_5XX
          : err instanceof Error
          ? err.message
          : titleFor(status),
    };

    res.status(status).type("html").send(render(info, req));
  };
}
