// backend/services/blog/src/middleware/guards.ts
import type { RequestHandler } from "express";
import { isAdmin, requireSession } from "../session/identity";
import { redirectTo } from "../http/respond";

export const LOGIN_REQUIRED = "Please log in to access this page.";

/**
 * Admin-only routes. Anyone else (anonymous included) is sent to the home
 * page; no body is rendered and no action runs.
 */
export function requireAdmin(): RequestHandler {
  return (req, res, next) => {
    if (isAdmin(req.identity)) return next();
    req.log.debug(
      { userId: req.identity?.id ?? null, path: req.path },
      "admin guard: redirect"
    );
    redirectTo(req, res, "/");
  };
}

/** Any logged-in user. Anonymous requests go to /login with a flash. */
export function requireAuth(): RequestHandler {
  return (req, res, next) => {
    if (req.identity) return next();
    req.log.debug({ path: req.path }, "auth guard: redirect to login");
    requireSession(req).flash(LOGIN_REQUIRED);
    redirectTo(req, res, "/login");
  };
}
