// backend/services/blog/src/middleware/csrf.ts
import { timingSafeEqual } from "node:crypto";
import type { RequestHandler } from "express";
import { z } from "zod";
import { badRequest } from "../../../shared/src/http/errors";
import { extractLogContext } from "../../../shared/src/utils/logger";
import { requireSession } from "../session/identity";

export const CSRF_FIELD = "csrf_token";
export const CSRF_INVALID = "The CSRF token is missing or invalid.";

const SAFE_METHODS = new Set(["GET", "HEAD", "OPTIONS"]);

const zCsrfBody = z.object({ [CSRF_FIELD]: z.string() });

function tokensMatch(submitted: string, expected: string): boolean {
  const a = Buffer.from(submitted);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Synchronizer-token check for form posts: the hidden `csrf_token` field must
 * equal the token held in the session. Mounted per route, after the guards.
 */
export function csrfProtection(enabled: boolean): RequestHandler {
  return (req, _res, next) => {
    if (!enabled || SAFE_METHODS.has(req.method)) return next();

    const session = requireSession(req);
    const parsed = zCsrfBody.safeParse(req.body);
    const submitted = parsed.success ? parsed.data[CSRF_FIELD] : "";

    if (!tokensMatch(submitted, session.csrfToken)) {
      req.log.warn(extractLogContext(req), "csrf token rejected");
      return next(badRequest(CSRF_INVALID));
    }
    next();
  };
}
