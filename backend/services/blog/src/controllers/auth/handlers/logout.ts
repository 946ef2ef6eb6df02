// backend/services/blog/src/controllers/auth/handlers/logout.ts
import type { RequestHandler } from "express";
import { redirectTo } from "../../../http/respond";
import { requireSession } from "../../../session/identity";

// GET|POST /logout (behind requireAuth)
export const logout = (): RequestHandler => (req, res) => {
  const userId = req.identity?.id;
  requireSession(req).logout();
  req.log.info({ userId }, "user logged out");
  redirectTo(req, res, "/");
};
