// backend/services/blog/src/controllers/auth/handlers/register.ts
import type { RequestHandler } from "express";
import { asyncHandler } from "../../../../../shared/src/middleware/asyncHandler";
import type { BlogDeps } from "../../../deps";
import type { User } from "../../../models/schema";
import { redirectTo, renderPage } from "../../../http/respond";
import { requireSession } from "../../../session/identity";
import { validateForm, zRegisterForm } from "../../../validators/forms";
import { registerView } from "../../../views/authViews";
import { isUniqueViolation } from "../../../lib/dbErrors";
import { ALREADY_REGISTERED } from "./messages";

/**
 * POST /register
 * - Known email → flash + /login, no user created.
 * - Otherwise hash, insert, log the new user in, go home.
 */
export const register = (deps: BlogDeps): RequestHandler =>
  asyncHandler(async (req, res) => {
    const result = validateForm(
      zRegisterForm,
      req.body,
      ["email", "password", "name"],
      ["password"]
    );
    if (!result.ok) {
      const state = result.form;
      return renderPage(req, res, (page) => registerView(page, state));
    }

    const { email, password, name } = result.data;
    const session = requireSession(req);

    if (deps.users.findByEmail(email)) {
      session.flash(ALREADY_REGISTERED);
      return redirectTo(req, res, "/login");
    }

    const hash = await deps.passwords.hash(password);
    let user: User;
    try {
      user = deps.users.create({ email, password: hash, name });
    } catch (err) {
      // Lost the race against a concurrent registration for the same email.
      if (!isUniqueViolation(err)) throw err;
      session.flash(ALREADY_REGISTERED);
      return redirectTo(req, res, "/login");
    }

    session.login(user.id);
    req.log.info({ userId: user.id }, "user registered");
    return redirectTo(req, res, "/");
  });
