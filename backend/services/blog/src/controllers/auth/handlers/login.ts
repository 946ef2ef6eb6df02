// backend/services/blog/src/controllers/auth/handlers/login.ts
import type { RequestHandler } from "express";
import { asyncHandler } from "../../../../../shared/src/middleware/asyncHandler";
import type { BlogDeps } from "../../../deps";
import { redirectTo, renderPage } from "../../../http/respond";
import { requireSession } from "../../../session/identity";
import { validateForm, zLoginForm } from "../../../validators/forms";
import { loginView } from "../../../views/authViews";
import { INCORRECT_PASSWORD } from "./messages";

/**
 * POST /login
 * Wrong password flashes a warning; an unknown email just shows the form
 * again. Either way the typed email is kept and the password is not.
 */
export const login = (deps: BlogDeps): RequestHandler =>
  asyncHandler(async (req, res) => {
    const result = validateForm(
      zLoginForm,
      req.body,
      ["email", "password"],
      ["password"]
    );
    if (!result.ok) {
      const state = result.form;
      return renderPage(req, res, (page) => loginView(page, state));
    }

    const { email, password } = result.data;
    const session = requireSession(req);
    const user = deps.users.findByEmail(email);

    if (user) {
      if (await deps.passwords.verify(password, user.password)) {
        session.login(user.id);
        req.log.info({ userId: user.id }, "user logged in");
        return redirectTo(req, res, "/");
      }
      session.flash(INCORRECT_PASSWORD);
      req.log.info({ userId: user.id }, "login rejected: bad password");
    }

    return renderPage(req, res, (page) =>
      loginView(page, { values: { email }, errors: {} })
    );
  });
