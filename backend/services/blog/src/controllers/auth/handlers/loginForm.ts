// backend/services/blog/src/controllers/auth/handlers/loginForm.ts
import type { RequestHandler } from "express";
import { renderPage } from "../../../http/respond";
import { loginView } from "../../../views/authViews";
import { emptyForm } from "../../../validators/forms";

// GET /login
export const loginForm = (): RequestHandler => (req, res) => {
  renderPage(req, res, (page) => loginView(page, emptyForm()));
};
