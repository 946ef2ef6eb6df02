// backend/services/blog/src/controllers/auth/handlers/registerForm.ts
import type { RequestHandler } from "express";
import { renderPage } from "../../../http/respond";
import { registerView } from "../../../views/authViews";
import { emptyForm } from "../../../validators/forms";

// GET /register
export const registerForm = (): RequestHandler => (req, res) => {
  renderPage(req, res, (page) => registerView(page, emptyForm()));
};
