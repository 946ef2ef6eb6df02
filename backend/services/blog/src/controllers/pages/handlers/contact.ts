// backend/services/blog/src/controllers/pages/handlers/contact.ts
import type { RequestHandler } from "express";
import { renderPage } from "../../../http/respond";
import { contactView } from "../../../views/staticViews";

// Admin only (see routes).
export const contact = (): RequestHandler => (req, res) => {
  renderPage(req, res, contactView);
};
