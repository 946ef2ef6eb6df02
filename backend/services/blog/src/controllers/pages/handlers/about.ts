// backend/services/blog/src/controllers/pages/handlers/about.ts
import type { RequestHandler } from "express";
import { renderPage } from "../../../http/respond";
import { aboutView } from "../../../views/staticViews";

export const about = (): RequestHandler => (req, res) => {
  renderPage(req, res, aboutView);
};
