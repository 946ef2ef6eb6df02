// backend/services/blog/src/controllers/post/handlers/newForm.ts
import type { RequestHandler } from "express";
import { renderPage } from "../../../http/respond";
import { emptyForm } from "../../../validators/forms";
import { postFormView } from "../../../views/postFormView";

// GET /new-post (admin)
export const newForm = (): RequestHandler => (req, res) => {
  renderPage(req, res, (page) =>
    postFormView(page, { kind: "create" }, emptyForm())
  );
};
