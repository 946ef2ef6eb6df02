// backend/services/blog/src/controllers/post/handlers/show.ts
import type { RequestHandler } from "express";
import type { BlogDeps } from "../../../deps";
import { renderPage } from "../../../http/respond";
import { emptyForm } from "../../../validators/forms";
import { postView } from "../../../views/postView";
import { loadPost } from "./schemas";

// GET /post/:id
export const show = (deps: BlogDeps): RequestHandler => (req, res) => {
  const post = loadPost(deps, req);
  const comments = deps.comments.listForPost(post.id);
  renderPage(req, res, (page) =>
    postView(page, { post, comments, commentForm: emptyForm() })
  );
};
