// backend/services/blog/src/controllers/post/handlers/editForm.ts
import type { RequestHandler } from "express";
import type { BlogDeps } from "../../../deps";
import { renderPage } from "../../../http/respond";
import { postFormView } from "../../../views/postFormView";
import { loadPost } from "./schemas";

// GET /edit-post/:id (admin): the form pre-filled from the stored post.
export const editForm = (deps: BlogDeps): RequestHandler => (req, res) => {
  const post = loadPost(deps, req);
  const state = {
    values: {
      title: post.title,
      subtitle: post.subtitle,
      img_url: post.imgUrl,
      body: post.body,
    },
    errors: {},
  };
  renderPage(req, res, (page) =>
    postFormView(page, { kind: "edit", postId: post.id }, state)
  );
};
