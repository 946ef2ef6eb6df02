// backend/services/blog/src/controllers/post/handlers/list.ts
import type { RequestHandler } from "express";
import type { BlogDeps } from "../../../deps";
import { renderPage } from "../../../http/respond";
import { homeView } from "../../../views/homeView";

// GET /
export const list = (deps: BlogDeps): RequestHandler => (req, res) => {
  const posts = deps.posts.list();
  renderPage(req, res, (page) => homeView(page, posts));
};
