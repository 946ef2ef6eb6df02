// backend/services/blog/src/controllers/post/handlers/remove.ts
import type { RequestHandler } from "express";
import type { BlogDeps } from "../../../deps";
import { redirectTo } from "../../../http/respond";
import { parsePostId } from "./schemas";

// GET /delete/:id (admin). Missing ids are a no-op; comments cascade.
export const remove = (deps: BlogDeps): RequestHandler => (req, res) => {
  const postId = parsePostId(req);
  const deleted = deps.posts.deleteById(postId);
  req.log.info({ postId, deleted }, "post delete");
  redirectTo(req, res, "/");
};
