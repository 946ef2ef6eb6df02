// backend/services/blog/src/controllers/post/handlers/schemas.ts
import type { Request } from "express";
import { notFound } from "../../../../../shared/src/http/errors";
import type { BlogDeps } from "../../../deps";
import type { PostWithAuthor } from "../../../repo/postRepo";
import { zIdParam, type PostForm } from "../../../validators/forms";

export const POST_FIELDS: (keyof PostForm)[] = ["title", "subtitle", "img_url", "body"];

export const DUPLICATE_TITLE = "A post with that title already exists.";
export const LOGIN_TO_COMMENT = "You need to login or register to comment.";

export function parsePostId(req: Request): number {
  const parsed = zIdParam.safeParse(req.params);
  if (!parsed.success) throw notFound();
  return parsed.data.id;
}

/** Post named by `:id`, or a 404. */
export function loadPost(deps: BlogDeps, req: Request): PostWithAuthor {
  const post = deps.posts.findById(parsePostId(req));
  if (!post) throw notFound("That post does not exist.");
  return post;
}
