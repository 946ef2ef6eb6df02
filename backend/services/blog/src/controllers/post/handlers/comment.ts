// backend/services/blog/src/controllers/post/handlers/comment.ts
import type { RequestHandler } from "express";
import type { BlogDeps } from "../../../deps";
import { redirectTo, renderPage } from "../../../http/respond";
import { requireSession } from "../../../session/identity";
import { validateForm, zCommentForm } from "../../../validators/forms";
import { postView } from "../../../views/postView";
import { LOGIN_TO_COMMENT, loadPost } from "./schemas";

/**
 * POST /post/:id
 * Invalid form → page again with the error. Anonymous → flash + /login.
 * Success redirects back (303) so a refresh does not re-post.
 */
export const comment = (deps: BlogDeps): RequestHandler => (req, res) => {
  const post = loadPost(deps, req);

  const result = validateForm(zCommentForm, req.body, ["body"]);
  if (!result.ok) {
    const comments = deps.comments.listForPost(post.id);
    const commentForm = result.form;
    return renderPage(req, res, (page) =>
      postView(page, { post, comments, commentForm })
    );
  }

  if (!req.identity) {
    requireSession(req).flash(LOGIN_TO_COMMENT);
    return redirectTo(req, res, "/login");
  }

  const created = deps.comments.create({
    text: result.data.body,
    authorId: req.identity.id,
    postId: post.id,
  });
  req.log.info(
    { commentId: created.id, postId: post.id, userId: req.identity.id },
    "comment added"
  );
  redirectTo(req, res, `/post/${post.id}`, 303);
};
