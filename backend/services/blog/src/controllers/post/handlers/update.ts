// backend/services/blog/src/controllers/post/handlers/update.ts
import type { RequestHandler } from "express";
import type { BlogDeps } from "../../../deps";
import { redirectTo, renderPage } from "../../../http/respond";
import { requireSession } from "../../../session/identity";
import { validateForm, zPostForm } from "../../../validators/forms";
import { postFormView } from "../../../views/postFormView";
import { isUniqueViolation } from "../../../lib/dbErrors";
import { DUPLICATE_TITLE, POST_FIELDS, loadPost } from "./schemas";

/**
 * POST /edit-post/:id (admin)
 * Overwrites title, subtitle, image and body. Author and date stay.
 * No version check: concurrent edits are last-write-wins.
 */
export const update = (deps: BlogDeps): RequestHandler => (req, res) => {
  const post = loadPost(deps, req);
  const mode = { kind: "edit", postId: post.id } as const;

  const result = validateForm(zPostForm, req.body, POST_FIELDS);
  if (!result.ok) {
    const state = result.form;
    return renderPage(req, res, (page) => postFormView(page, mode, state));
  }

  const data = result.data;
  const rejectDuplicate = () => {
    requireSession(req).flash(DUPLICATE_TITLE);
    const state = { values: { ...data }, errors: {} };
    renderPage(req, res, (page) => postFormView(page, mode, state));
  };

  const clash = deps.posts.findByTitle(data.title);
  if (clash && clash.id !== post.id) return rejectDuplicate();

  try {
    deps.posts.updateById(post.id, {
      title: data.title,
      subtitle: data.subtitle,
      imgUrl: data.img_url,
      body: data.body,
    });
  } catch (err) {
    if (isUniqueViolation(err)) return rejectDuplicate();
    throw err;
  }

  req.log.info({ postId: post.id }, "post updated");
  redirectTo(req, res, `/post/${post.id}`);
};
