// backend/services/blog/src/controllers/post/handlers/create.ts
import type { RequestHandler } from "express";
import type { BlogDeps } from "../../../deps";
import { redirectTo, renderPage } from "../../../http/respond";
import { requireIdentity, requireSession } from "../../../session/identity";
import { validateForm, zPostForm } from "../../../validators/forms";
import { postFormView } from "../../../views/postFormView";
import { formatPostDate } from "../../../lib/dates";
import { isUniqueViolation } from "../../../lib/dbErrors";
import { DUPLICATE_TITLE, POST_FIELDS } from "./schemas";

/**
 * POST /new-post (admin)
 * Author is the admin; the date is fixed here and never edited.
 */
export const create = (deps: BlogDeps): RequestHandler => (req, res) => {
  const result = validateForm(zPostForm, req.body, POST_FIELDS);
  if (!result.ok) {
    const state = result.form;
    return renderPage(req, res, (page) =>
      postFormView(page, { kind: "create" }, state)
    );
  }

  const data = result.data;
  const rejectDuplicate = () => {
    requireSession(req).flash(DUPLICATE_TITLE);
    const state = { values: { ...data }, errors: {} };
    renderPage(req, res, (page) =>
      postFormView(page, { kind: "create" }, state)
    );
  };

  if (deps.posts.findByTitle(data.title)) return rejectDuplicate();

  const author = requireIdentity(req);
  try {
    const post = deps.posts.create({
      authorId: author.id,
      title: data.title,
      subtitle: data.subtitle,
      imgUrl: data.img_url,
      body: data.body,
      date: formatPostDate(deps.clock()),
    });
    req.log.info({ postId: post.id, userId: author.id }, "post created");
  } catch (err) {
    if (isUniqueViolation(err)) return rejectDuplicate();
    throw err;
  }

  redirectTo(req, res, "/");
};
