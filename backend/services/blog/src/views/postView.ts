// backend/services/blog/src/views/postView.ts
import { each, html, raw, when, type SafeHtml } from "../../../shared/src/view/html";
import { sanitizeHtml } from "../../../shared/src/security/sanitize";
import type { PostWithAuthor } from "../repo/postRepo";
import type { CommentWithAuthor } from "../repo/commentRepo";
import type { CommentForm, FormState } from "../validators/forms";
import { gravatarUrl } from "../lib/gravatar";
import { form } from "./formFields";
import { layout, type PageContext } from "./layout";

export interface PostViewModel {
  post: PostWithAuthor;
  comments: CommentWithAuthor[];
  commentForm: FormState<CommentForm>;
}

function comment(c: CommentWithAuthor): SafeHtml {
  return html`<li class="comment">
          <div class="commenter-image"><img src="${gravatarUrl(c.authorEmail)}" alt="" /></div>
          <div class="comment-text">
            <p>${c.text}</p>
            <span class="comment-author">${c.authorName}</span>
          </div>
        </li>`;
}

export function postView(page: PageContext, vm: PostViewModel): SafeHtml {
  const { post, comments } = vm;
  const meta = html`<span class="meta">Posted by <a href="#">${post.authorName}</a> on ${post.date}</span>`;

  // Bodies are rich text authored by the admin; rendered unescaped after sanitizing.
  const content = html`<article class="post-body">${raw(sanitizeHtml(post.body))}</article>
      ${when(
        page.isAdmin,
        () => html`<div class="actions"><a class="btn btn-primary" href="/edit-post/${post.id}">Edit Post</a></div>`
      )}
      <section class="comments">
        ${form<CommentForm>(page, {
          action: `/post/${post.id}`,
          submit: "Submit Comment",
          fields: [{ name: "body", label: "Comment", type: "textarea" }],
          state: vm.commentForm,
        })}
        <ul class="comment-list">${each(comments, comment)}</ul>
      </section>`;

  return layout(
    page,
    {
      title: post.title,
      heading: post.title,
      subheading: post.subtitle,
      bgImage: post.imgUrl,
      meta,
    },
    content
  );
}
