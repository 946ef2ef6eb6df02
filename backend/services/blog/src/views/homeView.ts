// backend/services/blog/src/views/homeView.ts
import { each, html, when, type SafeHtml } from "../../../shared/src/view/html";
import type { PostWithAuthor } from "../repo/postRepo";
import { layout, type PageContext } from "./layout";

function preview(page: PageContext, post: PostWithAuthor): SafeHtml {
  return html`<div class="post-preview">
        <a href="/post/${post.id}">
          <h2 class="post-title">${post.title}</h2>
          <h3 class="post-subtitle">${post.subtitle}</h3>
        </a>
        <p class="post-meta">Posted by <a href="#">${post.authorName}</a> on ${post.date}${when(
          page.isAdmin,
          () => html` <a class="delete-post" href="/delete/${post.id}" title="Delete">✘</a>`
        )}</p>
      </div>
      <hr />`;
}

export function homeView(page: PageContext, posts: PostWithAuthor[]): SafeHtml {
  const content = html`${each(posts, (p) => preview(page, p))}
      ${when(posts.length === 0, () => html`<p class="empty">No posts yet.</p>`)}
      ${when(
        page.isAdmin,
        () => html`<div class="actions"><a class="btn btn-primary" href="/new-post">Create New Post</a></div>`
      )}`;

  return layout(
    page,
    {
      title: "Blog",
      heading: "My Blog",
      subheading: "A collection of random musings.",
      bgImage: "/static/img/home-bg.svg",
    },
    content
  );
}
