// backend/services/blog/src/views/layout.ts
import type { RequestIdentity } from "../../../shared/src/types/identity";
import { each, html, when, type SafeHtml } from "../../../shared/src/view/html";

export interface PageContext {
  identity: RequestIdentity | null;
  isAdmin: boolean;
  flashes: string[];
  csrfToken: string;
}

export interface LayoutOptions {
  title: string;
  heading: string;
  subheading?: string;
  /** Masthead background. */
  bgImage?: string;
  /** Extra masthead content under the heading (post meta line). */
  meta?: SafeHtml;
}

function nav(page: PageContext): SafeHtml {
  const links = page.identity
    ? html`<li class="nav-item"><a class="nav-link" href="/logout">Log Out</a></li>`
    : html`<li class="nav-item"><a class="nav-link" href="/login">Login</a></li>
        <li class="nav-item"><a class="nav-link" href="/register">Register</a></li>`;

  return html`<nav class="navbar" id="mainNav">
      <a class="navbar-brand" href="/">Blog</a>
      <ul class="navbar-nav">
        <li class="nav-item"><a class="nav-link" href="/">Home</a></li>
        ${links}
        <li class="nav-item"><a class="nav-link" href="/about">About</a></li>
        ${when(page.isAdmin, () => html`<li class="nav-item"><a class="nav-link" href="/contact">Contact</a></li>`)}
      </ul>
    </nav>`;
}

function flashes(page: PageContext): SafeHtml {
  return when(
    page.flashes.length > 0,
    () => html`<div class="flashes">${each(page.flashes, (m) => html`<p class="flash">${m}</p>`)}</div>`
  );
}

export function layout(
  page: PageContext,
  opts: LayoutOptions,
  content: SafeHtml
): SafeHtml {
  return html`<!DOCTYPE html>
<html lang="en">
  <head>
    <meta charset="utf-8" />
    <meta name="viewport" content="width=device-width, initial-scale=1" />
    <title>${opts.title}</title>
    <link rel="stylesheet" href="/static/css/styles.css" />
  </head>
  <body>
    ${nav(page)}
    <header class="masthead"${when(opts.bgImage !== undefined, () => html` style="background-image: url('${opts.bgImage}')"`)}>
      <div class="heading">
        <h1>${opts.heading}</h1>
        ${when(opts.subheading !== undefined, () => html`<span class="subheading">${opts.subheading}</span>`)}
        ${opts.meta ?? ""}
      </div>
    </header>
    <main class="container">
      ${flashes(page)}
      ${content}
    </main>
    <footer class="footer">
      <p>Copyright &copy; Blog ${new Date().getFullYear()}</p>
    </footer>
  </body>
</html>`;
}
