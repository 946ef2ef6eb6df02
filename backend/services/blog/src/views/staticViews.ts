// backend/services/blog/src/views/staticViews.ts
import { html, type SafeHtml } from "../../../shared/src/view/html";
import { layout, type PageContext } from "./layout";

export function aboutView(page: PageContext): SafeHtml {
  return layout(
    page,
    { title: "About", heading: "About Me", subheading: "This is what I do.", bgImage: "/static/img/about-bg.svg" },
    html`<p>
        A small blog: the owner writes the posts, registered readers leave
        comments underneath them.
      </p>`
  );
}

export function contactView(page: PageContext): SafeHtml {
  return layout(
    page,
    { title: "Contact", heading: "Contact Me", subheading: "Have questions? I have answers.", bgImage: "/static/img/contact-bg.svg" },
    html`<p>Want to get in touch? Messages sent here reach the site owner.</p>
      <p class="contact-owner">Signed in as ${page.identity?.name ?? ""}.</p>`
  );
}
