// backend/services/blog/src/views/errorView.ts
import { html, type SafeHtml } from "../../../shared/src/view/html";
import type { ErrorPageInfo } from "../../../shared/src/middleware/errorPage";
import { layout, type PageContext } from "./layout";

export function errorView(page: PageContext, info: ErrorPageInfo): SafeHtml {
  return layout(
    page,
    { title: `${info.status} ${info.title}`, heading: info.title, subheading: String(info.status) },
    html`<p class="error-detail">${info.detail}</p>
      <p><a href="/">Back to the home page</a></p>`
  );
}
