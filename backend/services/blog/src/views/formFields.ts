// backend/services/blog/src/views/formFields.ts
import { html, when, type SafeHtml } from "../../../shared/src/view/html";
import type { FormState } from "../validators/forms";
import { CSRF_FIELD } from "../middleware/csrf";
import type { PageContext } from "./layout";

export interface FieldSpec<T> {
  name: keyof T & string;
  label: string;
  type?: "text" | "email" | "password" | "url" | "textarea";
}

export function csrfInput(page: PageContext): SafeHtml {
  return html`<input type="hidden" name="${CSRF_FIELD}" value="${page.csrfToken}" />`;
}

export function field<T>(state: FormState<T>, spec: FieldSpec<T>): SafeHtml {
  const value = state.values[spec.name] ?? "";
  const error = state.errors[spec.name];
  const type = spec.type ?? "text";
  const input =
    type === "textarea"
      ? html`<textarea id="${spec.name}" name="${spec.name}" rows="8">${value}</textarea>`
      : html`<input id="${spec.name}" name="${spec.name}" type="${type}" value="${type === "password" ? "" : value}" />`;

  return html`<div class="form-group${error ? " has-error" : ""}">
        <label for="${spec.name}">${spec.label}</label>
        ${input}
        ${when(error !== undefined, () => html`<p class="field-error">${error}</p>`)}
      </div>`;
}

export function form<T>(
  page: PageContext,
  opts: { action: string; submit: string; fields: FieldSpec<T>[]; state: FormState<T> }
): SafeHtml {
  return html`<form method="post" action="${opts.action}" novalidate>
      ${csrfInput(page)}
      ${opts.fields.map((f) => field(opts.state, f))}
      <button type="submit" class="btn btn-primary">${opts.submit}</button>
    </form>`;
}
