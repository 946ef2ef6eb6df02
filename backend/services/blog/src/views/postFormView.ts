// backend/services/blog/src/views/postFormView.ts
import { html, type SafeHtml } from "../../../shared/src/view/html";
import type { FormState, PostForm } from "../validators/forms";
import { form, type FieldSpec } from "./formFields";
import { layout, type PageContext } from "./layout";

const POST_FIELDS: FieldSpec<PostForm>[] = [
  { name: "title", label: "Blog Post Title" },
  { name: "subtitle", label: "Subtitle" },
  { name: "img_url", label: "Blog Image URL", type: "url" },
  { name: "body", label: "Blog Content", type: "textarea" },
];

export type PostFormMode =
  | { kind: "create" }
  | { kind: "edit"; postId: number };

export function postFormView(
  page: PageContext,
  mode: PostFormMode,
  state: FormState<PostForm>
): SafeHtml {
  const editing = mode.kind === "edit";
  const action = mode.kind === "edit" ? `/edit-post/${mode.postId}` : "/new-post";

  return layout(
    page,
    {
      title: editing ? "Edit Post" : "New Post",
      heading: editing ? "Edit Post" : "New Post",
      subheading: "You're going to make a great blog post!",
      bgImage: "/static/img/edit-bg.svg",
    },
    html`${form<PostForm>(page, {
      action,
      submit: "Submit Post",
      fields: POST_FIELDS,
      state,
    })}`
  );
}
