// backend/services/blog/src/validators/forms.ts
import { z } from "zod";

/**
 * Form schemas (urlencoded bodies). Field names match the rendered inputs.
 * Validation failures re-render the form with per-field messages; nothing is
 * persisted.
 */

export const REQUIRED = "This field is required.";

const requiredText = (max?: number) => {
  let s = z
    .string({ required_error: REQUIRED, invalid_type_error: REQUIRED })
    .trim()
    .min(1, REQUIRED);
  if (max !== undefined) s = s.max(max, `Must be at most ${max} characters.`);
  return s;
};

// Passwords are taken as typed, never trimmed.
const password = z
  .string({ required_error: REQUIRED, invalid_type_error: REQUIRED })
  .min(1, REQUIRED);

const email = requiredText(100).email("Invalid email address.");

export const zRegisterForm = z.object({
  email,
  password,
  name: requiredText(100),
});
export type RegisterForm = z.infer<typeof zRegisterForm>;

export const zLoginForm = z.object({ email, password });
export type LoginForm = z.infer<typeof zLoginForm>;

export const zCommentForm = z.object({ body: requiredText(2000) });
export type CommentForm = z.infer<typeof zCommentForm>;

export const zPostForm = z.object({
  title: requiredText(250),
  subtitle: requiredText(250),
  img_url: requiredText(250).url("Invalid URL."),
  body: requiredText(),
});
export type PostForm = z.infer<typeof zPostForm>;

/** `/:id` route param: a positive integer. */
export const zIdParam = z.object({ id: z.coerce.number().int().positive() });

/** What a form view needs to re-render: echoed values and one message per field. */
export interface FormState<T> {
  values: { [K in keyof T & string]?: string };
  errors: { [K in keyof T & string]?: string };
}

export type FormResult<T> =
  | { ok: true; data: T }
  | { ok: false; form: FormState<T> };

export function emptyForm<T>(): FormState<T> {
  return { values: {}, errors: {} };
}

const zFields = z.record(z.unknown());

/**
 * Parse a form body. On failure every field except the `secret` ones is
 * echoed back as typed, with the first message per field.
 */
export function validateForm<T extends Record<string, string>>(
  schema: z.ZodType<T>,
  body: unknown,
  fields: readonly (keyof T & string)[],
  secret: readonly (keyof T & string)[] = []
): FormResult<T> {
  const parsed = schema.safeParse(body);
  if (parsed.success) return { ok: true, data: parsed.data };

  const raw = zFields.safeParse(body);
  const form = emptyForm<T>();
  for (const name of fields) {
    if (secret.includes(name)) continue;
    const v = raw.success ? raw.data[name] : undefined;
    if (typeof v === "string") form.values[name] = v;
  }
  for (const issue of parsed.error.issues) {
    const name = fields.find((f) => f === issue.path[0]);
    if (name !== undefined && form.errors[name] === undefined) {
      form.errors[name] = issue.message;
    }
  }
  return { ok: false, form };
}
