// backend/services/blog/test/forms.spec.ts
import { describe, expect, it } from "vitest";
import {
  validateForm,
  zCommentForm,
  zIdParam,
  zPostForm,
  zRegisterForm,
} from "../src/validators/forms";

describe("validateForm", () => {
  it("returns trimmed data on success and drops unknown fields", () => {
    const result = validateForm(
      zRegisterForm,
      { email: " a@example.com ", password: " pw ", name: " Ann ", csrf_token: "x" },
      ["email", "password", "name"],
      ["password"]
    );
    expect(result).toEqual({
      ok: true,
      data: { email: "a@example.com", password: " pw ", name: "Ann" },
    });
  });

  it("reports the first message per field and never echoes secrets", () => {
    const result = validateForm(
      zRegisterForm,
      { email: "nope", password: "", name: "Ann" },
      ["email", "password", "name"],
      ["password"]
    );
    expect(result).toEqual({
      ok: false,
      form: {
        values: { email: "nope", name: "Ann" },
        errors: {
          email: "Invalid email address.",
          password: "This field is required.",
        },
      },
    });
  });

  it("treats missing fields as required", () => {
    const result = validateForm(zCommentForm, {}, ["body"]);
    expect(result).toEqual({
      ok: false,
      form: { values: {}, errors: { body: "This field is required." } },
    });
  });

  it("tolerates a body that is not an object", () => {
    const result = validateForm(zCommentForm, undefined, ["body"]);
    expect(result.ok).toBe(false);
  });

  it("caps title length and checks the image URL", () => {
    const result = validateForm(
      zPostForm,
      { title: "t".repeat(251), subtitle: "s", img_url: "ftp//broken", body: "b" },
      ["title", "subtitle", "img_url", "body"]
    );
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.form.errors).toEqual({
        title: "Must be at most 250 characters.",
        img_url: "Invalid URL.",
      });
    }
  });
});

describe("zIdParam", () => {
  it("accepts positive integers only", () => {
    expect(zIdParam.parse({ id: "12" })).toEqual({ id: 12 });
    expect(zIdParam.safeParse({ id: "0" }).success).toBe(false);
    expect(zIdParam.safeParse({ id: "1.5" }).success).toBe(false);
  });
});
