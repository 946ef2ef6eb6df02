// backend/services/blog/test/guards.spec.ts
import request from "supertest";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { SAMPLE_POST, buildTestApp, type TestApp } from "./helpers/app";
import { adminAndReader, createPost, type Agent } from "./helpers/agents";

describe("admin guard", () => {
  let t: TestApp;
  let admin: Agent;
  let reader: Agent;

  beforeEach(async () => {
    t = buildTestApp();
    ({ admin, reader } = await adminAndReader(t.app));
    await createPost(admin);
  });
  afterEach(() => {
    t.store.close();
  });

  const adminGets = ["/new-post", "/edit-post/1", "/delete/1", "/contact"];

  it.each(adminGets)("GET %s redirects anonymous visitors home", async (path) => {
    const res = await request(t.app).get(path);
    expect(res.status).toBe(302);
    expect(res.headers.location).toBe("/");
  });

  it.each(adminGets)("GET %s redirects a non-admin home", async (path) => {
    const res = await reader.get(path);
    expect(res.status).toBe(302);
    expect(res.headers.location).toBe("/");
  });

  it("non-admin mutations run nothing", async () => {
    const create = await reader
      .post("/new-post")
      .type("form")
      .send({ ...SAMPLE_POST, title: "Sneaky" });
    expect(create.status).toBe(302);

    const edit = await reader
      .post("/edit-post/1")
      .type("form")
      .send({ ...SAMPLE_POST, title: "Defaced" });
    expect(edit.status).toBe(302);

    await reader.get("/delete/1");

    expect(t.deps.posts.list().map((p) => p.title)).toEqual(["First Post"]);
  });

  it("the admin reaches every admin page", async () => {
    for (const path of ["/new-post", "/edit-post/1", "/contact"]) {
      const res = await admin.get(path);
      expect(res.status).toBe(200);
    }
  });

  it("about is public; contact appears in the nav only for the admin", async () => {
    const about = await request(t.app).get("/about");
    expect(about.status).toBe(200);
    expect(about.text).toContain("<h1>About Me</h1>");
    expect(about.text).not.toContain('href="/contact"');

    const asAdmin = await admin.get("/about");
    expect(asAdmin.text).toContain('href="/contact"');
  });
});
