// backend/services/blog/test/posts.spec.ts
import request from "supertest";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  FIXED_DATE_TEXT,
  SAMPLE_POST,
  buildTestApp,
  type TestApp,
} from "./helpers/app";
import { adminAndReader, createPost, type Agent } from "./helpers/agents";

describe("posts (admin CRUD)", () => {
  let t: TestApp;
  let admin: Agent;
  let reader: Agent;

  beforeEach(async () => {
    t = buildTestApp();
    ({ admin, reader } = await adminAndReader(t.app));
  });
  afterEach(() => {
    t.store.close();
  });

  it("admin creates a post: authored by the admin, dated today", async () => {
    await createPost(admin);

    const [post] = t.deps.posts.list();
    expect(post).toMatchObject({
      id: 1,
      authorId: 1,
      authorName: "Owner",
      title: "First Post",
      subtitle: "Getting started",
      imgUrl: "https://example.com/first.jpg",
      body: "<p>Hello there</p>",
      date: FIXED_DATE_TEXT,
    });
  });

  it("home page lists posts oldest first with author and date", async () => {
    await createPost(admin);
    await createPost(admin, { title: "Second Post" });

    const res = await request(t.app).get("/");
    expect(res.status).toBe(200);
    const first = res.text.indexOf('<h2 class="post-title">First Post</h2>');
    const second = res.text.indexOf('<h2 class="post-title">Second Post</h2>');
    expect(first).toBeGreaterThan(-1);
    expect(second).toBeGreaterThan(first);
    expect(res.text).toContain(
      `Posted by <a href="#">Owner</a> on ${FIXED_DATE_TEXT}`
    );
  });

  it("only the admin sees create and delete controls", async () => {
    await createPost(admin);

    const asAdmin = await admin.get("/");
    expect(asAdmin.text).toContain('href="/new-post"');
    expect(asAdmin.text).toContain('href="/delete/1"');

    const asReader = await reader.get("/");
    expect(asReader.text).not.toContain('href="/new-post"');
    expect(asReader.text).not.toContain('href="/delete/1"');
  });

  it("a duplicate title is refused with a flash", async () => {
    await createPost(admin);

    const res = await admin
      .post("/new-post")
      .type("form")
      .send({ ...SAMPLE_POST, subtitle: "Again" });
    expect(res.status).toBe(200);
    expect(res.text).toContain(
      '<p class="flash">A post with that title already exists.</p>'
    );
    expect(res.text).toContain('value="Again"');
    expect(t.deps.posts.list()).toHaveLength(1);
  });

  it("invalid post forms re-render with field errors", async () => {
    const res = await admin
      .post("/new-post")
      .type("form")
      .send({ ...SAMPLE_POST, title: "  ", img_url: "not-a-url" });
    expect(res.status).toBe(200);
    expect(res.text).toContain("This field is required.");
    expect(res.text).toContain("Invalid URL.");
    expect(t.deps.posts.list()).toHaveLength(0);
  });

  it("show renders the sanitized body and the admin's edit link", async () => {
    await createPost(admin, {
      body: '<p onclick="steal()">Hi</p><script>alert(1)</script>',
    });

    const res = await admin.get("/post/1");
    expect(res.status).toBe(200);
    expect(res.text).toContain('<article class="post-body"><p>Hi</p></article>');
    expect(res.text).not.toContain("<script>");
    expect(res.text).toContain('href="/edit-post/1"');
    expect(res.text).toContain("background-image: url('https://example.com/first.jpg')");

    const anon = await request(t.app).get("/post/1");
    expect(anon.text).not.toContain('href="/edit-post/1"');
  });

  it("show answers 404 for a missing post", async () => {
    const res = await request(t.app).get("/post/99");
    expect(res.status).toBe(404);
    expect(res.text).toContain("<h1>Not Found</h1>");
    expect(res.text).toContain("That post does not exist.");
  });

  it("non-numeric ids do not match a route", async () => {
    const res = await request(t.app).get("/post/abc");
    expect(res.status).toBe(404);
    expect(res.text).toContain("The requested page could not be found.");
  });

  it("edit form is pre-filled from the stored post", async () => {
    await createPost(admin);

    const res = await admin.get("/edit-post/1");
    expect(res.status).toBe(200);
    expect(res.text).toContain('action="/edit-post/1"');
    expect(res.text).toContain('value="First Post"');
    expect(res.text).toContain("&lt;p&gt;Hello there&lt;/p&gt;</textarea>");
  });

  it("edit overwrites the four fields and keeps author and date", async () => {
    await createPost(admin);

    const res = await admin.post("/edit-post/1").type("form").send({
      title: "First Post (revised)",
      subtitle: "Still starting",
      img_url: "https://example.com/revised.jpg",
      body: "<p>Updated</p>",
    });
    expect(res.status).toBe(302);
    expect(res.headers.location).toBe("/post/1");

    expect(t.deps.posts.findById(1)).toMatchObject({
      title: "First Post (revised)",
      subtitle: "Still starting",
      imgUrl: "https://example.com/revised.jpg",
      body: "<p>Updated</p>",
      authorId: 1,
      date: FIXED_DATE_TEXT,
    });
  });

  it("edit may keep the post's own title but not take another's", async () => {
    await createPost(admin);
    await createPost(admin, { title: "Second Post" });

    const same = await admin
      .post("/edit-post/1")
      .type("form")
      .send({ ...SAMPLE_POST, subtitle: "New subtitle" });
    expect(same.status).toBe(302);

    const clash = await admin
      .post("/edit-post/2")
      .type("form")
      .send({ ...SAMPLE_POST });
    expect(clash.status).toBe(200);
    expect(clash.text).toContain("A post with that title already exists.");
    expect(t.deps.posts.findById(2)?.title).toBe("Second Post");
  });

  it("edit of a missing post is a 404", async () => {
    const get = await admin.get("/edit-post/7");
    expect(get.status).toBe(404);
    const post = await admin.post("/edit-post/7").type("form").send(SAMPLE_POST);
    expect(post.status).toBe(404);
  });

  it("concurrent edits from stale forms: the last write wins", async () => {
    await createPost(admin);

    // Both forms were loaded before either was saved.
    await admin.get("/edit-post/1");
    await admin.get("/edit-post/1");

    await admin
      .post("/edit-post/1")
      .type("form")
      .send({ ...SAMPLE_POST, subtitle: "from tab A" });
    await admin
      .post("/edit-post/1")
      .type("form")
      .send({ ...SAMPLE_POST, subtitle: "from tab B" });

    expect(t.deps.posts.findById(1)?.subtitle).toBe("from tab B");
  });

  it("delete removes the post together with its comments", async () => {
    await createPost(admin);
    await reader.post("/post/1").type("form").send({ body: "Nice one" });
    expect(t.deps.comments.countForPost(1)).toBe(1);

    const res = await admin.get("/delete/1");
    expect(res.status).toBe(302);
    expect(res.headers.location).toBe("/");
    expect(t.deps.posts.findById(1)).toBeUndefined();
    expect(t.deps.comments.countForPost(1)).toBe(0);
  });

  it("deleting a missing id is a no-op redirect", async () => {
    const res = await admin.get("/delete/42");
    expect(res.status).toBe(302);
    expect(res.headers.location).toBe("/");
  });
});
