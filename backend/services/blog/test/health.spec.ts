// backend/services/blog/test/health.spec.ts
import request from "supertest";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { buildTestApp, type TestApp } from "./helpers/app";

describe("health endpoints", () => {
  let t: TestApp;

  beforeEach(() => {
    t = buildTestApp();
  });
  afterEach(() => {
    t.store.close();
  });

  it("liveness answers without touching the session", async () => {
    const res = await request(t.app).get("/health");
    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ service: "blog", ok: true });
    expect(res.get("Set-Cookie")).toBeUndefined();
  });

  it("echoes the caller's request id", async () => {
    const res = await request(t.app).get("/healthz").set("x-request-id", "req-123");
    expect(res.headers["x-request-id"]).toBe("req-123");
    expect(res.body.requestId).toBe("req-123");
  });

  it("readiness pings the store", async () => {
    const ok = await request(t.app).get("/readyz");
    expect(ok.status).toBe(200);
    expect(ok.body).toMatchObject({ ok: true, db: "ok" });

    t.store.close();
    const down = await request(t.app).get("/readyz");
    expect(down.status).toBe(503);
    expect(down.body.ok).toBe(false);
  });
});

describe("error pages", () => {
  let t: TestApp;

  beforeEach(() => {
    t = buildTestApp();
  });
  afterEach(() => {
    t.store.close();
  });

  it("unknown routes get the 404 page in the site layout", async () => {
    const res = await request(t.app).get("/no-such-page");
    expect(res.status).toBe(404);
    expect(res.headers["content-type"]).toMatch(/text\/html/);
    expect(res.text).toContain("<title>404 Not Found</title>");
    expect(res.text).toContain('href="/about">About</a>');
  });

  it("store failures render a generic 500 page", async () => {
    t.store.close();
    const res = await request(t.app).get("/");
    expect(res.status).toBe(500);
    expect(res.text).toContain("Something went wrong on our side. Please try again.");
    expect(res.text).not.toContain("database connection is not open");
  });
});
