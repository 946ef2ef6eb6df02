// backend/services/blog/test/seeder.spec.ts
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { seedAdmin } from "../src/services/adminSeeder";
import { ADMIN, READER, buildTestApp, type TestApp } from "./helpers/app";

describe("seedAdmin", () => {
  let t: TestApp;

  beforeEach(() => {
    t = buildTestApp();
  });
  afterEach(() => {
    t.store.close();
  });

  it("creates user 1 on an empty store", async () => {
    const result = await seedAdmin(t.deps, ADMIN);
    expect(result).toEqual({ created: true, userId: 1 });

    const user = t.deps.users.findById(1);
    expect(user?.email).toBe(ADMIN.email);
    expect(await t.deps.passwords.verify(ADMIN.password, user?.password ?? "")).toBe(true);
  });

  it("does nothing once anyone has registered", async () => {
    await seedAdmin(t.deps, READER);
    const result = await seedAdmin(t.deps, ADMIN);
    expect(result).toEqual({ created: false, reason: "users-exist" });
    expect(t.deps.users.count()).toBe(1);
  });
});
