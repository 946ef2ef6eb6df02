// backend/services/blog/test/lib.spec.ts
import { describe, expect, it } from "vitest";
import { formatPostDate } from "../src/lib/dates";
import { gravatarUrl } from "../src/lib/gravatar";
import { isUniqueViolation } from "../src/lib/dbErrors";
import { PasswordHasher } from "../src/lib/password";

describe("formatPostDate", () => {
  it("spells the month and pads the day", () => {
    expect(formatPostDate(new Date(2026, 9, 5, 12))).toBe("October 05, 2026");
    expect(formatPostDate(new Date(2025, 0, 31, 12))).toBe("January 31, 2025");
  });
});

describe("gravatarUrl", () => {
  it("hashes the trimmed, lower-cased email", () => {
    expect(gravatarUrl("  Test@Example.com ")).toBe(
      "http://www.gravatar.com/avatar/55502f40dc8b7c769880b10874abc9d0?s=100&d=retro&r=g"
    );
  });

  it("takes size, rating and fallback", () => {
    expect(gravatarUrl("test@example.com", { size: 40, rating: "pg", fallback: "mp" })).toBe(
      "http://www.gravatar.com/avatar/55502f40dc8b7c769880b10874abc9d0?s=40&d=mp&r=pg"
    );
  });
});

describe("isUniqueViolation", () => {
  it("recognizes the driver code and message", () => {
    expect(isUniqueViolation({ code: "SQLITE_CONSTRAINT_UNIQUE" })).toBe(true);
    expect(isUniqueViolation(new Error("UNIQUE constraint failed: users.email"))).toBe(true);
  });

  it("follows the cause chain", () => {
    const inner = Object.assign(new Error("constraint"), {
      code: "SQLITE_CONSTRAINT_UNIQUE",
    });
    expect(isUniqueViolation(new Error("query failed", { cause: inner }))).toBe(true);
  });

  it("ignores everything else", () => {
    expect(isUniqueViolation(new Error("FOREIGN KEY constraint failed"))).toBe(false);
    expect(isUniqueViolation("UNIQUE constraint failed")).toBe(false);
    expect(isUniqueViolation(null)).toBe(false);
  });
});

describe("PasswordHasher", () => {
  const hasher = new PasswordHasher(4);

  it("verifies the original password only", async () => {
    const hash = await hasher.hash("correct horse");
    expect(hash).not.toContain("correct horse");
    expect(await hasher.verify("correct horse", hash)).toBe(true);
    expect(await hasher.verify("wrong horse", hash)).toBe(false);
  });

  it("salts every hash", async () => {
    const [a, b] = await Promise.all([hasher.hash("same"), hasher.hash("same")]);
    expect(a).not.toBe(b);
  });
});
