// backend/services/blog/test/config.spec.ts
import { describe, expect, it } from "vitest";
import { ConfigError, loadConfig, parseDatabaseUrl } from "../src/config";

describe("loadConfig", () => {
  it("applies defaults around the one required value", () => {
    const cfg = loadConfig({ SECRET_KEY: "test-secret" });
    expect(cfg).toEqual({
      serviceName: "blog",
      env: "development",
      port: 5000,
      databaseUrl: "sqlite:///blog.db",
      databaseFile: "blog.db",
      secretKey: "test-secret",
      logLevel: "info",
      bcryptRounds: 10,
      csrfEnabled: true,
      sessionMaxAgeSec: 604800,
      secureCookies: false,
    });
    expect(Object.isFrozen(cfg)).toBe(true);
  });

  it("refuses to start without SECRET_KEY", () => {
    expect(() => loadConfig({})).toThrow(ConfigError);
    expect(() => loadConfig({ SECRET_KEY: "   " })).toThrow(
      "Missing required env var: SECRET_KEY"
    );
  });

  it("reads overrides", () => {
    const cfg = loadConfig({
      SECRET_KEY: "test-secret",
      NODE_ENV: "production",
      PORT: "8080",
      DATABASE_URL: "sqlite:////var/lib/blog/blog.db",
      LOG_LEVEL: "debug",
      BCRYPT_ROUNDS: "12",
      CSRF_ENABLED: "off",
      SESSION_MAX_AGE_SEC: "3600",
    });
    expect(cfg.port).toBe(8080);
    expect(cfg.databaseFile).toBe("/var/lib/blog/blog.db");
    expect(cfg.logLevel).toBe("debug");
    expect(cfg.bcryptRounds).toBe(12);
    expect(cfg.csrfEnabled).toBe(false);
    expect(cfg.sessionMaxAgeSec).toBe(3600);
    expect(cfg.secureCookies).toBe(true);
  });

  it.each([
    ["PORT", "http"],
    ["PORT", "70000"],
    ["BCRYPT_ROUNDS", "2"],
    ["CSRF_ENABLED", "maybe"],
    ["LOG_LEVEL", "loud"],
    ["SESSION_MAX_AGE_SEC", "5"],
  ])("rejects %s=%s", (name, value) => {
    expect(() => loadConfig({ SECRET_KEY: "test-secret", [name]: value })).toThrow(
      ConfigError
    );
  });
});

describe("parseDatabaseUrl", () => {
  it.each([
    ["sqlite:///blog.db", "blog.db"],
    ["sqlite:////abs/blog.db", "/abs/blog.db"],
    ["sqlite://:memory:", ":memory:"],
    [":memory:", ":memory:"],
    ["file:data/blog.db", "data/blog.db"],
    ["./data/blog.db", "./data/blog.db"],
  ])("%s → %s", (url, file) => {
    expect(parseDatabaseUrl(url)).toBe(file);
  });

  it("rejects other engines", () => {
    expect(() => parseDatabaseUrl("postgres://db/blog")).toThrow(
      'Unsupported DATABASE_URL scheme: "postgres" (expected sqlite)'
    );
  });
});
