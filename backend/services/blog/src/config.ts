// backend/services/blog/src/config.ts

/**
 * Config for the blog service.
 * - No dotenv loading here (bootstrap.ts loads env).
 * - SECRET_KEY has no default: the process must not start without it.
 * - `loadConfig` takes the env as an argument so tests build configs directly.
 */

import { isLogLevel } from "../../shared/src/utils/logger";

export const SERVICE_NAME = "blog" as const;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export const DEFAULT_DATABASE_URL = "sqlite:///blog.db";
const SEVEN_DAYS_SEC = 7 * 24 * 60 * 60;

export interface BlogConfig {
  serviceName: string;
  env: string;
  port: number;
  databaseUrl: string;
  /** better-sqlite3 filename (`:memory:` for an in-process store). */
  databaseFile: string;
  secretKey: string;
  logLevel: string;
  bcryptRounds: number;
  csrfEnabled: boolean;
  sessionMaxAgeSec: number;
  secureCookies: boolean;
}

type Env = Record<string, string | undefined>;

function optional(env: Env, name: string): string | undefined {
  const v = env[name];
  return v == null || v.trim() === "" ? undefined : v.trim();
}

function requireEnv(env: Env, name: string): string {
  const v = optional(env, name);
  if (v === undefined) {
    throw new ConfigError(`Missing required env var: ${name}`);
  }
  return v;
}

function intInRange(
  env: Env,
  name: string,
  fallback: number,
  min: number,
  max: number
): number {
  const raw = optional(env, name);
  if (raw === undefined) return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < min || n > max) {
    throw new ConfigError(
      `Invalid value for env var ${name}: "${raw}" (expected an integer ${min}-${max})`
    );
  }
  return n;
}

function flag(env: Env, name: string, fallback: boolean): boolean {
  const raw = optional(env, name);
  if (raw === undefined) return fallback;
  const v = raw.toLowerCase();
  if (["1", "true", "yes", "on"].includes(v)) return true;
  if (["0", "false", "no", "off"].includes(v)) return false;
  throw new ConfigError(`Invalid boolean for env var ${name}: "${raw}"`);
}

/**
 * Map a connection string onto a better-sqlite3 filename.
 *
 *   sqlite:///blog.db        → blog.db (relative to the working directory)
 *   sqlite:////var/db/b.db   → /var/db/b.db
 *   sqlite://:memory:        → :memory:
 *   file:blog.db             → blog.db
 *   ./data/blog.db           → ./data/blog.db
 */
export function parseDatabaseUrl(url: string): string {
  const u = url.trim();
  if (u === ":memory:" || u === "sqlite://:memory:" || u === "sqlite:///:memory:") {
    return ":memory:";
  }
  if (u.startsWith("sqlite:///")) {
    const file = u.slice("sqlite:///".length);
    if (!file) throw new ConfigError(`DATABASE_URL has no file path: "${url}"`);
    return file;
  }
  if (u.startsWith("file:")) {
    const file = u.slice("file:".length);
    if (!file) throw new ConfigError(`DATABASE_URL has no file path: "${url}"`);
    return file;
  }
  if (/^[a-z][a-z0-9+.-]*:\/\//i.test(u)) {
    throw new ConfigError(
      `Unsupported DATABASE_URL scheme: "${u.split(":")[0]}" (expected sqlite)`
    );
  }
  return u;
}

export function loadConfig(env: Env = process.env): BlogConfig {
  const nodeEnv = optional(env, "NODE_ENV") ?? "development";
  const databaseUrl = optional(env, "DATABASE_URL") ?? DEFAULT_DATABASE_URL;

  const logLevel = optional(env, "LOG_LEVEL") ?? "info";
  if (!isLogLevel(logLevel)) {
    throw new ConfigError(`Invalid LOG_LEVEL: "${logLevel}"`);
  }

  return Object.freeze({
    serviceName: SERVICE_NAME,
    env: nodeEnv,
    port: intInRange(env, "PORT", 5000, 0, 65535),
    databaseUrl,
    databaseFile: parseDatabaseUrl(databaseUrl),
    secretKey: requireEnv(env, "SECRET_KEY"),
    logLevel,
    bcryptRounds: intInRange(env, "BCRYPT_ROUNDS", 10, 4, 15),
    csrfEnabled: flag(env, "CSRF_ENABLED", true),
    sessionMaxAgeSec: intInRange(
      env,
      "SESSION_MAX_AGE_SEC",
      SEVEN_DAYS_SEC,
      60,
      365 * 24 * 60 * 60
    ),
    secureCookies: nodeEnv === "production",
  });
}
