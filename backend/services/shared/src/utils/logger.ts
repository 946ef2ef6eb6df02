// backend/services/shared/src/utils/logger.ts
import type { Request } from "express";
import pino, {
  type Logger,
  type LoggerOptions,
  type LevelWithSilent,
  stdTimeFunctions,
} from "pino";

/**
 * Shared Logger (authoritative)
 *
 * Each service calls `initLogger(SERVICE_NAME)` at bootstrap BEFORE creating
 * any request loggers (pino-http), so every line carries `service`.
 *
 * Usage:
 *   import { initLogger, logger } from "../../shared/src/utils/logger";
 *   initLogger("blog");
 *   logger.info({ postId }, "post created");
 */

export const LOG_LEVELS: readonly LevelWithSilent[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
];

export function isLogLevel(v: string): v is LevelWithSilent {
  return (LOG_LEVELS as readonly string[]).includes(v);
}

function initialLevel(): LevelWithSilent {
  const raw = (process.env.LOG_LEVEL || "info").trim();
  // loadConfig() rejects a bad value with a ConfigError; don't throw at import.
  return isLogLevel(raw) ? raw : "info";
}

// NOTE: no base.service until initLogger() runs; avoids "service":"unknown".
let SERVICE_NAME = "";

const pinoOptions: LoggerOptions = {
  level: initialLevel(),
  base: {},
  timestamp: stdTimeFunctions.isoTime,
  redact: {
    remove: true,
    paths: [
      "req.headers.authorization",
      "req.headers.cookie",
      "res.headers['set-cookie']",
      "req.body.password",
      "req.body.csrf_token",
    ],
  },
};

export let logger: Logger = pino(pinoOptions);

/** Initialize the shared logger for this running service. Call once at bootstrap. */
export function initLogger(serviceName: string): void {
  SERVICE_NAME = String(serviceName || "").trim();
  if (!SERVICE_NAME) throw new Error("initLogger requires serviceName");
  logger = pino({
    ...pinoOptions,
    level: logger.level,
    base: { service: SERVICE_NAME },
  });
}

/** Set level dynamically (config load, tests). */
export function setLogLevel(level: string): void {
  if (!isLogLevel(level)) throw new Error(`Invalid LOG_LEVEL: "${level}"`);
  logger.level = level;
}

export interface LogContext {
  requestId: string | null;
  path: string;
  method: string;
  userId: number | null;
  ip: string | undefined;
  service: string | undefined;
}

export function extractLogContext(req: Request): LogContext {
  return {
    requestId: req.id == null ? null : String(req.id),
    path: req.originalUrl,
    method: req.method,
    userId: req.identity?.id ?? null,
    ip: req.ip,
    service: SERVICE_NAME || undefined,
  };
}
