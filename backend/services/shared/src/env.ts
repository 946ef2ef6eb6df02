// backend/services/shared/src/env.ts

/**
 * Env files are loaded **by layer** with deterministic precedence:
 *   1) repo root          → project-wide defaults
 *   2) services dir       → service-class defaults
 *   3) service root       → service-specific overrides
 * Within each layer the mode file (e.g. `.env.development`) is tried first,
 * then `.env`. Later loads override earlier ones; values already present in
 * the process environment are never overwritten.
 *
 * Notes:
 * - `${VAR}` references are expanded with dotenv-expand.
 * - Production usually relies on injected env, so missing files are allowed
 *   unless the caller says otherwise.
 */

import fs from "node:fs";
import path from "node:path";
import { parse, type DotenvParseOutput } from "dotenv";
import { expand } from "dotenv-expand";

/** Find the first directory upward from `start` that contains any of the markers. */
function findRootWithMarkers(start: string, markers: string[]): string | null {
  let dir = path.resolve(start);
  for (;;) {
    for (const m of markers) {
      if (fs.existsSync(path.join(dir, m))) return dir;
    }
    const parent = path.dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

/**
 * Parse one env file. Keys already set by an earlier (lower-precedence) file
 * are overridden; keys injected by the real environment are kept.
 */
function loadIfExists(
  absPath: string,
  injected: ReadonlySet<string>
): boolean {
  if (!fs.existsSync(absPath)) return false;
  let parsed: DotenvParseOutput;
  try {
    parsed = parse(fs.readFileSync(absPath));
  } catch (err) {
    throw new Error(`Failed to load env file: ${absPath} — ${String(err)}`);
  }
  // References see earlier layers, but an earlier layer never shadows this file.
  const processEnv: Record<string, string> = {};
  for (const [k, v] of Object.entries(process.env)) {
    if (v === undefined) continue;
    if (k in parsed && !injected.has(k)) continue;
    processEnv[k] = v;
  }
  const expanded = expand({ parsed, processEnv }).parsed ?? {};
  for (const [k, v] of Object.entries(expanded)) {
    if (!injected.has(k)) process.env[k] = v;
  }
  return true;
}

export interface EnvCascadeOptions {
  /** Allow no env file at all (default: true outside `development`). */
  allowMissing?: boolean;
}

/**
 * Cascading loader for a service. Returns the files that were loaded.
 *
 * Examples (mode = development):
 *   <repo>/.env.development, <repo>/.env
 *   <repo>/backend/services/.env.development, ...
 *   <repo>/backend/services/<svc>/.env.development, ...
 */
export function loadEnvCascadeForService(
  serviceRootAbs: string,
  opts: EnvCascadeOptions = {}
): string[] {
  const mode = (process.env.NODE_ENV || "development").trim();

  const serviceRoot = path.resolve(serviceRootAbs);
  const serviceFamilyDir = path.dirname(serviceRoot);
  const repoRoot =
    findRootWithMarkers(serviceRoot, [".git", "package.json"]) ||
    path.resolve(serviceRoot, "..", "..", "..");

  const modeFiles = [`.env.${mode}`, ".env"];
  const layers = Array.from(new Set([repoRoot, serviceFamilyDir, serviceRoot]));

  const injected = new Set(Object.keys(process.env));
  const loaded: string[] = [];
  for (const dir of layers) {
    // Mode file wins over .env within a layer, so load .env first.
    for (const name of [...modeFiles].reverse()) {
      const abs = path.join(dir, name);
      if (loadIfExists(abs, injected)) loaded.push(abs);
    }
  }

  const allowMissing = opts.allowMissing ?? mode !== "development";
  if (loaded.length === 0 && !allowMissing) {
    throw new Error(
      `No env files found for mode="${mode}". Looked in:\n` +
        layers
          .flatMap((d) => modeFiles.map((f) => `  - ${path.join(d, f)}`))
          .join("\n")
    );
  }
  return loaded;
}

/** Fail fast when any of the keys is missing or blank. */
export function assertRequiredEnv(
  keys: string[],
  env: NodeJS.ProcessEnv = process.env
): void {
  const missing = keys.filter((k) => !env[k] || !String(env[k]).trim());
  if (missing.length)
    throw new Error(`Missing required env vars: ${missing.join(", ")}`);
}
