// backend/services/blog/src/repo/RepoBase.ts
import type { Logger } from "pino";
import type { BlogDb } from "../db";
import { logger } from "../../../shared/src/utils/logger";

/**
 * Thin base for the table repos: holds the drizzle handle and a logger
 * tagged with the table name. Repos own queries only; no request state.
 */
export abstract class RepoBase {
  protected readonly db: BlogDb;
  protected readonly log: Logger;

  constructor(db: BlogDb, table: string) {
    this.db = db;
    this.log = logger.child({ component: "repo", table });
  }
}
