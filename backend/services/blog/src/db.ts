// backend/services/blog/src/db.ts
import Database from "better-sqlite3";
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import * as schema from "./models/schema";
import { logger } from "../../shared/src/utils/logger";

export type BlogDb = BetterSQLite3Database<typeof schema>;

export interface BlogStore {
  db: BlogDb;
  sqlite: Database.Database;
  /** Cheap round-trip used by readiness. */
  ping: () => void;
  close: () => void;
}

export function connectDb(filename: string): BlogStore {
  let sqlite: Database.Database;
  try {
    sqlite = new Database(filename);
  } catch (err) {
    logger.error(
      {
        component: "sqlite",
        filename,
        error: err instanceof Error ? err.message : String(err),
      },
      "[sqlite-blog] Connection error"
    );
    throw err;
  }

  // Cascade on comments depends on this; SQLite leaves it off per connection.
  sqlite.pragma("foreign_keys = ON");
  if (filename !== ":memory:") sqlite.pragma("journal_mode = WAL");

  for (const ddl of schema.SCHEMA_DDL) sqlite.exec(ddl);

  logger.info({ component: "sqlite", filename }, "[sqlite-blog] Connected");

  return {
    db: drizzle(sqlite, { schema }),
    sqlite,
    ping: () => {
      sqlite.prepare("select 1").get();
    },
    close: () => {
      if (sqlite.open) sqlite.close();
    },
  };
}
