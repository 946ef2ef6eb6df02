// backend/services/blog/scripts/seedAdmin.ts
/**
 * Creates the administrator (user id 1) on an empty database.
 *
 *   ADMIN_EMAIL=owner@example.com ADMIN_PASSWORD=... ADMIN_NAME=Owner \
 *     npm run seed
 */
import "../src/bootstrap";
import { assertRequiredEnv } from "../../shared/src/env";
import { logger } from "../../shared/src/utils/logger";
import { loadConfig } from "../src/config";
import { connectDb } from "../src/db";
import { createDeps } from "../src/deps";
import { seedAdmin } from "../src/services/adminSeeder";

async function main(): Promise<void> {
  assertRequiredEnv(["ADMIN_EMAIL", "ADMIN_PASSWORD"]);
  const config = loadConfig();
  const store = connectDb(config.databaseFile);
  try {
    const result = await seedAdmin(createDeps(config, store), {
      email: process.env.ADMIN_EMAIL ?? "",
      password: process.env.ADMIN_PASSWORD ?? "",
      name: process.env.ADMIN_NAME ?? "Admin",
    });
    if (result.created) {
      logger.info({ userId: result.userId }, "[seed] admin created");
    } else {
      logger.warn("[seed] users already exist; nothing to do");
    }
  } finally {
    store.close();
  }
}

main().catch((err: unknown) => {
  logger.fatal({ err }, "[seed] failed");
  process.exit(1);
});
