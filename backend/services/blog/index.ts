// backend/services/blog/index.ts
import "./src/bootstrap";
import { logger, setLogLevel } from "../shared/src/utils/logger";
import { startHttpService } from "../shared/src/bootstrap/startHttpService";
import { ConfigError, loadConfig } from "./src/config";
import { connectDb } from "./src/db";
import { createDeps } from "./src/deps";
import { createBlogApp } from "./src/app";

function main(): void {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const store = connectDb(config.databaseFile);
  const app = createBlogApp(createDeps(config, store));

  startHttpService({
    app,
    port: config.port,
    serviceName: config.serviceName,
    logger,
    onShutdown: () => store.close(),
  });
}

try {
  main();
} catch (err) {
  if (err instanceof ConfigError) {
    logger.fatal({ error: err.message }, "[blog] Invalid configuration");
  } else {
    logger.fatal({ err }, "[blog] Failed to start");
  }
  process.exit(1);
}
