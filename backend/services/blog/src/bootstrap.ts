// backend/services/blog/src/bootstrap.ts

/**
 * Side-effect module, imported first by the entrypoint:
 * 1) load env files through the shared cascade (repo → services → blog)
 * 2) tag the shared logger with this service's name
 *
 * Required values are checked by loadConfig(), not here.
 */

import path from "node:path";
import { loadEnvCascadeForService } from "../../shared/src/env";
import { initLogger } from "../../shared/src/utils/logger";
import { SERVICE_NAME } from "./config";

loadEnvCascadeForService(path.resolve(__dirname, ".."));
initLogger(SERVICE_NAME);
