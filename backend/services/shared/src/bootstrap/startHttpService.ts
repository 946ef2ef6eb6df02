// backend/services/shared/src/bootstrap/startHttpService.ts

/**
 * Bind, log where it landed (port 0 in tests), and shut down cleanly.
 * Never loads env or assembles the app; callers do that first.
 *
 * Notes:
 * - `process.once` for SIGINT/SIGTERM so repeated calls don't stack handlers.
 * - `onShutdown` runs after the server stops accepting connections
 *   (close the database there).
 */

import type { Express } from "express";
import type { Server } from "node:http";
import type { Logger } from "pino";

export interface StartHttpServiceOptions {
  app: Express;
  port: number;
  serviceName: string;
  logger: Logger;
  onShutdown?: () => void | Promise<void>;
}

export interface StartedService {
  server: Server;
  stop: () => Promise<void>;
}

export function startHttpService(
  opts: StartHttpServiceOptions
): StartedService {
  const { app, port, serviceName, logger, onShutdown } = opts;

  const server = app.listen(port, () => {
    const addr = server.address();
    const boundPort = addr && typeof addr === "object" ? addr.port : port;
    logger.info({ service: serviceName, port: boundPort }, "service listening");
  });

  server.keepAliveTimeout = 7_000;
  server.headersTimeout = 9_000;

  server.on("error", (err) => {
    logger.fatal({ err, service: serviceName }, "http server error");
    process.exit(1);
  });

  const stop = () =>
    new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });

  const shutdown = (signal: string) => {
    logger.info({ signal, service: serviceName }, "shutting down service");
    stop()
      .then(() => onShutdown?.())
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error({ err, service: serviceName }, "shutdown failed");
        process.exit(1);
      });
  };

  process.once("SIGTERM", () => shutdown("SIGTERM"));
  process.once("SIGINT", () => shutdown("SIGINT"));

  return { server, stop };
}
