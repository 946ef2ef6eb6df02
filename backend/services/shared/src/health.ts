// backend/services/shared/src/health.ts

/**
 * Liveness answers "is the process up?" (no dependencies).
 * Readiness answers "can this instance take traffic?" (fast, bounded checks).
 *
 * Exposes:
 *   GET /health   -> liveness
 *   GET /healthz  -> k8s-style liveness
 *   GET /readyz   -> readiness (503 when the check throws)
 */

import express from "express";

export type ReadinessDetails = Record<string, string | number | boolean>;
export type ReadinessFn = () => Promise<ReadinessDetails> | ReadinessDetails;

type Options = {
  service: string;
  env?: string;
  readiness?: ReadinessFn;
};

export function createHealthRouter(opts: Options) {
  const router = express.Router();

  const base = {
    service: opts.service,
    env: opts.env ?? process.env.NODE_ENV,
  };

  const liveness = (req: express.Request, res: express.Response) => {
    res.json({ ...base, ok: true, requestId: req.id });
  };

  const readiness = async (req: express.Request, res: express.Response) => {
    try {
      const details = opts.readiness ? await opts.readiness() : {};
      res.json({ ...base, ok: true, requestId: req.id, ...details });
    } catch (err) {
      res.status(503).json({
        ...base,
        ok: false,
        requestId: req.id,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  };

  router.get("/health", liveness);
  router.get("/healthz", liveness);
  router.get("/readyz", readiness);

  return router;
}
