// backend/services/shared/health.ts
import express from "express";
import { requestIdOf } from "./utils/logger";

export type ReadinessDetails = Record<string, unknown>;
export type ReadinessFn = () => Promise<ReadinessDetails> | ReadinessDetails;

type Options = {
  service: string;
  env?: string;
  version?: string;
  readiness?: ReadinessFn;
};

/**
 * Exposes:
 *   GET /health         -> legacy/compat liveness
 *   GET /health/live    -> explicit liveness
 *   GET /health/ready   -> explicit readiness
 *   GET /healthz        -> k8s-style liveness
 *   GET /readyz         -> k8s-style readiness
 *
 * A readiness check that throws answers 503.
 */
export function createHealthRouter(opts: Options) {
  const router = express.Router();

  const base = {
    service: opts.service,
    env: opts.env ?? process.env.NODE_ENV,
    version: opts.version,
  };

  const liveness = (req: express.Request, res: express.Response) => {
    res.json({ ...base, ok: true, instance: requestIdOf(req) || undefined });
  };

  const readiness = async (req: express.Request, res: express.Response) => {
    const instance = requestIdOf(req) || undefined;
    try {
      const details = opts.readiness ? await opts.readiness() : {};
      res.json({ ...base, ok: true, instance, ...details });
    } catch (err) {
      res.status(503).json({
        ...base,
        ok: false,
        instance,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  };

  router.get("/health", liveness);
  router.get("/health/live", liveness);
  router.get("/health/ready", readiness);
  router.get("/healthz", liveness);
  router.get("/readyz", readiness);

  return router;
}
