// backend/services/shared/health.ts
import express from "express";

export type ReadinessDetails = Record<string, unknown>;
export type ReadinessFn = (
  req: express.Request
) => Promise<ReadinessDetails> | ReadinessDetails;

type Options = {
  service: string;
  env?: string;
  version?: string;
  readiness?: ReadinessFn;
};

function getReqId(req: express.Request): string | undefined {
  return typeof req.id === "string" ? req.id : undefined;
}

/**
 * Exposes:
 *   GET /health         -> liveness
 *   GET /health/live    -> explicit liveness
 *   GET /health/ready   -> explicit readiness
 *   GET /healthz        -> k8s-style liveness
 *   GET /readyz         -> k8s-style readiness
 *   GET /live           -> relative liveness
 *   GET /ready          -> relative readiness
 */
export function createHealthRouter(opts: Options) {
  const router = express.Router();

  const base = {
    service: opts.service,
    env: opts.env ?? process.env.NODE_ENV,
    version: opts.version,
  };

  const liveness = (req: express.Request, res: express.Response) => {
    res.json({ ...base, ok: true, instance: getReqId(req) });
  };

  const readiness = async (req: express.Request, res: express.Response) => {
    try {
      const details = opts.readiness ? await opts.readiness(req) : {};
      res.json({ ...base, ok: true, instance: getReqId(req), ...details });
    } catch (err) {
      req.log.warn({ err }, "readiness check failed");
      res.status(503).json({
        ...base,
        ok: false,
        instance: getReqId(req),
        error: err instanceof Error ? err.message : String(err),
      });
    }
  };

  router.get("/health", liveness);
  router.get("/health/live", liveness);
  router.get("/health/ready", readiness);
  router.get("/healthz", liveness);
  router.get("/readyz", readiness);
  router.get("/live", liveness);
  router.get("/ready", readiness);

  return router;
}
