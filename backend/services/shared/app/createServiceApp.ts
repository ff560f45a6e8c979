// backend/services/shared/app/createServiceApp.ts

/**
 * Shared app builder. Assembles the stack every service runs:
 *   http logger (request id) → health → body parsers → [docs] →
 *   api router (middleware, routes) → 404 → error formatter
 *
 * Notes:
 * - Health endpoints stay ahead of the parsers and are never logged per request.
 * - `middleware` runs on the api router only, so health and docs skip it.
 */

import express, { type Express, type RequestHandler } from "express";
import { makeHttpLogger } from "../middleware/httpLogger";
import {
  notFoundProblemJson,
  errorProblemJson,
} from "../middleware/problemJson";
import { createHealthRouter, type ReadinessFn } from "../health";

export type CreateServiceAppOptions = {
  /** Service slug (e.g., "blog"). Used in logs & health payloads. */
  serviceName: string;
  /** API base path (e.g., "/api"). */
  apiPrefix: string;
  /**
   * Function that mounts the service’s routes onto the provided Router.
   * Routes are one-liners that import handlers only.
   */
  mountRoutes: (router: express.Router) => void;
  /** Per-request middleware mounted on the api router before the routes. */
  middleware?: RequestHandler[];
  /** Health readiness hook (optional). */
  readiness?: ReadinessFn;
  /** Serve a static API document (e.g. OpenAPI JSON) at `path`. */
  docs?: { path: string; file: string };
  /** Put stack traces into 500 Problem+JSON bodies. */
  exposeErrorDetails?: boolean;
  /** express.json() body limit. */
  jsonLimit?: string;
};

export function createServiceApp(opts: CreateServiceAppOptions): Express {
  const {
    serviceName,
    apiPrefix,
    mountRoutes,
    middleware = [],
    readiness,
    docs,
    exposeErrorDetails = false,
    jsonLimit = "1mb",
  } = opts;

  const app = express();
  app.disable("x-powered-by");

  // ── Transport & Telemetry ───────────────────────────────────────────────────
  app.use(makeHttpLogger(serviceName));

  // ── Health (public, no auth) ────────────────────────────────────────────────
  app.use(createHealthRouter({ service: serviceName, readiness }));

  // ── Body parsers ────────────────────────────────────────────────────────────
  app.use(express.json({ limit: jsonLimit }));
  app.use(express.urlencoded({ extended: false }));

  // ── Docs ────────────────────────────────────────────────────────────────────
  if (docs) {
    app.get(docs.path, (_req, res) => {
      res.sendFile(docs.file);
    });
  }

  // ── Routes (single-concern, import handlers only) ───────────────────────────
  const api = express.Router();
  for (const mw of middleware) api.use(mw);
  mountRoutes(api);
  app.use(apiPrefix, api);

  // ── Tails: 404 + error formatter ────────────────────────────────────────────
  app.use(
    notFoundProblemJson([
      apiPrefix,
      "/health",
      "/healthz",
      "/readyz",
      "/live",
      "/ready",
    ])
  );
  app.use(errorProblemJson({ exposeDetails: exposeErrorDetails }));

  return app;
}
