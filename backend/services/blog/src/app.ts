// backend/services/blog/src/app.ts
/**
 * Assembled via the shared builder:
 *   httpLogger → health (open) → parsers → [OpenAPI, dev only] →
 *   request scope → routes → 404 → error.
 *
 * Dependencies come in through `scopeFactory`, so tests can hand in
 * repositories/services of their own.
 */

import path from "node:path";
import type express from "express";
import type { Express } from "express";
import { createServiceApp } from "@shared/app/createServiceApp";
import type { ReadinessFn } from "@shared/health";
import postRoutes from "./routes/postRoutes";
import commentRoutes from "./routes/commentRoutes";
import { requestScope, type ScopeFactory } from "./scope";
import { SERVICE_NAME } from "./config";

export const API_PREFIX = "/api";
export const OPENAPI_PATH = "/swagger/v1/swagger.json";
const OPENAPI_FILE = path.resolve(__dirname, "..", "docs", "openapi.json");

export type CreateBlogAppOptions = {
  scopeFactory: ScopeFactory;
  /** Exposes the OpenAPI document and error stacks. */
  isDevelopment: boolean;
  readiness?: ReadinessFn;
  serviceName?: string;
};

// Mount routes (one-liners only)
function mountRoutes(api: express.Router) {
  api.use("/post", postRoutes);
  api.use("/comment", commentRoutes);
}

export function createBlogApp(opts: CreateBlogAppOptions): Express {
  return createServiceApp({
    serviceName: opts.serviceName ?? SERVICE_NAME,
    apiPrefix: API_PREFIX,
    mountRoutes,
    middleware: [requestScope(opts.scopeFactory)],
    readiness: opts.readiness,
    docs: opts.isDevelopment
      ? { path: OPENAPI_PATH, file: OPENAPI_FILE }
      : undefined,
    exposeErrorDetails: opts.isDevelopment,
  });
}
