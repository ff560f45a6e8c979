// backend/services/shared/middleware/httpLogger.ts
import pinoHttp from "pino-http";
import type { IncomingMessage, ServerResponse } from "node:http";
import { logger } from "../utils/logger";
import { resolveRequestId } from "./requestId";

const QUIET_PATHS = new Set([
  "/health",
  "/healthz",
  "/readyz",
  "/live",
  "/ready",
  "/health/live",
  "/health/ready",
  "/favicon.ico",
]);

export function makeHttpLogger(serviceName: string) {
  return pinoHttp({
    logger,
    genReqId: (req, res) => {
      const id = resolveRequestId(req.headers);
      res.setHeader("x-request-id", id);
      return id;
    },
    customLogLevel: (
      _req: IncomingMessage,
      res: ServerResponse,
      err?: Error
    ) => {
      if (err) return "error";
      const s = res.statusCode;
      if (s >= 500) return "error";
      if (s >= 400) return "warn";
      return "info";
    },
    customProps: () => ({ service: serviceName }),
    autoLogging: {
      ignore: (req: IncomingMessage) => QUIET_PATHS.has(req.url ?? ""),
    },
    serializers: {
      req(req: IncomingMessage) {
        return { id: req.id, method: req.method, url: req.url };
      },
      res(res: ServerResponse) {
        return { statusCode: res.statusCode };
      },
    },
  });
}
