// backend/services/shared/middleware/problemJson.ts

/**
 * Global error translation.
 *
 * Every error that escapes a handler (sync throw, rejected promise via
 * asyncHandler, or next(err)) lands here and leaves as exactly one
 * RFC 7807 Problem+JSON response:
 *   - NotFoundError            → 404 "Resource Not Found", detail = message
 *   - body-parser client error → its 4xx status, "Bad Request"
 *   - anything else            → 500 "An unexpected error occurred."
 *
 * 500 detail carries the stack only when `exposeDetails` is on (development).
 */

import type { Request, Response, NextFunction } from "express";
import { extractLogContext } from "../utils/logger";
import { sendProblem } from "../contracts/common";
import { NotFoundError } from "../http/errors";

export const UNEXPECTED_TITLE = "An unexpected error occurred.";
export const GENERIC_DETAIL =
  "The server encountered an error. Please try again or contact support.";

export type ErrorProblemOptions = {
  /** Put the full error description in 500 responses (development only). */
  exposeDetails: boolean;
};

/**
 * 404 formatter: only emits Problem+JSON for known API/health prefixes.
 * Everything else returns a bare 404.
 */
export function notFoundProblemJson(validPrefixes: string[]) {
  return (req: Request, res: Response) => {
    if (validPrefixes.some((p) => req.path.startsWith(p))) {
      return sendProblem(res, {
        type: "about:blank",
        title: "Not Found",
        status: 404,
        detail: "Route not found",
      });
    }
    return res.status(404).end();
  };
}

/** Status of an error the body parser raised for a bad client payload, if any. */
function clientErrorStatus(err: unknown): number | null {
  if (!(err instanceof Error)) return null;
  if (!("status" in err) || !("expose" in err)) return null;
  const { status, expose } = err;
  if (typeof status !== "number" || expose !== true) return null;
  return status >= 400 && status < 500 ? status : null;
}

function describe(err: unknown): string {
  if (err instanceof Error) return err.stack ?? `${err.name}: ${err.message}`;
  return String(err);
}

export function errorProblemJson(opts: ErrorProblemOptions) {
  return (err: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      // Too late for a body; let Express close the socket.
      return next(err);
    }

    const ctx = extractLogContext(req);

    if (err instanceof NotFoundError) {
      req.log.warn({ ...ctx, detail: err.message }, "resource not found");
      return sendProblem(res, {
        type: "about:blank",
        title: "Resource Not Found",
        status: 404,
        detail: err.message,
      });
    }

    const clientStatus = clientErrorStatus(err);
    if (clientStatus !== null && err instanceof Error) {
      req.log.warn({ ...ctx, status: clientStatus, err }, "rejected request body");
      return sendProblem(res, {
        type: "about:blank",
        title: "Bad Request",
        status: clientStatus,
        detail: err.message,
      });
    }

    req.log.error({ ...ctx, err }, "unhandled error in request pipeline");
    return sendProblem(res, {
      type: "about:blank",
      title: UNEXPECTED_TITLE,
      status: 500,
      detail: opts.exposeDetails ? describe(err) : GENERIC_DETAIL,
    });
  };
}
