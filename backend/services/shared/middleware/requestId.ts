// backend/services/shared/middleware/requestId.ts

/**
 * Request correlation.
 *
 * Notes:
 * - Never overwrite a caller-supplied ID. Mint a UUID only if the inbound
 *   request lacks all recognized headers.
 * - Headers honored: `x-request-id`, `x-correlation-id`, `x-amzn-trace-id`.
 *   The response always echoes `x-request-id`.
 * - pino-http stores the resolved value as `req.id`, so the logger, the
 *   problem+json formatter and the response header agree on one value.
 */

import type { IncomingHttpHeaders } from "node:http";
import { randomUUID } from "node:crypto";

export const REQUEST_ID_HEADERS = [
  "x-request-id",
  "x-correlation-id",
  "x-amzn-trace-id",
] as const;

export function resolveRequestId(headers: IncomingHttpHeaders): string {
  for (const name of REQUEST_ID_HEADERS) {
    const hdr = headers[name];
    const first = Array.isArray(hdr) ? hdr[0] : hdr;
    if (first && first.trim()) return first.trim();
  }
  return randomUUID();
}
