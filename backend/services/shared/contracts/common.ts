// backend/services/shared/contracts/common.ts
import { z, type ZodError } from "zod";
import type { Request, Response } from "express";

/** The all-zero UUID; parses as a UUID but never names a real row */
export const NIL_UUID = "00000000-0000-0000-0000-000000000000";

/** Canonical 8-4-4-4-12 hex UUID (any version) */
export const UUID_RE =
  /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/** Ids compare case-insensitively; everything past validation sees lower case */
export const zUuid = z
  .string()
  .regex(UUID_RE, "Expected UUID")
  .transform((s) => s.toLowerCase());

/** Route param `:id` */
export const zIdParam = z.object({ id: zUuid });

/** Dates go out as ISO 8601 UTC strings */
export const zIsoDateString = z.string().datetime();

/** RFC 7807 Problem+JSON */
export const zProblem = z.object({
  type: z.string().default("about:blank"),
  title: z.string(),
  status: z.number().int(),
  detail: z.string().optional(),
  instance: z.string().optional(),
  requestId: z.string().optional(),
  // app-specific extras (optional)
  code: z.string().optional(),
  errors: z
    .array(z.object({ path: z.string(), code: z.string(), message: z.string() }))
    .optional(),
});
export type Problem = z.infer<typeof zProblem>;

/** Path portion of the URL the client asked for (no query string) */
export function requestPath(req: Request): string {
  const url = req.originalUrl || req.url || "";
  const q = url.indexOf("?");
  return q === -1 ? url : url.slice(0, q);
}

export function requestIdOf(req: Request): string | undefined {
  return typeof req.id === "string" ? req.id : undefined;
}

/** Write a Problem+JSON body; `instance` and `requestId` come from the request */
export function sendProblem(res: Response, problem: Problem) {
  return res
    .status(problem.status)
    .type("application/problem+json")
    .json(
      clean({
        ...problem,
        instance: problem.instance ?? requestPath(res.req),
        requestId: problem.requestId ?? requestIdOf(res.req),
      })
    );
}

/** Problem+JSON helper for Zod validation errors */
export function zodBadRequest(res: Response, error: ZodError) {
  const errors = error.issues.map((i) => ({
    path: i.path.join("."),
    code: i.code,
    message: i.message,
  }));
  return sendProblem(res, {
    type: "about:blank",
    title: "Bad Request",
    status: 400,
    code: "VALIDATION_ERROR",
    detail: "Validation failed",
    errors,
  });
}

/** Strip undefined (stable wire format) */
export function clean(obj: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(obj)) {
    if (v !== undefined) out[k] = v;
  }
  return out;
}

/** Output guard: validate payload before sending */
export function respond<T extends z.ZodTypeAny>(
  res: Response,
  schema: T,
  payload: unknown,
  status = 200
) {
  const out = schema.parse(payload);
  return res.status(status).json(out);
}
