// backend/services/shared/http/errors.ts
import type { Response } from "express";
import { sendProblem } from "../contracts/common";

/**
 * Thrown where a lookup must produce 404 from deep inside a call chain.
 * The error middleware maps it to Problem+JSON with the message as `detail`.
 * Only this class yields 404; unrelated errors are never treated as not-found.
 */
export class NotFoundError extends Error {
  readonly status = 404;

  constructor(message: string) {
    super(message);
    this.name = "NotFoundError";
  }
}

export const badRequest = (res: Response, detail: string) =>
  sendProblem(res, {
    type: "about:blank",
    title: "Bad Request",
    status: 400,
    detail,
  });
