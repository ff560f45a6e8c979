// backend/services/blog/src/controllers/comment/handlers/update.ts
import type { RequestHandler } from "express";
import { asyncHandler } from "@shared/middleware/asyncHandler";
import { respond, zodBadRequest } from "@shared/contracts/common";
import { NotFoundError } from "@shared/http/errors";
import { scopeOf } from "../../../scope";
import { zIdParam, zCommentRequest, zMessage } from "./schemas";

export const update: RequestHandler = asyncHandler(async (req, res) => {
  const params = zIdParam.safeParse(req.params);
  if (!params.success) return zodBadRequest(res, params.error);
  const body = zCommentRequest.safeParse(req.body);
  if (!body.success) return zodBadRequest(res, body.error);
  const { id } = params.data;

  const updated = await scopeOf(res).comments.update(id, body.data);
  if (!updated) throw new NotFoundError(`Comment with id: ${id} not found`);

  return respond(res, zMessage, { message: "Comment updated successfully" });
});
