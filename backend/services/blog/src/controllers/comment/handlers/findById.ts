// backend/services/blog/src/controllers/comment/handlers/findById.ts
import type { RequestHandler } from "express";
import { asyncHandler } from "@shared/middleware/asyncHandler";
import { respond, zodBadRequest } from "@shared/contracts/common";
import { NotFoundError } from "@shared/http/errors";
import { scopeOf } from "../../../scope";
import { zIdParam, zCommentResponse } from "./schemas";

export const findById: RequestHandler = asyncHandler(async (req, res) => {
  const parsed = zIdParam.safeParse(req.params);
  if (!parsed.success) return zodBadRequest(res, parsed.error);
  const { id } = parsed.data;

  const comment = await scopeOf(res).comments.getById(id);
  if (!comment) throw new NotFoundError(`Comment with id: ${id} not found`);

  return respond(res, zCommentResponse, comment);
});
