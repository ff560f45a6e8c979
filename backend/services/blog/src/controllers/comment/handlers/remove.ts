// backend/services/blog/src/controllers/comment/handlers/remove.ts
import type { RequestHandler } from "express";
import { asyncHandler } from "@shared/middleware/asyncHandler";
import { zodBadRequest } from "@shared/contracts/common";
import { NotFoundError } from "@shared/http/errors";
import { scopeOf } from "../../../scope";
import { zIdParam } from "./schemas";

export const remove: RequestHandler = asyncHandler(async (req, res) => {
  const parsed = zIdParam.safeParse(req.params);
  if (!parsed.success) return zodBadRequest(res, parsed.error);
  const { id } = parsed.data;

  const deleted = await scopeOf(res).comments.delete(id);
  if (!deleted) throw new NotFoundError(`Comment with id: ${id} not found`);

  res.status(204).send();
});
