// backend/services/blog/src/controllers/post/handlers/remove.ts
import type { RequestHandler } from "express";
import { asyncHandler } from "@shared/middleware/asyncHandler";
import { respond, zodBadRequest } from "@shared/contracts/common";
import { badRequest } from "@shared/http/errors";
import { scopeOf } from "../../../scope";
import { zIdParam, zMessage } from "./schemas";

export const remove: RequestHandler = asyncHandler(async (req, res) => {
  const parsed = zIdParam.safeParse(req.params);
  if (!parsed.success) return zodBadRequest(res, parsed.error);
  const { id } = parsed.data;

  const deleted = await scopeOf(res).posts.delete(id);
  if (!deleted) return badRequest(res, `Post with id: ${id} not found`);

  return respond(res, zMessage, { message: "Post deleted successfully" });
});
