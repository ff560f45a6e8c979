// backend/services/blog/src/controllers/post/handlers/findById.ts
import type { RequestHandler } from "express";
import { asyncHandler } from "@shared/middleware/asyncHandler";
import { respond, zodBadRequest } from "@shared/contracts/common";
import { NotFoundError } from "@shared/http/errors";
import { scopeOf } from "../../../scope";
import { toPostView } from "../../../mappers/post.mapper";
import { zIdParam, zPost } from "./schemas";

export const findById: RequestHandler = asyncHandler(async (req, res) => {
  const parsed = zIdParam.safeParse(req.params);
  if (!parsed.success) return zodBadRequest(res, parsed.error);
  const { id } = parsed.data;

  const post = await scopeOf(res).posts.getById(id);
  if (!post) throw new NotFoundError(`Post with id: ${id} not found`);

  return respond(res, zPost, toPostView(post));
});
