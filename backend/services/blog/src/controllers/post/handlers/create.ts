// backend/services/blog/src/controllers/post/handlers/create.ts
import type { RequestHandler } from "express";
import { asyncHandler } from "@shared/middleware/asyncHandler";
import { respond, zodBadRequest } from "@shared/contracts/common";
import { scopeOf } from "../../../scope";
import { zPostRequest, zPostCreated } from "./schemas";

export const create: RequestHandler = asyncHandler(async (req, res) => {
  const parsed = zPostRequest.safeParse(req.body);
  if (!parsed.success) return zodBadRequest(res, parsed.error);

  const post = await scopeOf(res).posts.add(parsed.data);

  return respond(res, zPostCreated, {
    message: "Post added successfully",
    id: post.id,
  });
});
