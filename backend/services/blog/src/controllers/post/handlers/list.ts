// backend/services/blog/src/controllers/post/handlers/list.ts
import type { RequestHandler } from "express";
import { asyncHandler } from "@shared/middleware/asyncHandler";
import { respond } from "@shared/contracts/common";
import { scopeOf } from "../../../scope";
import { toPostView } from "../../../mappers/post.mapper";
import { zPostList } from "./schemas";

export const list: RequestHandler = asyncHandler(async (_req, res) => {
  const posts = await scopeOf(res).posts.list();
  return respond(res, zPostList, posts.map(toPostView));
});
