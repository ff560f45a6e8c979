// backend/services/blog/src/controllers/comment/handlers/list.ts
import type { RequestHandler } from "express";
import { asyncHandler } from "@shared/middleware/asyncHandler";
import { respond } from "@shared/contracts/common";
import { scopeOf } from "../../../scope";
import { zCommentList } from "./schemas";

export const list: RequestHandler = asyncHandler(async (_req, res) => {
  const comments = await scopeOf(res).comments.list();
  return respond(res, zCommentList, comments);
});
