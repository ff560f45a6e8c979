// backend/services/blog/src/controllers/comment/handlers/create.ts
import type { RequestHandler } from "express";
import { asyncHandler } from "@shared/middleware/asyncHandler";
import { respond, zodBadRequest } from "@shared/contracts/common";
import { scopeOf } from "../../../scope";
import { callerName } from "../../../auth/callerName";
import { zCommentRequest, zCommentCreated } from "./schemas";

export const create: RequestHandler = asyncHandler(async (req, res) => {
  const parsed = zCommentRequest.safeParse(req.body);
  if (!parsed.success) return zodBadRequest(res, parsed.error);

  const created = await scopeOf(res).comments.add(parsed.data, callerName(req));

  res.location(`${req.baseUrl}/${created.id}`);
  return respond(
    res,
    zCommentCreated,
    { message: "Comment added successfully", id: created.id },
    201
  );
});
