// backend/services/blog/src/controllers/post/handlers/update.ts
import type { RequestHandler } from "express";
import { asyncHandler } from "@shared/middleware/asyncHandler";
import { respond, zodBadRequest } from "@shared/contracts/common";
import { badRequest } from "@shared/http/errors";
import { scopeOf } from "../../../scope";
import { zIdParam, zPostRequest, zMessage } from "./schemas";

/** Full overlay of title/content. A missing post is a 400 on this route. */
export const update: RequestHandler = asyncHandler(async (req, res) => {
  const params = zIdParam.safeParse(req.params);
  if (!params.success) return zodBadRequest(res, params.error);
  const body = zPostRequest.safeParse(req.body);
  if (!body.success) return zodBadRequest(res, body.error);
  const { id } = params.data;

  const updated = await scopeOf(res).posts.update(id, body.data);
  if (!updated) return badRequest(res, `Post with id: ${id} not found`);

  return respond(res, zMessage, { message: "Post updated successfully" });
});
