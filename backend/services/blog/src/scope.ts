// backend/services/blog/src/scope.ts
import type { RequestHandler, Response } from "express";
import type { Logger } from "@shared/utils/logger";
import type { BlogDatabase } from "./db";
import { PostRepository } from "./repo/postRepo";
import { CommentRepository } from "./repo/commentRepo";
import { PostService } from "./services/postService";
import { CommentService } from "./services/commentService";

/**
 * Per-request object graph. Built fresh for every request and bound to the
 * request's child logger; only the database handle is shared.
 */
export interface RequestScope {
  posts: PostService;
  comments: CommentService;
}

export type ScopeFactory = (log: Logger) => RequestScope;

export function createScopeFactory(db: BlogDatabase): ScopeFactory {
  return (log) => ({
    posts: new PostService(new PostRepository(db, log), log),
    comments: new CommentService(new CommentRepository(db, log), log),
  });
}

export function requestScope(factory: ScopeFactory): RequestHandler {
  return (req, res, next) => {
    res.locals.scope = factory(req.log);
    next();
  };
}

export function scopeOf(res: Response): RequestScope {
  const scope: RequestScope | undefined = res.locals.scope;
  if (!scope) throw new Error("request scope not initialized");
  return scope;
}
