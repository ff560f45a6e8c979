// backend/services/blog/src/auth/callerName.ts
import type { Request } from "express";

export const ANONYMOUS_AUTHOR = "Anonymous/System User";

/** Placeholder identity: whatever an upstream layer put on req.user. */
export function callerName(req: Request): string {
  const name = req.user?.name?.trim();
  return name ? name : ANONYMOUS_AUTHOR;
}
