// backend/services/blog/src/types/express.d.ts
import type { RequestScope } from "../scope";

declare global {
  namespace Express {
    interface Request {
      /** Filled by an upstream auth layer, if any. */
      user?: { name?: string };
    }
    interface Locals {
      scope?: RequestScope;
    }
  }
}

export {};
