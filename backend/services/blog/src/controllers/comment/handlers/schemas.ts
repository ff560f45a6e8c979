// backend/services/blog/src/controllers/comment/handlers/schemas.ts
/**
 * Localized schema imports for handlers.
 * (No export *; explicit named exports only.)
 */
export { zIdParam } from "@shared/contracts/common";
export {
  zCommentRequest,
  zCommentResponse,
  zCommentList,
  zCommentCreated,
} from "../../../contracts/comment";
export { zMessage } from "../../../contracts/post";
