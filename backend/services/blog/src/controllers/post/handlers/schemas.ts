// backend/services/blog/src/controllers/post/handlers/schemas.ts
/**
 * Localized schema imports for handlers.
 * (No export *; explicit named exports only.)
 */
export { zIdParam } from "@shared/contracts/common";
export {
  zPostRequest,
  zPost,
  zPostList,
  zPostCreated,
  zMessage,
} from "../../../contracts/post";
