// backend/services/blog/src/contracts/comment.ts
import { z } from "zod";
import {
  NIL_UUID,
  UUID_RE,
  zUuid,
  zIsoDateString,
} from "@shared/contracts/common";

export const COMMENT_MIN_LENGTH = 5;
export const COMMENT_MAX_LENGTH = 500;

export const POST_ID_REQUIRED = "PostId is required and cannot be an empty GUID.";
export const POST_ID_INVALID = "PostId must be a valid GUID.";
export const CONTENT_REQUIRED = "Comment content is required.";
export const CONTENT_TOO_SHORT = "Comment content too short.";
export const CONTENT_TOO_LONG = "Comment limit exceeded.";

const zPostId = z
  .string({ required_error: POST_ID_REQUIRED, invalid_type_error: POST_ID_REQUIRED })
  .regex(UUID_RE, POST_ID_INVALID)
  .refine((v) => v !== NIL_UUID, POST_ID_REQUIRED)
  .transform((v) => v.toLowerCase());

/**
 * Bounds apply to the trimmed length; the stored content is the string as sent.
 */
const zCommentContent = z
  .string({ required_error: CONTENT_REQUIRED, invalid_type_error: CONTENT_REQUIRED })
  .superRefine((v, ctx) => {
    const length = v.trim().length;
    if (length === 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: CONTENT_REQUIRED });
      return;
    }
    if (length < COMMENT_MIN_LENGTH) {
      ctx.addIssue({
        code: z.ZodIssueCode.too_small,
        minimum: COMMENT_MIN_LENGTH,
        inclusive: true,
        type: "string",
        message: CONTENT_TOO_SHORT,
      });
    } else if (length > COMMENT_MAX_LENGTH) {
      ctx.addIssue({
        code: z.ZodIssueCode.too_big,
        maximum: COMMENT_MAX_LENGTH,
        inclusive: true,
        type: "string",
        message: CONTENT_TOO_LONG,
      });
    }
  });

/** Write-only body. `author`, ids and timestamps are never read from it. */
export const zCommentRequest = z.object({
  postId: zPostId,
  content: zCommentContent,
});
export type CommentRequestDto = z.infer<typeof zCommentRequest>;

/** Read shape; omits updatedAt */
export const zCommentResponse = z.object({
  id: zUuid,
  postId: zUuid,
  author: z.string(),
  content: z.string(),
  createdAt: zIsoDateString,
});
export type CommentResponseDto = z.infer<typeof zCommentResponse>;

export const zCommentList = z.array(zCommentResponse);

export const zCommentCreated = z.object({
  message: z.literal("Comment added successfully"),
  id: zUuid,
});
