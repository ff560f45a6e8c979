// backend/services/blog/src/contracts/post.ts
import { z } from "zod";
import { zUuid, zIsoDateString } from "@shared/contracts/common";

export const POST_TITLE_REQUIRED = "Post title is required.";

/** Create/replace body. Client ids and timestamps are not part of it. */
export const zPostRequest = z.object({
  title: z
    .string({
      required_error: POST_TITLE_REQUIRED,
      invalid_type_error: POST_TITLE_REQUIRED,
    })
    .refine((v) => v.trim().length > 0, POST_TITLE_REQUIRED),
  content: z.string().default(""),
});
export type PostRequestDto = z.infer<typeof zPostRequest>;

/** Wire shape of a Post */
export const zPost = z.object({
  id: zUuid,
  title: z.string(),
  content: z.string(),
  createdAt: zIsoDateString,
  updatedAt: zIsoDateString,
});
export type PostView = z.infer<typeof zPost>;

export const zPostList = z.array(zPost);

export const zPostCreated = z.object({
  message: z.literal("Post added successfully"),
  id: zUuid,
});

export const zMessage = z.object({ message: z.string() });
