// backend/services/blog/src/mappers/comment.mapper.ts
import { Comment } from "../models/Comment";
import type { CommentRow } from "../models/schema";
import type {
  CommentRequestDto,
  CommentResponseDto,
} from "../contracts/comment";

export function commentFromRow(row: CommentRow): Comment {
  return new Comment({
    id: row.id,
    postId: row.postId,
    author: row.author,
    content: row.content,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  });
}

export function commentToRow(comment: Comment): CommentRow {
  return {
    id: comment.id,
    postId: comment.postId,
    author: comment.author,
    content: comment.content,
    createdAt: comment.createdAt,
    updatedAt: comment.updatedAt,
  };
}

/** New entity from a request: fresh id/timestamps, author from the caller. */
export function commentFromRequest(
  dto: CommentRequestDto,
  author: string
): Comment {
  return new Comment({ postId: dto.postId, content: dto.content, author });
}

export function toCommentResponse(comment: Comment): CommentResponseDto {
  return {
    id: comment.id,
    postId: comment.postId,
    author: comment.author,
    content: comment.content,
    createdAt: comment.createdAt.toISOString(),
  };
}
