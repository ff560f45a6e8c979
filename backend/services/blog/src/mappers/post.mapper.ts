// backend/services/blog/src/mappers/post.mapper.ts
import { Post } from "../models/Post";
import type { PostRow } from "../models/schema";
import type { PostRequestDto, PostView } from "../contracts/post";

/**
 * Row ↔ entity ↔ wire. Keep thin; no business logic here.
 */

export function postFromRow(row: PostRow): Post {
  return new Post({
    id: row.id,
    title: row.title,
    content: row.content,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  });
}

export function postToRow(post: Post): PostRow {
  return {
    id: post.id,
    title: post.title,
    content: post.content,
    createdAt: post.createdAt,
    updatedAt: post.updatedAt,
  };
}

export function postFromRequest(dto: PostRequestDto): Post {
  return new Post({ title: dto.title, content: dto.content });
}

export function toPostView(post: Post): PostView {
  return {
    id: post.id,
    title: post.title,
    content: post.content,
    createdAt: post.createdAt.toISOString(),
    updatedAt: post.updatedAt.toISOString(),
  };
}
