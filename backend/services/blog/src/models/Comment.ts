// backend/services/blog/src/models/Comment.ts
import { BaseEntity, type EntityInit } from "./BaseEntity";

export interface CommentInit extends EntityInit {
  postId: string;
  author: string;
  content: string;
}

/**
 * `postId` references a Post by value only; nothing checks that the post exists.
 * `author` is set by the service from the caller, never from a request body.
 */
export class Comment extends BaseEntity {
  readonly postId: string;
  author: string;
  content: string;

  constructor(init: CommentInit) {
    super(init);
    this.postId = init.postId;
    this.author = init.author;
    this.content = init.content;
  }
}
