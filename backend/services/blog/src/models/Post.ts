// backend/services/blog/src/models/Post.ts
import { BaseEntity, type EntityInit } from "./BaseEntity";

export interface PostInit extends EntityInit {
  title?: string;
  content?: string;
}

export class Post extends BaseEntity {
  title: string;
  content: string;

  constructor(init: PostInit = {}) {
    super(init);
    this.title = init.title ?? "";
    this.content = init.content ?? "";
  }
}
