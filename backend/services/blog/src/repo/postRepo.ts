// backend/services/blog/src/repo/postRepo.ts
import { asc, eq } from "drizzle-orm";
import type { Logger } from "@shared/utils/logger";
import type { BlogDatabase } from "../db";
import { posts } from "../models/schema";
import type { Post } from "../models/Post";
import { postFromRow, postToRow } from "../mappers/post.mapper";

/**
 * Single round-trip CRUD. Returns entities only (no raw rows).
 * update/delete of a row that is gone are silent no-ops here;
 * services decide what "not found" means.
 */
export interface IPostRepository {
  getAll(): Promise<Post[]>;
  getById(id: string): Promise<Post | null>;
  add(post: Post): Promise<void>;
  update(post: Post): Promise<void>;
  delete(post: Post): Promise<void>;
}

export class PostRepository implements IPostRepository {
  constructor(
    private readonly db: BlogDatabase,
    private readonly log: Logger
  ) {}

  async getAll(): Promise<Post[]> {
    const rows = await this.db.select().from(posts).orderBy(asc(posts.createdAt));
    this.log.debug({ count: rows.length }, "[postRepo.getAll]");
    return rows.map(postFromRow);
  }

  async getById(id: string): Promise<Post | null> {
    const rows = await this.db.select().from(posts).where(eq(posts.id, id)).limit(1);
    const row = rows.at(0);
    return row ? postFromRow(row) : null;
  }

  async add(post: Post): Promise<void> {
    await this.db.insert(posts).values(postToRow(post));
    this.log.debug({ postId: post.id }, "[postRepo.add]");
  }

  async update(post: Post): Promise<void> {
    await this.db
      .update(posts)
      .set({
        title: post.title,
        content: post.content,
        updatedAt: post.updatedAt,
      })
      .where(eq(posts.id, post.id));
    this.log.debug({ postId: post.id }, "[postRepo.update]");
  }

  async delete(post: Post): Promise<void> {
    await this.db.delete(posts).where(eq(posts.id, post.id));
    this.log.debug({ postId: post.id }, "[postRepo.delete]");
  }
}
