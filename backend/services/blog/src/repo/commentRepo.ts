// backend/services/blog/src/repo/commentRepo.ts
import { asc, eq } from "drizzle-orm";
import type { Logger } from "@shared/utils/logger";
import type { BlogDatabase } from "../db";
import { comments } from "../models/schema";
import type { Comment } from "../models/Comment";
import { commentFromRow, commentToRow } from "../mappers/comment.mapper";

/** Same contract as IPostRepository; getById resolves null when nothing matches. */
export interface ICommentRepository {
  getAll(): Promise<Comment[]>;
  getById(id: string): Promise<Comment | null>;
  add(comment: Comment): Promise<void>;
  update(comment: Comment): Promise<void>;
  delete(comment: Comment): Promise<void>;
}

export class CommentRepository implements ICommentRepository {
  constructor(
    private readonly db: BlogDatabase,
    private readonly log: Logger
  ) {}

  async getAll(): Promise<Comment[]> {
    const rows = await this.db
      .select()
      .from(comments)
      .orderBy(asc(comments.createdAt));
    this.log.debug({ count: rows.length }, "[commentRepo.getAll]");
    return rows.map(commentFromRow);
  }

  async getById(id: string): Promise<Comment | null> {
    const rows = await this.db
      .select()
      .from(comments)
      .where(eq(comments.id, id))
      .limit(1);
    const row = rows.at(0);
    return row ? commentFromRow(row) : null;
  }

  async add(comment: Comment): Promise<void> {
    await this.db.insert(comments).values(commentToRow(comment));
    this.log.debug({ commentId: comment.id }, "[commentRepo.add]");
  }

  // postId is immutable; only the editable columns are written
  async update(comment: Comment): Promise<void> {
    await this.db
      .update(comments)
      .set({
        author: comment.author,
        content: comment.content,
        updatedAt: comment.updatedAt,
      })
      .where(eq(comments.id, comment.id));
    this.log.debug({ commentId: comment.id }, "[commentRepo.update]");
  }

  async delete(comment: Comment): Promise<void> {
    await this.db.delete(comments).where(eq(comments.id, comment.id));
    this.log.debug({ commentId: comment.id }, "[commentRepo.delete]");
  }
}
