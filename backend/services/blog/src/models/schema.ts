// backend/services/blog/src/models/schema.ts
import { pgTable, uuid, text, timestamp, index } from "drizzle-orm/pg-core";

/**
 * Table definitions. Must match sql/001_init.sql, which creates them.
 * Timestamps keep millisecond precision so they round-trip a JS Date exactly.
 */

const stamp = (name: string) =>
  timestamp(name, { withTimezone: true, precision: 3, mode: "date" }).notNull();

export const posts = pgTable("posts", {
  id: uuid("id").primaryKey(),
  title: text("title").notNull(),
  content: text("content").notNull(),
  createdAt: stamp("created_at"),
  updatedAt: stamp("updated_at"),
});

export const comments = pgTable(
  "comments",
  {
    id: uuid("id").primaryKey(),
    postId: uuid("post_id").notNull(),
    author: text("author").notNull(),
    content: text("content").notNull(),
    createdAt: stamp("created_at"),
    updatedAt: stamp("updated_at"),
  },
  (t) => ({
    postIdIdx: index("ix_comments_post_id").on(t.postId),
  })
);

export type PostRow = typeof posts.$inferSelect;
export type CommentRow = typeof comments.$inferSelect;
