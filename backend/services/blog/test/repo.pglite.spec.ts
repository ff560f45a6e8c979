// backend/services/blog/test/repo.pglite.spec.ts
import { describe, it, expect, beforeAll, beforeEach, afterAll } from "vitest";
import { logger } from "@shared/utils/logger";
import { resolveDataDir, type DbHandle } from "../src/db";
import { PostRepository } from "../src/repo/postRepo";
import { CommentRepository } from "../src/repo/commentRepo";
import { Post } from "../src/models/Post";
import { Comment } from "../src/models/Comment";
import { POST_ID } from "./helpers/app";
import { openTestDatabase, wipeDatabase } from "./helpers/db";

let handle: DbHandle;
let postRepo: PostRepository;
let commentRepo: CommentRepository;

beforeAll(async () => {
  handle = await openTestDatabase();
  postRepo = new PostRepository(handle.db, logger);
  commentRepo = new CommentRepository(handle.db, logger);
});

beforeEach(async () => {
  await wipeDatabase(handle);
});

afterAll(async () => {
  await handle.close();
});

describe("resolveDataDir", () => {
  it("understands file: urls, bare directories and in-memory urls", () => {
    expect(resolveDataDir("file:./var/blog-pgdata")).toBe("./var/blog-pgdata");
    expect(resolveDataDir("/tmp/blog-pgdata")).toBe("/tmp/blog-pgdata");
    expect(resolveDataDir(":memory:")).toBeNull();
    expect(resolveDataDir("memory://")).toBeNull();
  });

  it("rejects an empty file: url", () => {
    expect(() => resolveDataDir("file:")).toThrow('Invalid BLOG_DB_URL: "file:"');
  });
});

describe("PostRepository (pglite)", () => {
  it("round-trips every column with millisecond timestamps", async () => {
    const post = new Post({
      title: "Round trip",
      content: "All the columns",
      createdAt: new Date("2024-01-02T03:04:05.678Z"),
    });
    await postRepo.add(post);

    const found = await postRepo.getById(post.id);
    expect(found).toBeInstanceOf(Post);
    expect(found?.id).toBe(post.id);
    expect(found?.title).toBe("Round trip");
    expect(found?.content).toBe("All the columns");
    expect(found?.createdAt.toISOString()).toBe("2024-01-02T03:04:05.678Z");
    expect(found?.updatedAt.toISOString()).toBe("2024-01-02T03:04:05.678Z");
  });

  it("lists oldest first", async () => {
    await postRepo.add(new Post({ title: "later", createdAt: new Date(2_000) }));
    await postRepo.add(new Post({ title: "earlier", createdAt: new Date(1_000) }));

    const all = await postRepo.getAll();
    expect(all.map((p) => p.title)).toEqual(["earlier", "later"]);
  });

  it("update and delete of a row that is gone are silent no-ops", async () => {
    const ghost = new Post({ title: "never stored" });

    await expect(postRepo.update(ghost)).resolves.toBeUndefined();
    await expect(postRepo.delete(ghost)).resolves.toBeUndefined();
    expect(await postRepo.getAll()).toEqual([]);
  });

  it("persists updates immediately", async () => {
    const post = new Post({ title: "v1", createdAt: new Date(1_000) });
    await postRepo.add(post);

    post.title = "v2";
    post.touch(new Date(5_000));
    await postRepo.update(post);

    const found = await postRepo.getById(post.id);
    expect(found?.title).toBe("v2");
    expect(found?.updatedAt.getTime()).toBe(5_000);
    expect(found?.createdAt.getTime()).toBe(1_000);
  });
});

describe("CommentRepository (pglite)", () => {
  it("stores comments for posts that do not exist", async () => {
    const comment = new Comment({ postId: POST_ID, author: "Ada", content: "orphan ok" });
    await commentRepo.add(comment);

    const found = await commentRepo.getById(comment.id);
    expect(found).toBeInstanceOf(Comment);
    expect(found?.postId).toBe(POST_ID);
    expect(found?.author).toBe("Ada");
  });

  it("getById resolves null when nothing matches", async () => {
    expect(await commentRepo.getById(POST_ID)).toBeNull();
  });

  it("deleting a post leaves its comments in place", async () => {
    const post = new Post({ title: "parent" });
    await postRepo.add(post);
    const comment = new Comment({ postId: post.id, author: "Ada", content: "still here" });
    await commentRepo.add(comment);

    await postRepo.delete(post);

    expect(await commentRepo.getAll()).toHaveLength(1);
  });
});
