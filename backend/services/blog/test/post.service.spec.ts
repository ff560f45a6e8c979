// backend/services/blog/test/post.service.spec.ts
import { describe, it, expect, beforeAll, beforeEach, afterEach, afterAll, vi } from "vitest";
import { logger } from "@shared/utils/logger";
import type { DbHandle } from "../src/db";
import { PostRepository } from "../src/repo/postRepo";
import { PostService } from "../src/services/postService";
import { FailingPostRepository } from "./helpers/failingRepos";
import { MISSING_ID } from "./helpers/app";
import { openTestDatabase, wipeDatabase } from "./helpers/db";

let handle: DbHandle;
let service: PostService;

beforeAll(async () => {
  handle = await openTestDatabase();
  service = new PostService(new PostRepository(handle.db, logger), logger);
});

beforeEach(async () => {
  await wipeDatabase(handle);
});

afterEach(() => {
  vi.useRealTimers();
});

afterAll(async () => {
  await handle.close();
});

describe("PostService", () => {
  it("add assigns a fresh id and equal timestamps, then getById finds it", async () => {
    const created = await service.add({ title: "First", content: "Body" });

    expect(created.id).toMatch(/^[0-9a-f-]{36}$/);
    expect(created.updatedAt.getTime()).toBe(created.createdAt.getTime());

    const found = await service.getById(created.id);
    expect(found).not.toBeNull();
    expect(found?.title).toBe("First");
    expect(found?.content).toBe("Body");
    expect(found?.createdAt.toISOString()).toBe(created.createdAt.toISOString());
  });

  it("two adds never share an id", async () => {
    const a = await service.add({ title: "A", content: "" });
    const b = await service.add({ title: "B", content: "" });
    expect(a.id).not.toBe(b.id);
    expect(await service.list()).toHaveLength(2);
  });

  it("getById resolves null for an unknown id", async () => {
    expect(await service.getById(MISSING_ID)).toBeNull();
  });

  it("update of a missing post returns false and writes nothing", async () => {
    await service.add({ title: "Keep", content: "me" });

    expect(await service.update(MISSING_ID, { title: "X", content: "Y" })).toBe(false);

    const all = await service.list();
    expect(all.map((p) => p.title)).toEqual(["Keep"]);
  });

  it("update overlays title and content and refreshes updatedAt", async () => {
    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(new Date("2024-03-01T10:00:00.000Z"));
    const created = await service.add({ title: "Old", content: "old body" });

    vi.setSystemTime(new Date("2024-03-01T10:05:00.000Z"));
    expect(await service.update(created.id, { title: "New", content: "new body" })).toBe(true);

    const found = await service.getById(created.id);
    expect(found?.title).toBe("New");
    expect(found?.content).toBe("new body");
    expect(found?.createdAt.toISOString()).toBe("2024-03-01T10:00:00.000Z");
    expect(found?.updatedAt.toISOString()).toBe("2024-03-01T10:05:00.000Z");
  });

  it("delete returns true once, then false", async () => {
    const created = await service.add({ title: "Gone", content: "" });

    expect(await service.delete(created.id)).toBe(true);
    expect(await service.delete(created.id)).toBe(false);
    expect(await service.getById(created.id)).toBeNull();
  });

  it("logs and rethrows storage failures", async () => {
    const log = logger.child({ test: "post-failure" });
    const errorSpy = vi.spyOn(log, "error");
    const boom = new Error("disk I/O error");
    const failing = new PostService(new FailingPostRepository(boom), log);

    await expect(failing.list()).rejects.toBe(boom);
    await expect(failing.update(MISSING_ID, { title: "t", content: "" })).rejects.toBe(boom);

    expect(errorSpy).toHaveBeenCalledTimes(2);
    expect(errorSpy).toHaveBeenCalledWith({ err: boom }, "[PostService.list] failed");
  });
});
