// backend/services/blog/test/errors.http.spec.ts
import request from "supertest";
import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { zProblem } from "@shared/contracts/common";
import { PostService } from "../src/services/postService";
import { CommentService } from "../src/services/commentService";
import type { ScopeFactory } from "../src/scope";
import { OPENAPI_PATH } from "../src/app";
import { FailingPostRepository, FailingCommentRepository } from "./helpers/failingRepos";
import type { DbHandle } from "../src/db";
import { makeTestApp } from "./helpers/app";
import { openTestDatabase } from "./helpers/db";

const GENERIC =
  "The server encountered an error. Please try again or contact support.";

function failingScope(message: string): ScopeFactory {
  const boom = new Error(message);
  return (log) => ({
    posts: new PostService(new FailingPostRepository(boom), log),
    comments: new CommentService(new FailingCommentRepository(boom), log),
  });
}

let handle: DbHandle;

beforeAll(async () => {
  handle = await openTestDatabase();
});

afterAll(async () => {
  await handle.close();
});

describe("unhandled errors", () => {
  it("storage failure → 500 with the generic detail outside development", async () => {
    const app = makeTestApp(handle, { scopeFactory: failingScope("disk I/O error") });

    const r = await request(app).get("/api/post").expect(500);

    expect(r.headers["content-type"]).toMatch(/^application\/problem\+json/);
    const prob = zProblem.parse(r.body);
    expect(prob.title).toBe("An unexpected error occurred.");
    expect(prob.status).toBe(500);
    expect(prob.detail).toBe(GENERIC);
    expect(prob.instance).toBe("/api/post");
  });

  it("storage failure in development → 500 carrying the error description", async () => {
    const app = makeTestApp(handle, {
      scopeFactory: failingScope("disk I/O error"),
      isDevelopment: true,
    });

    const r = await request(app)
      .post("/api/comment")
      .send({
        postId: "7a9e1b2c-3d4f-4a5b-8c6d-9e0f1a2b3c4d",
        content: "will not be saved",
      })
      .expect(500);

    const prob = zProblem.parse(r.body);
    expect(prob.title).toBe("An unexpected error occurred.");
    expect(prob.detail).toMatch(/^Error: disk I\/O error/);
    expect(prob.instance).toBe("/api/comment");
  });

  it("instance is the path without the query string", async () => {
    const app = makeTestApp(handle, { scopeFactory: failingScope("gone") });
    const r = await request(app).get("/api/comment?verbose=1").expect(500);
    expect(zProblem.parse(r.body).instance).toBe("/api/comment");
  });
});

describe("transport errors", () => {
  it("malformed JSON → 400 problem", async () => {
    const app = makeTestApp(handle);
    const r = await request(app)
      .post("/api/post")
      .set("Content-Type", "application/json")
      .send('{"title":')
      .expect(400);

    const prob = zProblem.parse(r.body);
    expect(prob.title).toBe("Bad Request");
    expect(prob.status).toBe(400);
  });

  it("unknown API route → 404 problem", async () => {
    const app = makeTestApp(handle);
    const r = await request(app).get("/api/tags").expect(404);
    const prob = zProblem.parse(r.body);
    expect(prob.title).toBe("Not Found");
    expect(prob.detail).toBe("Route not found");
  });

  it("echoes a caller-supplied request id into header and problem body", async () => {
    const app = makeTestApp(handle);
    const r = await request(app)
      .get("/api/post/not-a-uuid")
      .set("x-request-id", "req-test-1")
      .expect(400);

    expect(r.headers["x-request-id"]).toBe("req-test-1");
    expect(zProblem.parse(r.body).requestId).toBe("req-test-1");
  });

  it("mints a request id when none is supplied", async () => {
    const app = makeTestApp(handle);
    const r = await request(app).get("/api/post").expect(200);
    expect(r.headers["x-request-id"]).toMatch(/^[0-9a-f-]{36}$/);
  });
});

describe("health", () => {
  it("liveness answers without touching the store", async () => {
    const app = makeTestApp(handle, { scopeFactory: failingScope("unused") });
    const r = await request(app).get("/health/live").expect(200);
    expect(r.body.ok).toBe(true);
    expect(r.body.service).toBe("blog");
  });

  it("readiness pings the database", async () => {
    const app = makeTestApp(handle);
    const r = await request(app).get("/readyz").expect(200);
    expect(r.body.ok).toBe(true);
    expect(r.body.db).toBe("ok");
  });

  it("readiness → 503 once the database is closed", async () => {
    const own = await openTestDatabase();
    const app = makeTestApp(own);
    await own.close();
    const r = await request(app).get("/health/ready").expect(503);
    expect(r.body.ok).toBe(false);
  });
});

describe("OpenAPI document", () => {
  it("is served in development", async () => {
    const app = makeTestApp(handle, { isDevelopment: true });
    const r = await request(app).get(OPENAPI_PATH).expect(200);
    expect(r.body.openapi).toBe("3.0.3");
    expect(Object.keys(r.body.paths)).toEqual([
      "/api/post",
      "/api/post/{id}",
      "/api/comment",
      "/api/comment/{id}",
    ]);
  });

  it("is not mounted otherwise", async () => {
    const app = makeTestApp(handle);
    await request(app).get(OPENAPI_PATH).expect(404);
  });
});
