// backend/services/shared/utils/logger.test.ts
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { createLogger, dayStr, initLogger } from "./logger";

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "log-fs-"));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

function readLines(file: string): Array<Record<string, unknown>> {
  return fs
    .readFileSync(path.join(dir, file), "utf8")
    .split("\n")
    .filter((line) => line !== "")
    .map((line) => JSON.parse(line));
}

describe("dayStr", () => {
  it("uses the UTC calendar date", () => {
    expect(dayStr(new Date("2024-06-01T23:59:59.999Z"))).toBe("2024-06-01");
    expect(dayStr(new Date("2024-06-02T00:00:00.000Z"))).toBe("2024-06-02");
  });
});

describe("file sink", () => {
  it("writes NDJSON lines to <service>-YYYY-MM-DD.log and rolls at midnight UTC", () => {
    let now = new Date("2024-06-01T23:59:00.000Z");
    const log = createLogger({
      level: "info",
      service: "blog",
      fsDir: dir,
      clock: () => now,
      sync: true,
    });

    log.info({ postId: "p-1" }, "before midnight");
    log.debug("below the level");
    now = new Date("2024-06-02T00:01:00.000Z");
    log.warn("after midnight");

    expect(fs.readdirSync(dir).sort()).toEqual([
      "blog-2024-06-01.log",
      "blog-2024-06-02.log",
    ]);

    const first = readLines("blog-2024-06-01.log");
    expect(first).toHaveLength(1);
    expect(first[0]).toMatchObject({
      level: 30,
      service: "blog",
      postId: "p-1",
      msg: "before midnight",
    });

    const second = readLines("blog-2024-06-02.log");
    expect(second).toHaveLength(1);
    expect(second[0]).toMatchObject({ level: 40, service: "blog", msg: "after midnight" });
  });

  it("opens no file when the level is silent", () => {
    const log = createLogger({ level: "silent", service: "blog", fsDir: dir, sync: true });
    log.error("dropped");
    expect(fs.readdirSync(dir)).toEqual([]);
  });
});

describe("initLogger", () => {
  it("rejects a level pino does not know", () => {
    expect(() => initLogger("blog", { level: "loud" })).toThrow('Invalid LOG_LEVEL: "loud"');
  });

  it("requires a service name", () => {
    expect(() => initLogger("  ", { level: "info" })).toThrow("initLogger requires serviceName");
  });
});
