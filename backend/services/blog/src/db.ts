// backend/services/blog/src/db.ts
import fs from "node:fs";
import path from "node:path";
import { PGlite } from "@electric-sql/pglite";
import { drizzle, type PgliteDatabase } from "drizzle-orm/pglite";
import type { Logger } from "@shared/utils/logger";
import * as schema from "./models/schema";

export type BlogDatabase = PgliteDatabase<typeof schema>;

export interface DbHandle {
  db: BlogDatabase;
  /** Readiness probe: one round trip to the store. */
  ping: () => Promise<{ db: "ok" }>;
  close: () => Promise<void>;
}

const SCHEMA_FILE = path.resolve(__dirname, "..", "sql", "001_init.sql");

/**
 * Accepts `file:<dir>`, a bare data directory, or `:memory:` / `memory://`.
 * Returns null for an in-memory database.
 */
export function resolveDataDir(url: string): string | null {
  const trimmed = url.trim();
  if (trimmed === ":memory:" || trimmed === "memory://") return null;
  const dir = trimmed.startsWith("file:") ? trimmed.slice("file:".length) : trimmed;
  if (!dir) throw new Error(`Invalid BLOG_DB_URL: "${url}"`);
  return dir;
}

export async function openDatabase(url: string, log: Logger): Promise<DbHandle> {
  const dataDir = resolveDataDir(url);
  const where = dataDir ?? "memory";
  try {
    if (dataDir) fs.mkdirSync(path.resolve(dataDir), { recursive: true });
    const client = dataDir ? new PGlite(dataDir) : new PGlite();
    await client.waitReady;
    await client.exec(fs.readFileSync(SCHEMA_FILE, "utf8"));

    const db = drizzle(client, { schema });
    log.info({ component: "pglite", dataDir: where }, "[PGlite-blog] Connected");

    return {
      db,
      ping: async () => {
        await client.query("SELECT 1");
        return { db: "ok" };
      },
      close: async () => {
        if (!client.closed) await client.close();
      },
    };
  } catch (err) {
    log.error(
      {
        component: "pglite",
        dataDir: where,
        error: err instanceof Error ? err.message : String(err),
      },
      "[PGlite-blog] Connection error"
    );
    throw err;
  }
}
