// backend/services/shared/env.ts

/**
 * Env loading by layer, deterministic precedence:
 *   1) repo root            → project-wide defaults
 *   2) service family dir   → defaults for every service under backend/services
 *   3) service root         → service-specific overrides
 * Within each layer the mode file (e.g. `.env.dev`) is tried first, then `.env`.
 * Later loads override earlier ones; variables already in the process env
 * override every file. `${VAR}` references expand across files.
 *
 * Production may run on injected env alone; other modes must find a file.
 */

import fs from "node:fs";
import path from "node:path";
import * as dotenv from "dotenv";
import { expand } from "dotenv-expand";

/** Find the first directory upward from `start` that contains any of the markers. */
function findRootWithMarkers(start: string, markers: string[]): string | null {
  let dir = path.resolve(start);
  for (;;) {
    for (const m of markers) {
      if (fs.existsSync(path.join(dir, m))) return dir;
    }
    const parent = path.dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

/** Parse a single env file if it exists. */
function readIfExists(absPath: string): Record<string, string> | null {
  if (!fs.existsSync(absPath)) return null;
  try {
    return dotenv.parse(fs.readFileSync(absPath));
  } catch (err) {
    throw new Error(`Failed to load env file: ${absPath}: ${String(err)}`);
  }
}

/** Candidate files in load order for a service rooted at `serviceRootAbs`. */
export function envCascade(serviceRootAbs: string, mode: string): string[] {
  const serviceRoot = path.resolve(serviceRootAbs);
  const serviceFamilyDir = path.dirname(serviceRoot);
  const repoRoot =
    findRootWithMarkers(serviceRoot, [".git", "package.json"]) ||
    path.resolve(serviceRoot, "..", "..", "..");

  const names = mode === "production" ? [".env"] : [`.env.${mode}`, ".env"];

  const candidates: string[] = [];
  for (const dir of [repoRoot, serviceFamilyDir, serviceRoot]) {
    // mode file wins over .env in the same layer, so load .env first
    for (const name of [...names].reverse()) {
      candidates.push(path.join(dir, name));
    }
  }
  return [...new Set(candidates)];
}

export function loadEnvCascadeForService(
  serviceRootAbs: string,
  opts: { allowMissingInProd?: boolean } = {}
): string[] {
  const mode = (process.env.NODE_ENV || "").trim();
  if (!mode)
    throw new Error("NODE_ENV is required (dev | test | production).");

  const candidates = envCascade(serviceRootAbs, mode);

  // Later files override earlier ones; injected env overrides every file.
  const merged: Record<string, string> = {};
  const loaded: string[] = [];
  for (const p of candidates) {
    const vars = readIfExists(p);
    if (!vars) continue;
    Object.assign(merged, vars);
    loaded.push(p);
  }
  const parsed: Record<string, string> = {};
  for (const [k, v] of Object.entries(merged)) {
    if (process.env[k] === undefined) parsed[k] = v;
  }
  expand({ parsed });

  const allowMissing =
    mode === "production" && (opts.allowMissingInProd ?? true);

  if (loaded.length === 0 && !allowMissing) {
    throw new Error(
      `No env files found for mode="${mode}". Looked in:\n` +
        candidates.map((p) => `  - ${p}`).join("\n")
    );
  }
  return loaded;
}

/** Fail fast when any required var is missing or blank. */
export function assertEnv(names: string[]): void {
  const missing = names.filter((n) => !(process.env[n] ?? "").trim());
  if (missing.length) {
    throw new Error(`Missing required env vars: ${missing.join(", ")}`);
  }
}
