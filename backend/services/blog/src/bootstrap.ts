// backend/services/blog/src/bootstrap.ts
/**
 * Load envs via the shared cascade (repo → family → service) and assert
 * the minimum required variables before anything reads them.
 */

import path from "node:path";
import { loadEnvCascadeForService, assertEnv } from "@shared/env";

export { SERVICE_NAME } from "./config";

// 1) Shared env cascade (later wins; injected env wins over files)
loadEnvCascadeForService(path.resolve(__dirname, ".."));

// 2) Fail fast on required envs
assertEnv(["NODE_ENV", "LOG_LEVEL", "BLOG_PORT", "BLOG_DB_URL"]);
