// backend/services/blog/src/config.ts

/**
 * Config:
 * - No dotenv loading here (bootstrap.ts loads env).
 * - No hardcoded defaults for required vars.
 * - Fails fast with the variable name when something is missing/invalid.
 */

export const SERVICE_NAME = "blog" as const;

export interface BlogConfig {
  env: string;
  isDevelopment: boolean;
  port: number;
  dbUrl: string;
  logLevel: string;
  logFsDir?: string;
}

function requireEnv(env: NodeJS.ProcessEnv, name: string): string {
  const v = env[name];
  if (v == null || String(v).trim() === "") {
    throw new Error(`Missing required env var: ${name}`);
  }
  return v.trim();
}

function requirePort(env: NodeJS.ProcessEnv, name: string): number {
  const raw = requireEnv(env, name);
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 0 || n > 65535) {
    throw new Error(`Invalid port for env var ${name}: "${raw}"`);
  }
  return n;
}

/** `dev` and `development` both count. */
export function isDevelopmentEnv(nodeEnv: string): boolean {
  const mode = nodeEnv.trim().toLowerCase();
  return mode === "dev" || mode === "development";
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): BlogConfig {
  const nodeEnv = requireEnv(env, "NODE_ENV");
  const logFsDir = (env.LOG_FS_DIR ?? "").trim();
  return {
    env: nodeEnv,
    isDevelopment: isDevelopmentEnv(nodeEnv),
    port: requirePort(env, "BLOG_PORT"),
    dbUrl: requireEnv(env, "BLOG_DB_URL"),
    logLevel: requireEnv(env, "LOG_LEVEL"),
    logFsDir: logFsDir || undefined,
  };
}
