// backend/services/shared/utils/logger.ts
import type { Request } from "express";
import pino, {
  type DestinationStream,
  type Logger,
  type LoggerOptions,
  type LevelWithSilent,
  stdTimeFunctions,
} from "pino";
import path from "node:path";

/**
 * Shared Logger (authoritative)
 *
 * Each service MUST call `initLogger(SERVICE_NAME)` at bootstrap
 * BEFORE creating any request loggers (pino-http).
 *
 * Sinks:
 *   - stdout (always)
 *   - NDJSON file `<LOG_FS_DIR>/<service>-YYYY-MM-DD.log` (UTC date, rolls at
 *     midnight UTC) once initLogger() runs with a directory
 */

// ─────────────────────────── Env (fail fast for required) ─────────────────────
function requireEnv(name: string): string {
  const v = process.env[name];
  if (!v || v.trim() === "")
    throw new Error(`Missing required env var: ${name}`);
  return v.trim();
}

const validLevels = new Set<string>([
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
]);

function isLevel(v: string): v is LevelWithSilent {
  return validLevels.has(v);
}

function parseLevel(raw: string): LevelWithSilent {
  const v = raw.trim();
  if (!isLevel(v)) throw new Error(`Invalid LOG_LEVEL: "${raw}"`);
  return v;
}

// Start with NO base.service; initLogger() recreates the logger with it set.
let SERVICE_NAME = "";

const pinoOptions: LoggerOptions = {
  base: {},
  timestamp: stdTimeFunctions.isoTime,
  redact: {
    remove: true,
    paths: ["req.headers.authorization", "req.headers.cookie"],
  },
};

// ────────────────────────────── Daily file sink ───────────────────────────────
/** YYYY-MM-DD in UTC. */
export function dayStr(d: Date): string {
  return `${d.getUTCFullYear()}-${String(d.getUTCMonth() + 1).padStart(
    2,
    "0"
  )}-${String(d.getUTCDate()).padStart(2, "0")}`;
}

export interface DailyFileOptions {
  dir: string;
  service: string;
  clock?: () => Date;
  sync?: boolean;
}

type FileDestination = ReturnType<typeof pino.destination>;

/**
 * NDJSON into `<dir>/<service>-YYYY-MM-DD.log`. The date is checked on every
 * write; when it changes the old file is ended and the next one opened.
 */
export function dailyFileStream(opts: DailyFileOptions): DestinationStream {
  const clock = opts.clock ?? (() => new Date());
  let day = "";
  let current: FileDestination | undefined;

  return {
    write(msg: string): void {
      const today = dayStr(clock());
      if (!current || today !== day) {
        current?.end();
        current = pino.destination({
          dest: path.join(opts.dir, `${opts.service}-${today}.log`),
          mkdir: true,
          sync: opts.sync ?? false,
        });
        day = today;
      }
      current.write(msg);
    },
  };
}

// ────────────────────────────── Pino init ─────────────────────────────────────
export interface LoggerSettings {
  level: string;
  service?: string;
  /** Also write the daily NDJSON file here; stdout only when empty. */
  fsDir?: string;
  clock?: () => Date;
  sync?: boolean;
}

export function createLogger(settings: LoggerSettings): Logger {
  const level = parseLevel(settings.level);
  const service = (settings.service ?? "").trim();
  const options: LoggerOptions = {
    ...pinoOptions,
    level,
    base: service ? { service } : {},
  };

  const fsDir = (settings.fsDir ?? "").trim();
  if (!fsDir || level === "silent") return pino(options);

  return pino(
    options,
    pino.multistream([
      { level, stream: process.stdout },
      {
        level,
        stream: dailyFileStream({
          dir: fsDir,
          service: service || "service",
          clock: settings.clock,
          sync: settings.sync,
        }),
      },
    ])
  );
}

export let logger: Logger = createLogger({ level: requireEnv("LOG_LEVEL") });

/**
 * Initialize the shared logger for this running service. Call once at bootstrap.
 * Level and file directory fall back to LOG_LEVEL / LOG_FS_DIR.
 */
export function initLogger(
  serviceName: string,
  opts: { level?: string; fsDir?: string } = {}
): void {
  const name = String(serviceName || "").trim();
  if (!name) throw new Error("initLogger requires serviceName");
  logger = createLogger({
    level: opts.level ?? requireEnv("LOG_LEVEL"),
    service: name,
    fsDir: opts.fsDir ?? process.env.LOG_FS_DIR,
  });
  SERVICE_NAME = name;
}

// ───────────────────────────── Request context helper ─────────────────────────
export function extractLogContext(req: Request): Record<string, unknown> {
  return {
    requestId: req.id,
    path: req.originalUrl,
    method: req.method,
    entityId: req.params?.id,
    ip: req.ip,
    service: SERVICE_NAME || undefined,
  };
}

export type { Logger };
