// Typed view over the process environment. Read once at startup by server.ts;
// tests call loadConfig() with their own env object.

import type { LevelWithSilent } from "pino";

export type HistoryMode = "strict" | "best-effort";
export type DbType = "postgres" | "better-sqlite3";

export type DbConfig =
  | {
      type: "postgres";
      url?: string;
      host: string;
      port: number;
      username: string;
      password: string;
      database: string;
      poolSize: number;
      synchronize: boolean;
    }
  | {
      type: "better-sqlite3";
      path: string;
      synchronize: boolean;
    };

export interface AppConfig {
  host: string;
  port: number;
  apiPrefix: string;
  corsOrigin: string;
  /** `strict` writes an entry and its history row in one transaction. */
  historyMode: HistoryMode;
  version: string;
  logLevel: LevelWithSilent;
  db: DbConfig;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const HISTORY_MODES: readonly HistoryMode[] = ["strict", "best-effort"];
const DB_TYPES: readonly DbType[] = ["postgres", "better-sqlite3"];
const LOG_LEVELS: readonly LevelWithSilent[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

export function defaultLogLevel(nodeEnv: string | undefined): LevelWithSilent {
  if (nodeEnv === "test") return "silent";
  return nodeEnv === "production" ? "info" : "debug";
}

function str(env: NodeJS.ProcessEnv, name: string, def: string): string {
  const v = env[name];
  return v === undefined || v.trim() === "" ? def : v.trim();
}

function int(env: NodeJS.ProcessEnv, name: string, def: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return def;
  const n = Number(raw);
  if (!Number.isInteger(n) || n <= 0) throw new ConfigError(`${name} must be a positive integer`);
  return n;
}

function bool(env: NodeJS.ProcessEnv, name: string, def: boolean): boolean {
  const raw = str(env, name, String(def)).toLowerCase();
  if (raw === "true" || raw === "1") return true;
  if (raw === "false" || raw === "0") return false;
  throw new ConfigError(`${name} must be true or false`);
}

function oneOf<T extends string>(env: NodeJS.ProcessEnv, name: string, allowed: readonly T[], def: T): T {
  const raw = str(env, name, def);
  const match = allowed.find((a) => a === raw);
  if (!match) throw new ConfigError(`${name} must be one of ${allowed.join(", ")}`);
  return match;
}

function loadDbConfig(env: NodeJS.ProcessEnv): DbConfig {
  const type = oneOf(env, "DB_TYPE", DB_TYPES, "postgres");
  const synchronize = bool(env, "DB_SYNCHRONIZE", true);
  if (type === "better-sqlite3") {
    return { type, path: str(env, "DB_PATH", "glossary.sqlite"), synchronize };
  }
  const url = env.DATABASE_URL?.trim();
  return {
    type,
    url: url ? url : undefined,
    host: str(env, "DB_HOST", "localhost"),
    port: int(env, "DB_PORT", 5432),
    username: str(env, "DB_USER", "postgres"),
    password: str(env, "DB_PASSWORD", "postgres"),
    database: str(env, "DB_NAME", "glossary"),
    poolSize: int(env, "DB_POOL_SIZE", 10),
    synchronize,
  };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    host: str(env, "HOST", "0.0.0.0"),
    port: int(env, "PORT", 8080),
    apiPrefix: str(env, "API_PREFIX", "/api/v1"),
    corsOrigin: str(env, "CORS_ORIGIN", "*"),
    historyMode: oneOf(env, "HISTORY_MODE", HISTORY_MODES, "strict"),
    version: str(env, "npm_package_version", "0.0.0"),
    logLevel: oneOf(env, "LOG_LEVEL", LOG_LEVELS, defaultLogLevel(env.NODE_ENV)),
    db: loadDbConfig(env),
  };
}
