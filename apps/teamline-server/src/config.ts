import { v4 as uuid } from "uuid";

export interface RateLimitConfig {
  max: number;
  windowMs: number;
}

export interface ServerConfig {
  port: number;
  host: string;
  dataDir: string;
  /** HS256 secret the auth service signs bearer tokens with */
  jwtSecret: string;
  /** Ephemeral store + notification bus; null keeps both in-process */
  redisUrl: string | null;
  instanceId: string;
  heartbeatIntervalMs: number;
  typingTtlMs: number;
  editWindowMs: number;
  rateLimit: RateLimitConfig;
  corsOrigins: string[] | true;
}

const HOUR_MS = 60 * 60 * 1000;

function int(raw: string | undefined, fallback: number): number {
  const value = parseInt(raw ?? String(fallback), 10);
  return Number.isNaN(value) ? fallback : value;
}

function list(raw: string | undefined): string[] {
  return (raw ?? "")
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const origins = list(env.CORS_ORIGINS);

  return {
    port: int(env.PORT, 8002),
    host: env.HOST ?? "0.0.0.0",
    dataDir: env.DATA_DIR ?? "./data",
    jwtSecret: env.JWT_SECRET ?? "dev-secret",
    redisUrl: env.REDIS_URL?.trim() || null,
    instanceId: env.INSTANCE_ID?.trim() || uuid(),
    heartbeatIntervalMs: int(env.HEARTBEAT_INTERVAL_MS, 30_000),
    typingTtlMs: int(env.TYPING_TTL_MS, 5_000),
    editWindowMs: int(env.EDIT_WINDOW_HOURS, 24) * HOUR_MS,
    rateLimit: {
      max: int(env.RATE_LIMIT_MAX, 30),
      windowMs: int(env.RATE_LIMIT_WINDOW_MS, 10_000),
    },
    corsOrigins: origins.length > 0 ? origins : true,
  };
}

const config: ServerConfig = loadConfig();

export default config;
