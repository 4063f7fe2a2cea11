import path from "path";
import dotenv from "dotenv";

// Load environment variables from .env
dotenv.config();

export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Process-wide configuration, built once at startup and never mutated.
 */
export interface AppConfig {
  readonly port: number;
  readonly version: string;
  readonly upstreamTimeoutMs: number;
  readonly logLevel: LogLevel;
  readonly provinceTablePath: string;
  readonly randomSeed: string | null;
  readonly defaultKeys: Readonly<{
    "baidu-map"?: string;
    amap?: string;
  }>;
}

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function positiveInt(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value || "", 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const logLevel = (env.LOG_LEVEL || "info").toLowerCase();

  return Object.freeze({
    port: positiveInt(env.PORT, 3001),
    version: env.APP_VERSION || env.npm_package_version || "1.0.0",
    upstreamTimeoutMs: positiveInt(env.UPSTREAM_TIMEOUT_MS, 5000),
    logLevel: isLogLevel(logLevel) ? logLevel : "info",
    provinceTablePath: path.resolve(
      process.cwd(),
      env.PROVINCE_TABLE_PATH || path.join("data", "provinces.csv")
    ),
    randomSeed: nonEmpty(env.RANDOM_SEED) ?? null,
    defaultKeys: Object.freeze({
      "baidu-map": nonEmpty(env.BAIDU_MAP_AK),
      amap: nonEmpty(env.AMAP_KEY),
    }),
  });
}
