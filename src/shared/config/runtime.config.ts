import {
  defaultRefresherConfig,
  type RefresherConfig,
  validateRefresherConfig
} from "../../application/refresh-stations/refresher.config";
import { DEFAULT_CACHE_EXPIRY_HOURS } from "../../core/cache/cache.rules";
import { defaultRateLimiterOptions } from "../rate-limit/SlidingWindowRateLimiter";

export const runtimeCaps = {
  cacheExpiryHours: { min: 1, max: 720 },
  rateLimitRequests: { min: 1, max: 100 },
  rateLimitWindowMs: { min: 1000, max: 600000 },
  upstreamTimeoutMs: { min: 1000, max: 60000 },
  port: { min: 1, max: 65535 },
  mongoMaxPoolSize: { min: 1, max: 200 }
} as const;

export type RuntimeConfig = {
  refresherConfig: RefresherConfig;
  refresherEnabled: boolean;
  cacheExpiryHours: number;
  rateLimit: { maxRequests: number; windowMs: number };
  upstreamTimeoutMs: number;
  port: number;
  mongoMaxPoolSize: number;
};

const parseOptionalIntInRange = (
  env: NodeJS.ProcessEnv,
  name: string,
  range: { min: number; max: number }
): number | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return undefined;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new Error(`${name}=${raw} is out of allowed range [${range.min}..${range.max}]`);
  }

  return value;
};

const parseOptionalList = (env: NodeJS.ProcessEnv, name: string): string[] | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return undefined;
  return raw.split(",").map((item) => item.trim()).filter((item) => item !== "");
};

const parseOptionalBoolean = (env: NodeJS.ProcessEnv, name: string): boolean | undefined => {
  const raw = env[name]?.trim().toLowerCase();
  if (raw == null || raw === "") return undefined;
  if (raw === "1" || raw === "true") return true;
  if (raw === "0" || raw === "false") return false;
  throw new Error(`${name}=${env[name] ?? ""} must be one of true, false, 1, 0`);
};

export const loadRuntimeConfigFromEnv = (env: NodeJS.ProcessEnv = process.env): RuntimeConfig => {
  const refresherConfig = validateRefresherConfig({
    ...defaultRefresherConfig,
    tariffs: parseOptionalList(env, "REFRESH_TARIFFS") ?? defaultRefresherConfig.tariffs,
    defaultMarket: env.DEFAULT_MARKET?.trim() ? env.DEFAULT_MARKET.trim() : defaultRefresherConfig.defaultMarket,
    sweepLimit: parseOptionalIntInRange(env, "REFRESH_SWEEP_LIMIT", { min: 1, max: 1000 }) ?? defaultRefresherConfig.sweepLimit,
    startupGraceMs:
      parseOptionalIntInRange(env, "REFRESH_STARTUP_GRACE_MS", { min: 0, max: 600000 }) ?? defaultRefresherConfig.startupGraceMs,
    idleWaitMs: parseOptionalIntInRange(env, "REFRESH_IDLE_MS", { min: 1, max: 3600000 }) ?? defaultRefresherConfig.idleWaitMs,
    errorBackoffMs:
      parseOptionalIntInRange(env, "REFRESH_ERROR_BACKOFF_MS", { min: 1, max: 3600000 }) ?? defaultRefresherConfig.errorBackoffMs,
    logRetentionDays:
      parseOptionalIntInRange(env, "UPDATE_LOG_RETENTION_DAYS", { min: 1, max: 365 }) ?? defaultRefresherConfig.logRetentionDays
  });

  const cacheExpiryHours =
    parseOptionalIntInRange(env, "CACHE_EXPIRY_HOURS", runtimeCaps.cacheExpiryHours) ?? DEFAULT_CACHE_EXPIRY_HOURS;
  const rateLimit = {
    maxRequests:
      parseOptionalIntInRange(env, "RATE_LIMIT_REQUESTS", runtimeCaps.rateLimitRequests) ?? defaultRateLimiterOptions.maxRequests,
    windowMs:
      parseOptionalIntInRange(env, "RATE_LIMIT_WINDOW_MS", runtimeCaps.rateLimitWindowMs) ?? defaultRateLimiterOptions.windowMs
  };
  const upstreamTimeoutMs = parseOptionalIntInRange(env, "UPSTREAM_TIMEOUT_MS", runtimeCaps.upstreamTimeoutMs) ?? 30000;
  const port = parseOptionalIntInRange(env, "PORT", runtimeCaps.port) ?? 3000;
  const mongoMaxPoolSize = parseOptionalIntInRange(env, "MONGO_MAX_POOL_SIZE", runtimeCaps.mongoMaxPoolSize) ?? 10;
  const refresherEnabled = parseOptionalBoolean(env, "REFRESHER_ENABLED") ?? true;

  return { refresherConfig, refresherEnabled, cacheExpiryHours, rateLimit, upstreamTimeoutMs, port, mongoMaxPoolSize };
};
