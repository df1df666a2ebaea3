import { defaultRefresherConfig, resolveRefresherConfig } from "../../src/application/refresh-stations/refresher.config";
import { loadRuntimeConfigFromEnv } from "../../src/shared/config/runtime.config";

describe("runtime config caps", () => {
  it("uses defaults for an empty environment", () => {
    expect(loadRuntimeConfigFromEnv({})).toEqual({
      refresherConfig: defaultRefresherConfig,
      refresherEnabled: true,
      cacheExpiryHours: 24,
      rateLimit: { maxRequests: 3, windowMs: 10000 },
      upstreamTimeoutMs: 30000,
      port: 3000,
      mongoMaxPoolSize: 10
    });
  });

  it("accepts boundary values within allowed caps", () => {
    const runtime = loadRuntimeConfigFromEnv({
      CACHE_EXPIRY_HOURS: "720",
      RATE_LIMIT_REQUESTS: "1",
      RATE_LIMIT_WINDOW_MS: "600000",
      UPSTREAM_TIMEOUT_MS: "1000",
      PORT: "65535",
      MONGO_MAX_POOL_SIZE: "200",
      REFRESH_SWEEP_LIMIT: "1000",
      REFRESH_STARTUP_GRACE_MS: "0",
      UPDATE_LOG_RETENTION_DAYS: "365",
      REFRESHER_ENABLED: "0"
    });

    expect(runtime).toMatchObject({
      refresherEnabled: false,
      cacheExpiryHours: 720,
      rateLimit: { maxRequests: 1, windowMs: 600000 },
      upstreamTimeoutMs: 1000,
      port: 65535,
      mongoMaxPoolSize: 200
    });
    expect(runtime.refresherConfig).toMatchObject({ sweepLimit: 1000, startupGraceMs: 0, logRetentionDays: 365 });
  });

  it("reads the tariff list and default market", () => {
    const runtime = loadRuntimeConfigFromEnv({ REFRESH_TARIFFS: " FLEX, ,SMART ", DEFAULT_MARKET: " at " });

    expect(runtime.refresherConfig.tariffs).toEqual(["FLEX", "SMART"]);
    expect(runtime.refresherConfig.defaultMarket).toBe("at");
  });

  it.each([
    { env: { CACHE_EXPIRY_HOURS: "0" }, message: "CACHE_EXPIRY_HOURS=0 is out of allowed range [1..720]" },
    { env: { RATE_LIMIT_REQUESTS: "101" }, message: "RATE_LIMIT_REQUESTS=101 is out of allowed range [1..100]" },
    { env: { RATE_LIMIT_WINDOW_MS: "999" }, message: "RATE_LIMIT_WINDOW_MS=999 is out of allowed range [1000..600000]" },
    { env: { UPSTREAM_TIMEOUT_MS: "60001" }, message: "UPSTREAM_TIMEOUT_MS=60001 is out of allowed range [1000..60000]" },
    { env: { PORT: "3000.5" }, message: "PORT=3000.5 is out of allowed range [1..65535]" },
    { env: { MONGO_MAX_POOL_SIZE: "abc" }, message: "MONGO_MAX_POOL_SIZE=abc is out of allowed range [1..200]" },
    { env: { REFRESH_SWEEP_LIMIT: "0" }, message: "REFRESH_SWEEP_LIMIT=0 is out of allowed range [1..1000]" },
    { env: { UPDATE_LOG_RETENTION_DAYS: "400" }, message: "UPDATE_LOG_RETENTION_DAYS=400 is out of allowed range [1..365]" },
    { env: { REFRESHER_ENABLED: "maybe" }, message: "REFRESHER_ENABLED=maybe must be one of true, false, 1, 0" }
  ])("rejects out-of-range config: $message", ({ env, message }) => {
    expect(() => loadRuntimeConfigFromEnv(env)).toThrow(message);
  });
});

describe("refresher config", () => {
  it("merges partial input over defaults", () => {
    const config = resolveRefresherConfig({ tariffs: [" FLEX "], referencePower: { AC: 22, DC: 50 } });

    expect(config.tariffs).toEqual(["FLEX"]);
    expect(config.referencePower).toEqual({ AC: 22, DC: 50 });
    expect(config.sweepPriority).toBe(1);
  });

  it("rejects an empty tariff list and a blank market", () => {
    expect(() => resolveRefresherConfig({ tariffs: [" "] })).toThrow("tariffs must name at least one tariff");
    expect(() => resolveRefresherConfig({ defaultMarket: " " })).toThrow("defaultMarket must not be empty");
  });

  it("rejects out-of-range timings", () => {
    expect(() => resolveRefresherConfig({ stopTimeoutMs: 0 })).toThrow("stopTimeoutMs=0 is out of allowed range [1..600000]");
  });
});
