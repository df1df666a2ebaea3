import type http from "http";
import { BackgroundRefresher } from "../application/refresh-stations/BackgroundRefresher";
import { StationCacheService } from "../application/station-cache/StationCacheService";
import { ChargeMapHttpClient } from "../infrastructure/chargemap/ChargeMapHttpClient";
import { MongoStationCacheStore } from "../infrastructure/mongo/MongoStationCacheStore";
import { createServer } from "../server";
import { loadEnv, type Env } from "../shared/config/env";
import { loadRuntimeConfigFromEnv, type RuntimeConfig } from "../shared/config/runtime.config";
import { SlidingWindowRateLimiter } from "../shared/rate-limit/SlidingWindowRateLimiter";

export type CacheServiceComponents = {
  store: MongoStationCacheStore;
  client: ChargeMapHttpClient;
  limiter: SlidingWindowRateLimiter;
  refresher: BackgroundRefresher;
  service: StationCacheService;
};

export type RunningCacheService = {
  service: StationCacheService;
  server: http.Server;
  port: number;
  shutdown: () => Promise<void>;
};

/**
 * Builds one store, one limiter and one refresher for the whole process.
 */
export const createCacheService = (env: Env, runtime: RuntimeConfig): CacheServiceComponents => {
  const client = new ChargeMapHttpClient(env.CHARGE_API_BASE_URL, runtime.upstreamTimeoutMs);
  const store = new MongoStationCacheStore(env.MONGO_URI, {
    dbName: env.MONGO_DB_NAME,
    cacheExpiryHours: runtime.cacheExpiryHours,
    maxPoolSize: runtime.mongoMaxPoolSize
  });
  const limiter = new SlidingWindowRateLimiter(runtime.rateLimit);
  const refresher = new BackgroundRefresher({ store, client, limiter, config: runtime.refresherConfig });
  const service = new StationCacheService({ store, client, limiter, refresher });

  return { store, client, limiter, refresher, service };
};

const listen = (server: http.Server, port: number): Promise<number> =>
  new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, () => {
      server.off("error", reject);
      const address = server.address();
      resolve(typeof address === "object" && address ? address.port : port);
    });
  });

const closeServer = (server: http.Server): Promise<void> =>
  new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });

export const runCacheService = async (): Promise<RunningCacheService> => {
  const env = loadEnv();
  const runtime = loadRuntimeConfigFromEnv();
  const { store, refresher, service } = createCacheService(env, runtime);

  const server = createServer(service);
  let port: number;
  try {
    port = await listen(server, runtime.port);
  } catch (err) {
    await store.close();
    throw err;
  }

  if (runtime.refresherEnabled) refresher.start();

  // eslint-disable-next-line no-console
  console.log(JSON.stringify({
    event: "server.listening",
    port,
    refresherEnabled: runtime.refresherEnabled,
    defaultMarket: runtime.refresherConfig.defaultMarket
  }));

  const shutdown = async () => {
    try {
      await refresher.stop();
      await closeServer(server);
    } finally {
      await store.close();
    }
  };

  return { service, server, port, shutdown };
};
