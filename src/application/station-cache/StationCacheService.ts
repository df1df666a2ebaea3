import { priceSlotKey } from "../../core/cache/cache.rules";
import { powerTypes, type CacheStats, type PriceRecord, type StationRecord } from "../../core/cache/cache.types";
import type { ChargingNetworkClient } from "../../ports/ChargingNetworkClient";
import type { StationCacheStore } from "../../ports/StationCacheStore";
import type { RateLimitSnapshot, SlidingWindowRateLimiter } from "../../shared/rate-limit/SlidingWindowRateLimiter";
import type { BackgroundRefresher, UpdaterStatus } from "../refresh-stations/BackgroundRefresher";
import { forceUpdate } from "../refresh-stations/forceUpdate.usecase";

export const DEFAULT_QUEUE_PRIORITY = 5;

export type StationCacheServiceDeps = {
  store: StationCacheStore;
  client: ChargingNetworkClient;
  limiter: SlidingWindowRateLimiter;
  refresher: BackgroundRefresher;
  now?: () => Date;
};

export type RefreshResult = {
  station: StationRecord | undefined;
  prices: Record<string, PriceRecord>;
};

/**
 * What request handlers talk to: the store's read/write API plus queueing,
 * manual refresh and status, all sharing one limiter and one refresher.
 */
export class StationCacheService {
  constructor(private readonly deps: StationCacheServiceDeps) {}

  get store(): StationCacheStore {
    return this.deps.store;
  }

  get defaultMarket(): string {
    return this.deps.refresher.config.defaultMarket;
  }

  async enqueue(poolId: string, market = this.defaultMarket, priority = DEFAULT_QUEUE_PRIORITY): Promise<number> {
    await this.deps.store.enqueue(poolId, market, priority);
    return this.deps.store.queueSize();
  }

  queueSize(): Promise<number> {
    return this.deps.store.queueSize();
  }

  forceUpdate(poolId: string, market = this.defaultMarket): Promise<StationRecord | undefined> {
    const { store, client, limiter, refresher, now } = this.deps;
    return forceUpdate(
      { store, client, limiter, config: refresher.config, activity: refresher.activity, now },
      poolId,
      market
    );
  }

  /**
   * Manual refresh followed by the pool's cached prices for every configured tariff.
   */
  async refreshWithPrices(poolId: string, market = this.defaultMarket): Promise<RefreshResult> {
    const station = await this.forceUpdate(poolId, market);
    const prices: Record<string, PriceRecord> = {};

    for (const tariffId of this.deps.refresher.config.tariffs) {
      for (const powerType of powerTypes) {
        const price = await this.deps.store.getPrice(poolId, tariffId, powerType, market);
        if (price) prices[priceSlotKey(tariffId, powerType)] = price;
      }
    }

    return { station, prices };
  }

  getStats(): Promise<CacheStats> {
    return this.deps.store.getStats();
  }

  getUpdaterStatus(): Promise<UpdaterStatus> {
    return this.deps.refresher.getStatus();
  }

  getRateLimit(): RateLimitSnapshot {
    return this.deps.limiter.snapshot();
  }
}
