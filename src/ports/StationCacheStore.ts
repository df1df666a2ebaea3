import type {
  CacheStats,
  GeoBounds,
  PowerType,
  PriceRecord,
  QueueTarget,
  SavePriceInput,
  SaveStationInput,
  StationRecord,
  UpdateLogEntry
} from "../core/cache/cache.types";

export type StaleStationQuery = {
  market?: string;
  limit: number;
};

/**
 * Single boundary for every piece of durable cache state: stations, prices,
 * the update queue and the update log.
 */
export interface StationCacheStore {
  getStation(poolId: string): Promise<StationRecord | undefined>;
  getStations(poolIds: string[]): Promise<Map<string, StationRecord>>;
  getStationsInBounds(bounds: GeoBounds, market?: string): Promise<StationRecord[]>;
  getAllStations(market?: string): Promise<StationRecord[]>;
  saveStation(input: SaveStationInput): Promise<void>;

  getPrice(poolId: string, tariffId: string, powerType: PowerType, market: string): Promise<PriceRecord | undefined>;
  getPrices(poolIds: string[], tariffId: string, powerType: PowerType, market: string): Promise<Map<string, PriceRecord>>;
  getAllPricesForPools(poolIds: string[], market: string): Promise<Map<string, Map<string, PriceRecord>>>;
  savePrice(input: SavePriceInput): Promise<void>;

  isStale(poolId: string, maxAgeHours?: number): Promise<boolean>;
  getStaleStationIds(query: StaleStationQuery): Promise<string[]>;

  enqueue(poolId: string, market: string, priority: number): Promise<void>;
  dequeueNext(): Promise<QueueTarget | undefined>;
  removeFromQueue(poolId: string): Promise<void>;
  queueSize(): Promise<number>;

  logUpdate(entry: Omit<UpdateLogEntry, "createdAt">): Promise<void>;
  pruneUpdateLog(olderThanDays: number): Promise<number>;

  getStats(): Promise<CacheStats>;
  close(): Promise<void>;
}
