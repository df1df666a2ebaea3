import { ObjectId, type Collection, type MongoClient } from "mongodb";
import { StoreFailureError } from "../../core/cache/cache.errors";
import {
  DEFAULT_CACHE_EXPIRY_HOURS,
  isRecordStale,
  priceSlotKey,
  retentionCutoff,
  staleCutoff
} from "../../core/cache/cache.rules";
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
} from "../../core/cache/cache.types";
import type { StaleStationQuery, StationCacheStore } from "../../ports/StationCacheStore";
import { createMongoClient, DEFAULT_MAX_POOL_SIZE } from "./MongoClientFactory";
import { mongoIndexes } from "./mongo.indexes";
import {
  buildBoundsFilter,
  buildEnqueuePipeline,
  buildPriceUpsert,
  buildStationUpsert,
  queueOrder,
  toPriceRecord,
  toStationRecord,
  withCoordinatesFilter,
  type PriceDoc,
  type StationDoc,
  type UpdateLogDoc,
  type UpdateQueueDoc
} from "./station-cache.documents";

export type CacheCollections = {
  stations: Collection<StationDoc>;
  prices: Collection<PriceDoc>;
  updateQueue: Collection<UpdateQueueDoc>;
  updateLog: Collection<UpdateLogDoc>;
};

export type MongoStationCacheStoreOptions = {
  dbName: string;
  cacheExpiryHours: number;
  maxPoolSize: number;
  now: () => Date;
};

export const collectionNames = {
  stations: "stations",
  prices: "prices",
  updateQueue: "update_queue",
  updateLog: "update_log"
} as const;

/**
 * MongoDB-backed cache store. Every write is a single-document atomic operation,
 * and the same collections hold the update queue and the update log.
 */
export class MongoStationCacheStore implements StationCacheStore {
  private client?: MongoClient;
  private collections?: Promise<CacheCollections>;
  private readonly options: MongoStationCacheStoreOptions;

  constructor(
    private readonly mongoUri: string,
    options: Partial<MongoStationCacheStoreOptions> = {}
  ) {
    this.options = {
      dbName: options.dbName ?? "station_cache",
      cacheExpiryHours: options.cacheExpiryHours ?? DEFAULT_CACHE_EXPIRY_HOURS,
      maxPoolSize: options.maxPoolSize ?? DEFAULT_MAX_POOL_SIZE,
      now: options.now ?? (() => new Date())
    };
  }

  private getCollections(): Promise<CacheCollections> {
    if (!this.collections) {
      this.collections = this.connect().catch((err: unknown) => {
        this.collections = undefined;
        throw err;
      });
    }
    return this.collections;
  }

  private async connect(): Promise<CacheCollections> {
    this.client = await createMongoClient(this.mongoUri, this.options.maxPoolSize);

    const db = this.client.db(this.options.dbName);
    const cols: CacheCollections = {
      stations: db.collection<StationDoc>(collectionNames.stations),
      prices: db.collection<PriceDoc>(collectionNames.prices),
      updateQueue: db.collection<UpdateQueueDoc>(collectionNames.updateQueue),
      updateLog: db.collection<UpdateLogDoc>(collectionNames.updateLog)
    };

    for (const idx of mongoIndexes.stations) await cols.stations.createIndex(idx.keys, idx.options);
    for (const idx of mongoIndexes.prices) await cols.prices.createIndex(idx.keys, idx.options);
    for (const idx of mongoIndexes.updateQueue) await cols.updateQueue.createIndex(idx.keys, idx.options);
    for (const idx of mongoIndexes.updateLog) await cols.updateLog.createIndex(idx.keys, idx.options);

    return cols;
  }

  private async run<T>(operation: string, fn: (cols: CacheCollections) => Promise<T>): Promise<T> {
    try {
      return await fn(await this.getCollections());
    } catch (err) {
      if (err instanceof StoreFailureError) throw err;
      throw new StoreFailureError(operation, err);
    }
  }

  // Stations

  async getStation(poolId: string): Promise<StationRecord | undefined> {
    return this.run("getStation", async ({ stations }) => {
      const doc = await stations.findOne({ _id: poolId });
      return doc ? toStationRecord(doc) : undefined;
    });
  }

  async getStations(poolIds: string[]): Promise<Map<string, StationRecord>> {
    if (poolIds.length === 0) return new Map();
    return this.run("getStations", async ({ stations }) => {
      const docs = await stations.find({ _id: { $in: poolIds } }).toArray();
      return new Map(docs.map((doc) => [doc._id, toStationRecord(doc)]));
    });
  }

  async getStationsInBounds(bounds: GeoBounds, market?: string): Promise<StationRecord[]> {
    return this.run("getStationsInBounds", async ({ stations }) => {
      const docs = await stations.find(buildBoundsFilter(bounds, market)).toArray();
      return docs.map(toStationRecord);
    });
  }

  async getAllStations(market?: string): Promise<StationRecord[]> {
    return this.run("getAllStations", async ({ stations }) => {
      const docs = await stations.find(withCoordinatesFilter(market)).toArray();
      return docs.map(toStationRecord);
    });
  }

  async saveStation(input: SaveStationInput): Promise<void> {
    const { filter, update } = buildStationUpsert(input, this.options.now());
    await this.run("saveStation", ({ stations }) => stations.updateOne(filter, update, { upsert: true }));
  }

  // Prices

  async getPrice(poolId: string, tariffId: string, powerType: PowerType, market: string): Promise<PriceRecord | undefined> {
    return this.run("getPrice", async ({ prices }) => {
      const doc = await prices.findOne({ poolId, tariffId, powerType, market });
      return doc ? toPriceRecord(doc) : undefined;
    });
  }

  async getPrices(
    poolIds: string[],
    tariffId: string,
    powerType: PowerType,
    market: string
  ): Promise<Map<string, PriceRecord>> {
    if (poolIds.length === 0) return new Map();
    return this.run("getPrices", async ({ prices }) => {
      const docs = await prices.find({ poolId: { $in: poolIds }, tariffId, powerType, market }).toArray();
      return new Map(docs.map((doc) => [doc.poolId, toPriceRecord(doc)]));
    });
  }

  async getAllPricesForPools(poolIds: string[], market: string): Promise<Map<string, Map<string, PriceRecord>>> {
    if (poolIds.length === 0) return new Map();
    return this.run("getAllPricesForPools", async ({ prices }) => {
      const docs = await prices.find({ poolId: { $in: poolIds }, market }).toArray();
      const byPool = new Map<string, Map<string, PriceRecord>>();
      for (const doc of docs) {
        const slots = byPool.get(doc.poolId) ?? new Map<string, PriceRecord>();
        slots.set(priceSlotKey(doc.tariffId, doc.powerType), toPriceRecord(doc));
        byPool.set(doc.poolId, slots);
      }
      return byPool;
    });
  }

  async savePrice(input: SavePriceInput): Promise<void> {
    const { filter, update } = buildPriceUpsert(input, this.options.now());
    await this.run("savePrice", ({ prices }) => prices.updateOne(filter, update, { upsert: true }));
  }

  // Freshness

  async isStale(poolId: string, maxAgeHours = this.options.cacheExpiryHours): Promise<boolean> {
    return this.run("isStale", async ({ stations }) => {
      const doc = await stations.findOne({ _id: poolId }, { projection: { updatedAt: 1 } });
      return isRecordStale(doc?.updatedAt, this.options.now(), maxAgeHours);
    });
  }

  async getStaleStationIds(query: StaleStationQuery): Promise<string[]> {
    const cutoff = staleCutoff(this.options.now(), this.options.cacheExpiryHours);
    return this.run("getStaleStationIds", async ({ stations }) => {
      const docs = await stations
        .find(
          { updatedAt: { $lt: cutoff }, ...(query.market ? { market: query.market } : {}) },
          { projection: { _id: 1 } }
        )
        .sort({ updatedAt: 1 })
        .limit(query.limit)
        .toArray();
      return docs.map((doc) => doc._id);
    });
  }

  // Update queue

  async enqueue(poolId: string, market: string, priority: number): Promise<void> {
    const pipeline = buildEnqueuePipeline(market, priority, this.options.now(), new ObjectId());
    await this.run("enqueue", ({ updateQueue }) => updateQueue.updateOne({ _id: poolId }, pipeline, { upsert: true }));
  }

  /**
   * Returns the next target without removing it; the entry leaves the queue only
   * through `removeFromQueue` once its refresh attempt has finished.
   */
  async dequeueNext(): Promise<QueueTarget | undefined> {
    return this.run("dequeueNext", async ({ updateQueue }) => {
      const doc = await updateQueue.findOneAndUpdate(
        {},
        { $set: { lastAttemptAt: this.options.now() }, $inc: { attemptCount: 1 } },
        { sort: queueOrder, returnDocument: "after" }
      );
      return doc ? { poolId: doc._id, market: doc.market } : undefined;
    });
  }

  async removeFromQueue(poolId: string): Promise<void> {
    await this.run("removeFromQueue", ({ updateQueue }) => updateQueue.deleteOne({ _id: poolId }));
  }

  async queueSize(): Promise<number> {
    return this.run("queueSize", ({ updateQueue }) => updateQueue.countDocuments({}));
  }

  // Update log

  async logUpdate(entry: Omit<UpdateLogEntry, "createdAt">): Promise<void> {
    await this.run("logUpdate", ({ updateLog }) => updateLog.insertOne({ ...entry, createdAt: this.options.now() }));
  }

  async pruneUpdateLog(olderThanDays: number): Promise<number> {
    const cutoff = retentionCutoff(this.options.now(), olderThanDays);
    return this.run("pruneUpdateLog", async ({ updateLog }) => {
      const res = await updateLog.deleteMany({ createdAt: { $lt: cutoff } });
      return res.deletedCount ?? 0;
    });
  }

  async getStats(): Promise<CacheStats> {
    const cutoff = staleCutoff(this.options.now(), this.options.cacheExpiryHours);
    return this.run("getStats", async ({ stations, prices, updateQueue }) => {
      const [totalStations, totalPrices, freshStations, queueSize] = await Promise.all([
        stations.countDocuments({}),
        prices.countDocuments({}),
        stations.countDocuments({ updatedAt: { $gte: cutoff } }),
        updateQueue.countDocuments({})
      ]);

      return {
        totalStations,
        totalPrices,
        freshStations,
        staleStations: totalStations - freshStations,
        queueSize,
        cacheExpiryHours: this.options.cacheExpiryHours
      };
    });
  }

  async close(): Promise<void> {
    await this.client?.close();
    this.client = undefined;
    this.collections = undefined;
  }
}
