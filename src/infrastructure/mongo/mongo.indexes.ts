import type { CreateIndexesOptions, IndexSpecification } from "mongodb";

type IndexPlan = { keys: IndexSpecification; options?: CreateIndexesOptions };

/**
 * Index plan applied on first connect (createIndex is idempotent).
 * Station and queue documents use the pool id as `_id`, so their uniqueness comes for free.
 */
export const mongoIndexes: Record<"stations" | "prices" | "updateQueue" | "updateLog", IndexPlan[]> = {
  stations: [
    { keys: { market: 1 } },
    { keys: { updatedAt: 1 } },
    { keys: { latitude: 1, longitude: 1 } }
  ],
  prices: [
    { keys: { poolId: 1, tariffId: 1, powerType: 1, market: 1 }, options: { unique: true } },
    { keys: { poolId: 1 } },
    { keys: { updatedAt: 1 } }
  ],
  updateQueue: [
    { keys: { priority: -1, enqueuedAt: 1, ticket: 1 } }
  ],
  updateLog: [
    { keys: { createdAt: 1 } }
  ]
};
