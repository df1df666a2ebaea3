import { UpstreamRequestError } from "../../core/cache/cache.errors";
import { powerTypes, type PowerType, type PriceFields, type QueueTarget } from "../../core/cache/cache.types";
import { normalizePool } from "../../core/pool/normalizePool";
import { normalizePrice, type RawPrice } from "../../core/price/normalizePrice";
import type { ChargingNetworkClient } from "../../ports/ChargingNetworkClient";
import type { StationCacheStore } from "../../ports/StationCacheStore";
import type { SlidingWindowRateLimiter } from "../../shared/rate-limit/SlidingWindowRateLimiter";
import { isFatalForItem, toErrorMessage } from "./refresh.error-handler";
import type { RefresherConfig } from "./refresher.config";

export type RefreshDeps = {
  store: StationCacheStore;
  client: ChargingNetworkClient;
  limiter: SlidingWindowRateLimiter;
  config: Pick<RefresherConfig, "tariffs" | "referencePower">;
};

export type RefreshOutcome = {
  pricesSaved: number;
  pricesFailed: number;
  aborted: boolean;
};

const recorded = async <T>(limiter: SlidingWindowRateLimiter, call: () => Promise<T>): Promise<T> => {
  try {
    return await call();
  } finally {
    limiter.recordRequest();
  }
};

/**
 * Refreshes one pool: details first, then one representative price per tariff and
 * power type (AC before DC), each price request gated by the shared limiter.
 *
 * Every upstream call is recorded right after it returns, whether it succeeded or not.
 * A failed price quote is logged and skipped; only store failures end the refresh.
 * When `signal` aborts between price requests the refresh stops where it is; what was
 * saved so far stays valid.
 */
export const refreshStation = async (
  deps: RefreshDeps,
  target: QueueTarget,
  signal?: AbortSignal
): Promise<RefreshOutcome> => {
  const { store, client, limiter, config } = deps;
  const { poolId, market } = target;

  const rawPool = await recorded(limiter, () => client.fetchPoolDetails(poolId, market));

  if (!rawPool) {
    throw new UpstreamRequestError({
      message: `Pool ${poolId} was not returned by the upstream API`,
      context: { poolId, market }
    });
  }

  const pool = normalizePool(rawPool);
  await store.saveStation({
    poolId,
    market,
    fields: pool.fields,
    coordinates: pool.coordinates,
    chargePointCount: pool.chargePointCount,
    operatorId: pool.operatorId,
    rawData: rawPool
  });

  const chargePoints: Record<PowerType, string[]> = {
    AC: pool.fields.chargePointsAc,
    DC: pool.fields.chargePointsDc
  };

  let pricesSaved = 0;
  let pricesFailed = 0;
  for (const tariffId of config.tariffs) {
    for (const powerType of powerTypes) {
      const chargePointId = chargePoints[powerType][0];
      if (!chargePointId) continue;

      await limiter.awaitTurn(signal);
      if (signal?.aborted) return { pricesSaved, pricesFailed, aborted: true };

      const power = config.referencePower[powerType];
      let rawPrice: RawPrice | null;
      let fields: PriceFields | null;
      try {
        rawPrice = await recorded(limiter, () =>
          client.fetchPrice({ chargePointId, tariffId, powerType, power, market })
        );
        fields = rawPrice ? normalizePrice(rawPrice) : null;
      } catch (err) {
        if (isFatalForItem(err)) throw err;
        pricesFailed += 1;
        // eslint-disable-next-line no-console
        console.warn(JSON.stringify({
          event: "refresh.price_failed",
          poolId,
          tariffId,
          powerType,
          market,
          message: toErrorMessage(err)
        }));
        continue;
      }

      if (!rawPrice || !fields) {
        // eslint-disable-next-line no-console
        console.warn(JSON.stringify({ event: "refresh.price_missing", poolId, tariffId, powerType, market }));
        continue;
      }

      await store.savePrice({
        poolId,
        tariffId,
        powerType,
        market,
        chargePointId,
        power,
        fields,
        rawData: rawPrice
      });
      pricesSaved += 1;
    }
  }

  return { pricesSaved, pricesFailed, aborted: false };
};
