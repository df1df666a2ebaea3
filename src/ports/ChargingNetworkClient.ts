import type { PowerType } from "../core/cache/cache.types";
import type { RawPool } from "../core/pool/pool.types";
import type { RawPrice } from "../core/price/normalizePrice";

export type FetchPriceParams = {
  chargePointId: string;
  tariffId: string;
  powerType: PowerType;
  power: number; // kW
  market: string;
};

export interface ChargingNetworkClient {
  /** Resolves `null` when the upstream answers without a matching pool. */
  fetchPoolDetails(poolId: string, market: string): Promise<RawPool | null>;
  fetchPrice(params: FetchPriceParams): Promise<RawPrice | null>;
}
