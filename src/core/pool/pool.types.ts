import type { Coordinates, StationFields } from "../cache/cache.types";

export type RawPool = Record<string, unknown>;

export type NormalizedPool = {
  fields: StationFields;
  coordinates: Coordinates | null;
  chargePointCount: number | null;
  operatorId: string | null;
};
