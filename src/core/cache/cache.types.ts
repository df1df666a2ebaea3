export type PowerType = "AC" | "DC";

export const powerTypes: readonly PowerType[] = ["AC", "DC"];

export type Coordinates = {
  latitude: number;
  longitude: number;
};

/**
 * Fields recomputed from an upstream pool payload on every refresh.
 */
export type StationFields = {
  operatorName: string | null;
  locationName: string | null;
  street: string | null;
  city: string | null;
  zipCode: string | null;
  maxPower: number | null;
  plugTypes: string[];
  chargePointsAc: string[];
  chargePointsDc: string[];
  contactName: string | null;
  contactPhone: string | null;
};

export type StationRecord = StationFields & {
  poolId: string;
  market: string;
  operatorId: string | null;
  latitude: number | null;
  longitude: number | null;
  chargePointCount: number | null;
  rawData: unknown;
  createdAt: Date;
  updatedAt: Date;
};

export type SaveStationInput = {
  poolId: string;
  market: string;
  fields: StationFields;
  coordinates?: Coordinates | null;
  chargePointCount?: number | null;
  operatorId?: string | null;
  rawData?: unknown;
};

export type PriceFields = {
  currency: string;
  energyPrice: number | null;
  sessionFee: number | null;
  blockingFee: number | null;
  blockingAfterMinutes: number | null;
};

export type PriceKey = {
  poolId: string;
  tariffId: string;
  powerType: PowerType;
  market: string;
};

export type PriceRecord = PriceKey &
  PriceFields & {
    chargePointId: string;
    power: number;
    rawData: unknown;
    createdAt: Date;
    updatedAt: Date;
  };

export type SavePriceInput = PriceKey & {
  chargePointId: string;
  power: number;
  fields: PriceFields;
  rawData?: unknown;
};

export type UpdateQueueEntry = {
  poolId: string;
  market: string;
  priority: number;
  enqueuedAt: Date;
  lastAttemptAt: Date | null;
  attemptCount: number;
};

export type QueueTarget = {
  poolId: string;
  market: string;
};

export type UpdateKind = "queued-sweep" | "manual";

export type UpdateLogEntry = {
  poolId: string;
  kind: UpdateKind;
  success: boolean;
  errorMessage: string | null;
  durationMs: number;
  createdAt: Date;
};

export type GeoBounds = {
  latNW: number;
  lngNW: number;
  latSE: number;
  lngSE: number;
};

export type CacheStats = {
  totalStations: number;
  totalPrices: number;
  freshStations: number;
  staleStations: number;
  queueSize: number;
  cacheExpiryHours: number;
};
