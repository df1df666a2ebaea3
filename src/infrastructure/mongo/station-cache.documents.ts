import { randomUUID } from "crypto";
import type { Document, Filter, ObjectId } from "mongodb";
import { dedupeIds } from "../../core/cache/cache.rules";
import type {
  GeoBounds,
  PowerType,
  PriceRecord,
  SavePriceInput,
  SaveStationInput,
  StationRecord,
  UpdateKind
} from "../../core/cache/cache.types";

/**
 * List-typed fields and raw payload snapshots are persisted as JSON text.
 */
export type StationDoc = {
  _id: string; // pool id
  market: string;
  operatorId: string | null;
  operatorName: string | null;
  locationName: string | null;
  street: string | null;
  city: string | null;
  zipCode: string | null;
  latitude: number | null;
  longitude: number | null;
  maxPower: number | null;
  plugTypes: string;
  chargePointsAc: string;
  chargePointsDc: string;
  contactName: string | null;
  contactPhone: string | null;
  chargePointCount: number | null;
  rawData: string;
  createdAt: Date;
  updatedAt: Date;
};

export type PriceDoc = {
  _id: string; // UUIDv4
  poolId: string;
  chargePointId: string;
  tariffId: string;
  powerType: PowerType;
  power: number;
  market: string;
  currency: string;
  energyPrice: number | null;
  sessionFee: number | null;
  blockingFee: number | null;
  blockingAfterMinutes: number | null;
  rawData: string;
  createdAt: Date;
  updatedAt: Date;
};

export type UpdateQueueDoc = {
  _id: string; // pool id
  market: string;
  priority: number;
  enqueuedAt: Date;
  ticket: ObjectId; // insertion order for equal priority and timestamp
  lastAttemptAt: Date | null;
  attemptCount: number;
};

export type UpdateLogDoc = {
  poolId: string;
  kind: UpdateKind;
  success: boolean;
  errorMessage: string | null;
  durationMs: number;
  createdAt: Date;
};

export const encodeList = (values: readonly string[]): string => JSON.stringify(dedupeIds(values));

export const decodeList = (text: string | null | undefined): string[] => {
  if (!text) return [];
  try {
    const parsed: unknown = JSON.parse(text);
    return Array.isArray(parsed) ? parsed.filter((v): v is string => typeof v === "string") : [];
  } catch {
    return [];
  }
};

export const encodeRaw = (value: unknown): string => JSON.stringify(value ?? null);

export const decodeRaw = (text: string | null | undefined): unknown => {
  if (text == null) return null;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
};

export const toStationRecord = (doc: StationDoc): StationRecord => {
  const hasCoordinates = doc.latitude != null && doc.longitude != null;
  return {
    poolId: doc._id,
    market: doc.market,
    operatorId: doc.operatorId ?? null,
    operatorName: doc.operatorName ?? null,
    locationName: doc.locationName ?? null,
    street: doc.street ?? null,
    city: doc.city ?? null,
    zipCode: doc.zipCode ?? null,
    latitude: hasCoordinates ? doc.latitude : null,
    longitude: hasCoordinates ? doc.longitude : null,
    maxPower: doc.maxPower ?? null,
    plugTypes: decodeList(doc.plugTypes),
    chargePointsAc: decodeList(doc.chargePointsAc),
    chargePointsDc: decodeList(doc.chargePointsDc),
    contactName: doc.contactName ?? null,
    contactPhone: doc.contactPhone ?? null,
    chargePointCount: doc.chargePointCount ?? null,
    rawData: decodeRaw(doc.rawData),
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt
  };
};

export const toPriceRecord = (doc: PriceDoc): PriceRecord => ({
  poolId: doc.poolId,
  chargePointId: doc.chargePointId,
  tariffId: doc.tariffId,
  powerType: doc.powerType,
  power: doc.power,
  market: doc.market,
  currency: doc.currency,
  energyPrice: doc.energyPrice ?? null,
  sessionFee: doc.sessionFee ?? null,
  blockingFee: doc.blockingFee ?? null,
  blockingAfterMinutes: doc.blockingAfterMinutes ?? null,
  rawData: decodeRaw(doc.rawData),
  createdAt: doc.createdAt,
  updatedAt: doc.updatedAt
});

/**
 * Station upsert. Coordinates, charge-point count and operator id are only `$set`
 * when the write carries them; otherwise they are initialised to null on insert and
 * left untouched on update.
 */
export const buildStationUpsert = (input: SaveStationInput, now: Date) => {
  const { fields } = input;
  const $set: Partial<StationDoc> = {
    market: input.market,
    operatorName: fields.operatorName,
    locationName: fields.locationName,
    street: fields.street,
    city: fields.city,
    zipCode: fields.zipCode,
    maxPower: fields.maxPower,
    plugTypes: encodeList(fields.plugTypes),
    chargePointsAc: encodeList(fields.chargePointsAc),
    chargePointsDc: encodeList(fields.chargePointsDc),
    contactName: fields.contactName,
    contactPhone: fields.contactPhone,
    rawData: encodeRaw(input.rawData ?? fields),
    updatedAt: now
  };
  const $setOnInsert: Partial<StationDoc> = { createdAt: now };

  if (input.coordinates) {
    $set.latitude = input.coordinates.latitude;
    $set.longitude = input.coordinates.longitude;
  } else {
    $setOnInsert.latitude = null;
    $setOnInsert.longitude = null;
  }

  if (input.chargePointCount != null) {
    $set.chargePointCount = input.chargePointCount;
  } else {
    $setOnInsert.chargePointCount = null;
  }

  if (input.operatorId != null) {
    $set.operatorId = input.operatorId;
  } else {
    $setOnInsert.operatorId = null;
  }

  return {
    filter: { _id: input.poolId },
    update: { $set, $setOnInsert }
  };
};

export const buildPriceUpsert = (input: SavePriceInput, now: Date, newId: () => string = randomUUID) => {
  const $set: Partial<PriceDoc> = {
    chargePointId: input.chargePointId,
    power: input.power,
    currency: input.fields.currency,
    energyPrice: input.fields.energyPrice,
    sessionFee: input.fields.sessionFee,
    blockingFee: input.fields.blockingFee,
    blockingAfterMinutes: input.fields.blockingAfterMinutes,
    rawData: encodeRaw(input.rawData ?? input.fields),
    updatedAt: now
  };

  return {
    filter: {
      poolId: input.poolId,
      tariffId: input.tariffId,
      powerType: input.powerType,
      market: input.market
    },
    update: {
      $set,
      $setOnInsert: { _id: newId(), createdAt: now }
    }
  };
};

/**
 * Pipeline update for `enqueue`: priority becomes max(old, new); `enqueuedAt` and the
 * ordering ticket only move when the new priority is strictly higher. A missing
 * document compares lower than any number, so an insert takes the new values.
 */
export const buildEnqueuePipeline = (market: string, priority: number, now: Date, ticket: ObjectId): Document[] => {
  const escalates = { $gt: [{ $literal: priority }, "$priority"] };
  return [
    {
      $set: {
        market: { $ifNull: ["$market", { $literal: market }] },
        enqueuedAt: { $cond: [escalates, { $literal: now }, "$enqueuedAt"] },
        ticket: { $cond: [escalates, { $literal: ticket }, "$ticket"] },
        priority: { $max: ["$priority", { $literal: priority }] },
        lastAttemptAt: { $ifNull: ["$lastAttemptAt", null] },
        attemptCount: { $ifNull: ["$attemptCount", 0] }
      }
    }
  ];
};

export const queueOrder = { priority: -1, enqueuedAt: 1, ticket: 1 } as const;

export const withCoordinatesFilter = (market?: string): Filter<StationDoc> => ({
  latitude: { $ne: null },
  longitude: { $ne: null },
  ...(market ? { market } : {})
});

/**
 * Inclusive box: NW corner is the max latitude / min longitude, SE the opposite.
 */
export const buildBoundsFilter = (bounds: GeoBounds, market?: string): Filter<StationDoc> => ({
  latitude: { $ne: null, $lte: bounds.latNW, $gte: bounds.latSE },
  longitude: { $ne: null, $gte: bounds.lngNW, $lte: bounds.lngSE },
  ...(market ? { market } : {})
});
