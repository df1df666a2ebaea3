import { ObjectId } from "mongodb";
import type { SaveStationInput } from "../../src/core/cache/cache.types";
import {
  buildBoundsFilter,
  buildEnqueuePipeline,
  buildPriceUpsert,
  buildStationUpsert,
  decodeList,
  decodeRaw,
  encodeList,
  toStationRecord,
  withCoordinatesFilter,
  type StationDoc
} from "../../src/infrastructure/mongo/station-cache.documents";

const now = new Date("2026-03-01T12:00:00.000Z");

const input: SaveStationInput = {
  poolId: "p1",
  market: "de",
  fields: {
    operatorName: "Test Operator",
    locationName: null,
    street: null,
    city: "Berlin",
    zipCode: null,
    maxPower: 22,
    plugTypes: ["Typ2"],
    chargePointsAc: ["a", "b", "a"],
    chargePointsDc: [],
    contactName: null,
    contactPhone: null
  }
};

describe("station cache documents", () => {
  it("encodes lists as de-duplicated JSON text and decodes them back", () => {
    expect(encodeList(["a", "b", "a"])).toBe('["a","b"]');
    expect(decodeList('["a","b"]')).toEqual(["a", "b"]);
  });

  it("decodes empty or corrupt list text to an empty list", () => {
    expect(decodeList("")).toEqual([]);
    expect(decodeList(null)).toEqual([]);
    expect(decodeList("{not json")).toEqual([]);
    expect(decodeList('{"a":1}')).toEqual([]);
    expect(decodeList('["a",1,null]')).toEqual(["a"]);
  });

  it("decodes raw payloads, keeping unparseable text as is", () => {
    expect(decodeRaw('{"x":1}')).toEqual({ x: 1 });
    expect(decodeRaw("plain")).toBe("plain");
    expect(decodeRaw(null)).toBeNull();
  });

  describe("buildStationUpsert", () => {
    it("initialises coalesced fields to null on insert when the write omits them", () => {
      const { filter, update } = buildStationUpsert(input, now);

      expect(filter).toEqual({ _id: "p1" });
      expect(update.$setOnInsert).toEqual({
        createdAt: now,
        latitude: null,
        longitude: null,
        chargePointCount: null,
        operatorId: null
      });
      expect(update.$set).not.toHaveProperty("latitude");
      expect(update.$set).not.toHaveProperty("operatorId");
      expect(update.$set.market).toBe("de");
      expect(update.$set.chargePointsAc).toBe('["a","b"]');
      expect(update.$set.rawData).toBe(JSON.stringify(input.fields));
      expect(update.$set.updatedAt).toBe(now);
    });

    it("sets coalesced fields when the write carries them", () => {
      const { update } = buildStationUpsert(
        { ...input, coordinates: { latitude: 1, longitude: 2 }, chargePointCount: 3, operatorId: "op", rawData: { r: 1 } },
        now
      );

      expect(update.$set).toMatchObject({ latitude: 1, longitude: 2, chargePointCount: 3, operatorId: "op", rawData: '{"r":1}' });
      expect(update.$setOnInsert).toEqual({ createdAt: now });
    });
  });

  it("keys price upserts by pool, tariff, power type and market", () => {
    const { filter, update } = buildPriceUpsert(
      {
        poolId: "p1",
        tariffId: "FLEX",
        powerType: "AC",
        market: "de",
        chargePointId: "cp-1",
        power: 11,
        fields: { currency: "EUR", energyPrice: 0.5, sessionFee: null, blockingFee: null, blockingAfterMinutes: null }
      },
      now,
      () => "price-id"
    );

    expect(filter).toEqual({ poolId: "p1", tariffId: "FLEX", powerType: "AC", market: "de" });
    expect(update.$setOnInsert).toEqual({ _id: "price-id", createdAt: now });
    expect(update.$set).toMatchObject({ chargePointId: "cp-1", power: 11, energyPrice: 0.5, updatedAt: now });
  });

  it("builds an enqueue pipeline that keeps the max priority", () => {
    const ticket = new ObjectId();
    const [stage] = buildEnqueuePipeline("de", 5, now, ticket);

    expect(stage).toEqual({
      $set: {
        market: { $ifNull: ["$market", { $literal: "de" }] },
        enqueuedAt: { $cond: [{ $gt: [{ $literal: 5 }, "$priority"] }, { $literal: now }, "$enqueuedAt"] },
        ticket: { $cond: [{ $gt: [{ $literal: 5 }, "$priority"] }, { $literal: ticket }, "$ticket"] },
        priority: { $max: ["$priority", { $literal: 5 }] },
        lastAttemptAt: { $ifNull: ["$lastAttemptAt", null] },
        attemptCount: { $ifNull: ["$attemptCount", 0] }
      }
    });
  });

  it("builds inclusive bounds and coordinate filters", () => {
    expect(buildBoundsFilter({ latNW: 53, lngNW: 13, latSE: 52, lngSE: 14 }, "de")).toEqual({
      latitude: { $ne: null, $lte: 53, $gte: 52 },
      longitude: { $ne: null, $gte: 13, $lte: 14 },
      market: "de"
    });
    expect(withCoordinatesFilter()).toEqual({ latitude: { $ne: null }, longitude: { $ne: null } });
  });

  it("maps a stored document to a record", () => {
    const doc: StationDoc = {
      _id: "p1",
      market: "de",
      operatorId: null,
      operatorName: "Test Operator",
      locationName: null,
      street: null,
      city: null,
      zipCode: null,
      latitude: 52.5,
      longitude: null,
      maxPower: 22,
      plugTypes: '["Typ2"]',
      chargePointsAc: '["a"]',
      chargePointsDc: "[]",
      contactName: null,
      contactPhone: null,
      chargePointCount: null,
      rawData: '{"dcsPoolId":"p1"}',
      createdAt: now,
      updatedAt: now
    };

    const record = toStationRecord(doc);
    expect(record.poolId).toBe("p1");
    expect(record.latitude).toBeNull();
    expect(record.longitude).toBeNull();
    expect(record.plugTypes).toEqual(["Typ2"]);
    expect(record.chargePointsAc).toEqual(["a"]);
    expect(record.rawData).toEqual({ dcsPoolId: "p1" });
  });
});
