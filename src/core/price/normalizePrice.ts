import type { PriceFields } from "../cache/cache.types";

export type RawPrice = Record<string, unknown>;

export const DEFAULT_CURRENCY = "EUR";

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const records = (value: unknown): Record<string, unknown>[] =>
  Array.isArray(value) ? value.filter(isRecord) : [];

const optionalNumber = (value: unknown): number | null =>
  typeof value === "number" && Number.isFinite(value) ? value : null;

/**
 * Maps tariff price elements onto the cached price fields:
 * ENERGY per kWh, FLAT per session, TIME as blocking fee starting after `min_duration` seconds.
 */
export const normalizePrice = (raw: RawPrice): PriceFields => {
  const fields: PriceFields = {
    currency: typeof raw.currency === "string" && raw.currency !== "" ? raw.currency : DEFAULT_CURRENCY,
    energyPrice: null,
    sessionFee: null,
    blockingFee: null,
    blockingAfterMinutes: null
  };

  for (const element of records(raw.elements)) {
    for (const component of records(element.price_components)) {
      const price = optionalNumber(component.price);
      switch (component.type) {
        case "ENERGY":
          fields.energyPrice = price;
          break;
        case "FLAT":
          fields.sessionFee = price;
          break;
        case "TIME": {
          fields.blockingFee = price;
          const restrictions = isRecord(element.restrictions) ? element.restrictions : {};
          const minDuration = optionalNumber(restrictions.min_duration);
          if (minDuration) {
            fields.blockingAfterMinutes = Math.floor(minDuration / 60);
          }
          break;
        }
        default:
          break;
      }
    }
  }

  return fields;
};
