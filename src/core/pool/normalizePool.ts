import type { PowerType } from "../cache/cache.types";
import type { NormalizedPool } from "./pool.types";

export class InvalidPoolPayloadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidPoolPayloadError";
  }
}

export const UNKNOWN_OPERATOR = "Unknown";

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const records = (value: unknown): Record<string, unknown>[] =>
  Array.isArray(value) ? value.filter(isRecord) : [];

const optionalString = (value: unknown): string | null =>
  typeof value === "string" && value.trim() !== "" ? value : null;

const optionalNumber = (value: unknown): number | null =>
  typeof value === "number" && Number.isFinite(value) ? value : null;

const AC_PLUG_MARKERS = ["TYP2", "TYPE2", "TYPE 2"];
const DC_PLUG_MARKERS = ["CCS", "COMBO"];

/**
 * Plug type decides first; the connector's phase type is the fallback.
 */
export const classifyConnector = (plugType: string, phaseType: unknown): PowerType => {
  const upper = plugType.toUpperCase();
  if (AC_PLUG_MARKERS.some((marker) => upper.includes(marker))) return "AC";
  if (DC_PLUG_MARKERS.some((marker) => upper.includes(marker))) return "DC";
  return phaseType === "DC" ? "DC" : "AC";
};

export const normalizePool = (raw: unknown): NormalizedPool => {
  if (!isRecord(raw)) {
    throw new InvalidPoolPayloadError("Invalid pool: payload is not an object");
  }

  const location = records(raw.poolLocations)[0];
  const locationName = location ? records(location.poolLocationNames)[0] : undefined;
  const contact = records(raw.poolContacts)[0];

  let maxPower = 0;
  const plugTypes = new Set<string>();
  const chargePoints: Record<PowerType, Set<string>> = { AC: new Set(), DC: new Set() };

  for (const station of records(raw.chargingStations)) {
    for (const chargePoint of records(station.chargePoints)) {
      const chargePointId = optionalString(chargePoint.dcsCpId);
      if (!chargePointId) continue;

      for (const connector of records(chargePoint.connectors)) {
        const powerLevel = optionalNumber(connector.powerLevel) ?? 0;
        if (powerLevel > maxPower) maxPower = powerLevel;

        const plugType = optionalString(connector.plugType) ?? "";
        if (plugType) plugTypes.add(plugType);

        chargePoints[classifyConnector(plugType, connector.phaseType)].add(chargePointId);
      }
    }
  }

  const latitude = optionalNumber(raw.latitude);
  const longitude = optionalNumber(raw.longitude);

  return {
    fields: {
      operatorName: optionalString(raw.technicalChargePointOperatorName) ?? UNKNOWN_OPERATOR,
      locationName: optionalString(locationName?.name),
      street: optionalString(location?.street),
      city: optionalString(location?.city),
      zipCode: optionalString(location?.zipCode),
      maxPower,
      plugTypes: Array.from(plugTypes),
      chargePointsAc: Array.from(chargePoints.AC),
      chargePointsDc: Array.from(chargePoints.DC),
      contactName: optionalString(contact?.name),
      contactPhone: optionalString(contact?.phone)
    },
    coordinates: latitude != null && longitude != null ? { latitude, longitude } : null,
    chargePointCount: optionalNumber(raw.chargePointCount),
    operatorId: optionalString(raw.dcsTcpoId)
  };
};
