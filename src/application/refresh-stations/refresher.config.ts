import type { PowerType } from "../../core/cache/cache.types";

export type RefresherConfig = {
  tariffs: string[];
  referencePower: Record<PowerType, number>;
  defaultMarket: string;
  sweepLimit: number;
  sweepPriority: number;
  startupGraceMs: number;
  idleWaitMs: number;
  errorBackoffMs: number;
  stopTimeoutMs: number;
  logRetentionDays: number;
  logPruneIntervalMs: number;
};

export type RefresherConfigInput = Partial<RefresherConfig>;

export const defaultRefresherConfig: RefresherConfig = {
  tariffs: ["HYUNDAI_FLEX", "HYUNDAI_SMART"],
  referencePower: { AC: 11, DC: 50 },
  defaultMarket: "de",
  sweepLimit: 50,
  sweepPriority: 1,
  startupGraceMs: 5000,
  idleWaitMs: 60000,
  errorBackoffMs: 30000,
  stopTimeoutMs: 10000,
  logRetentionDays: 7,
  logPruneIntervalMs: 24 * 60 * 60 * 1000
};

export const refresherCaps = {
  sweepLimit: { min: 1, max: 1000 },
  startupGraceMs: { min: 0, max: 600000 },
  idleWaitMs: { min: 1, max: 3600000 },
  errorBackoffMs: { min: 1, max: 3600000 },
  stopTimeoutMs: { min: 1, max: 600000 },
  logRetentionDays: { min: 1, max: 365 }
} as const;

const assertIntegerInRange = (name: string, value: number, min: number, max: number) => {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(`${name}=${String(value)} is out of allowed range [${min}..${max}]`);
  }
};

export const validateRefresherConfig = (config: RefresherConfig): RefresherConfig => {
  assertIntegerInRange("sweepLimit", config.sweepLimit, refresherCaps.sweepLimit.min, refresherCaps.sweepLimit.max);
  assertIntegerInRange("startupGraceMs", config.startupGraceMs, refresherCaps.startupGraceMs.min, refresherCaps.startupGraceMs.max);
  assertIntegerInRange("idleWaitMs", config.idleWaitMs, refresherCaps.idleWaitMs.min, refresherCaps.idleWaitMs.max);
  assertIntegerInRange("errorBackoffMs", config.errorBackoffMs, refresherCaps.errorBackoffMs.min, refresherCaps.errorBackoffMs.max);
  assertIntegerInRange("stopTimeoutMs", config.stopTimeoutMs, refresherCaps.stopTimeoutMs.min, refresherCaps.stopTimeoutMs.max);
  assertIntegerInRange("logRetentionDays", config.logRetentionDays, refresherCaps.logRetentionDays.min, refresherCaps.logRetentionDays.max);
  if (config.tariffs.length === 0) {
    throw new Error("tariffs must name at least one tariff");
  }
  if (config.defaultMarket.trim() === "") {
    throw new Error("defaultMarket must not be empty");
  }
  return config;
};

export const resolveRefresherConfig = (input: RefresherConfigInput = {}): RefresherConfig =>
  validateRefresherConfig({
    ...defaultRefresherConfig,
    ...input,
    tariffs: (input.tariffs ?? defaultRefresherConfig.tariffs).map((t) => t.trim()).filter((t) => t !== ""),
    referencePower: { ...defaultRefresherConfig.referencePower, ...input.referencePower }
  });
