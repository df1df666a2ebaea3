import type { PowerType } from "./cache.types";

export const DEFAULT_CACHE_EXPIRY_HOURS = 24;

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

/**
 * Keeps the first occurrence of every id, preserving order.
 */
export const dedupeIds = (ids: readonly string[]): string[] => Array.from(new Set(ids));

export const staleCutoff = (now: Date, maxAgeHours: number): Date => new Date(now.getTime() - maxAgeHours * HOUR_MS);

export const retentionCutoff = (now: Date, days: number): Date => new Date(now.getTime() - days * DAY_MS);

export const isRecordStale = (updatedAt: Date | undefined, now: Date, maxAgeHours: number): boolean => {
  if (!updatedAt) return true;
  return now.getTime() - updatedAt.getTime() > maxAgeHours * HOUR_MS;
};

export const priceSlotKey = (tariffId: string, powerType: PowerType): string => `${tariffId}_${powerType}`;
