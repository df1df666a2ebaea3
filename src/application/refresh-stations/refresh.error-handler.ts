import { RateLimitExceededError, StoreFailureError } from "../../core/cache/cache.errors";

export const toErrorMessage = (reason: unknown): string => {
  if (reason instanceof Error) return reason.message;
  return String(reason);
};

/**
 * Store failures reach the loop (or the manual caller) after the item is finalized,
 * instead of being counted as an ordinary refresh error.
 */
export const isFatalForItem = (reason: unknown): reason is StoreFailureError => reason instanceof StoreFailureError;

export const countsAsRefreshError = (reason: unknown): boolean => !(reason instanceof RateLimitExceededError);

export type RefreshActivity = {
  lastUpdateTime: Date | null;
  updatesToday: number;
  errorsToday: number;
};

const utcDay = (date: Date) => date.toISOString().slice(0, 10);

/**
 * Success/error counters shared by the background loop and manual refreshes.
 * "Today" is the current UTC date; counters reset when it changes.
 */
export const createRefreshActivityTracker = (now: () => Date = () => new Date()) => {
  let day = utcDay(now());
  let lastUpdateTime: Date | null = null;
  let updatesToday = 0;
  let errorsToday = 0;

  const rollOver = () => {
    const today = utcDay(now());
    if (today !== day) {
      day = today;
      updatesToday = 0;
      errorsToday = 0;
    }
  };

  return {
    recordSuccess: () => {
      rollOver();
      updatesToday += 1;
      lastUpdateTime = now();
    },
    recordError: () => {
      rollOver();
      errorsToday += 1;
    },
    snapshot: (): RefreshActivity => {
      rollOver();
      return { lastUpdateTime, updatesToday, errorsToday };
    }
  };
};

export type RefreshActivityTracker = ReturnType<typeof createRefreshActivityTracker>;
