import { RateLimitExceededError } from "../../core/cache/cache.errors";
import type { StationRecord } from "../../core/cache/cache.types";
import {
  countsAsRefreshError,
  toErrorMessage,
  type RefreshActivityTracker
} from "./refresh.error-handler";
import { refreshStation, type RefreshDeps } from "./refreshStation";

export type ForceUpdateDeps = RefreshDeps & {
  activity: RefreshActivityTracker;
  now?: () => Date;
};

/**
 * Synchronous refresh for one pool, bypassing the queue. Fails fast with
 * `RateLimitExceededError` instead of waiting for quota; otherwise competes with the
 * background loop for the same limiter.
 *
 * Queue cleanup and logging happen on success and failure alike; when the refresh
 * itself failed, a cleanup failure is logged and the refresh error is rethrown.
 */
export const forceUpdate = async (
  deps: ForceUpdateDeps,
  poolId: string,
  market: string
): Promise<StationRecord | undefined> => {
  const { store, limiter, activity } = deps;
  const now = deps.now ?? (() => new Date());
  const startedAt = now().getTime();

  let failed = false;
  let failure: unknown;
  try {
    if (!limiter.canProceed()) {
      throw new RateLimitExceededError({ poolId, market });
    }
    await refreshStation(deps, { poolId, market });
    activity.recordSuccess();
  } catch (err) {
    failed = true;
    failure = err;
    if (countsAsRefreshError(err)) activity.recordError();
  }

  try {
    await store.removeFromQueue(poolId);
    await store.logUpdate({
      poolId,
      kind: "manual",
      success: !failed,
      errorMessage: failed ? toErrorMessage(failure) : null,
      durationMs: now().getTime() - startedAt
    });
  } catch (cleanupError) {
    if (!failed) throw cleanupError;
    // eslint-disable-next-line no-console
    console.error(JSON.stringify({
      event: "refresh.cleanup_failed",
      poolId,
      message: toErrorMessage(cleanupError)
    }));
  }

  if (failed) throw failure;

  return store.getStation(poolId);
};
