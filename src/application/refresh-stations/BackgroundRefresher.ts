import type { StoreFailureError } from "../../core/cache/cache.errors";
import type { ChargingNetworkClient } from "../../ports/ChargingNetworkClient";
import type { StationCacheStore } from "../../ports/StationCacheStore";
import type { SlidingWindowRateLimiter } from "../../shared/rate-limit/SlidingWindowRateLimiter";
import { sleep as defaultSleep, type Sleep } from "../../shared/time/sleep";
import {
  createRefreshActivityTracker,
  isFatalForItem,
  toErrorMessage,
  type RefreshActivityTracker
} from "./refresh.error-handler";
import { refreshStation } from "./refreshStation";
import { resolveRefresherConfig, type RefresherConfig, type RefresherConfigInput } from "./refresher.config";

export type UpdaterStatus = {
  running: boolean;
  lastUpdateTime: string | null;
  updatesToday: number;
  errorsToday: number;
  queueSize: number;
  staleStations: number;
  totalStations: number;
  freshStations: number;
};

export type BackgroundRefresherDeps = {
  store: StationCacheStore;
  client: ChargingNetworkClient;
  limiter: SlidingWindowRateLimiter;
  config?: RefresherConfigInput;
  activity?: RefreshActivityTracker;
  sleep?: Sleep;
  now?: () => Date;
};

const log = (level: "log" | "warn" | "error", payload: Record<string, unknown>) => {
  // eslint-disable-next-line no-console
  console[level](JSON.stringify(payload));
};

/**
 * The single background worker of the process: sweeps stale stations into the
 * queue, then drains one queued pool per cycle under the shared rate limiter.
 *
 * Every wait (startup grace, idle, limiter poll, error backoff) observes the stop
 * signal. A pool leaves the queue once its refresh finished, failed or not; only an
 * interrupted refresh stays queued and is picked up again on the next start.
 */
export class BackgroundRefresher {
  readonly config: RefresherConfig;
  readonly activity: RefreshActivityTracker;
  private readonly sleep: Sleep;
  private readonly now: () => Date;
  private controller?: AbortController;
  private loop?: Promise<void>;
  private lastPrunedAt?: number;

  constructor(private readonly deps: BackgroundRefresherDeps) {
    this.config = resolveRefresherConfig(deps.config);
    this.now = deps.now ?? (() => new Date());
    this.activity = deps.activity ?? createRefreshActivityTracker(this.now);
    this.sleep = deps.sleep ?? defaultSleep;
  }

  start(): void {
    if (this.isRunning()) {
      log("warn", { event: "refresher.already_running" });
      return;
    }

    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.run(controller.signal).catch((err: unknown) => {
      log("error", { event: "refresher.loop_crashed", message: toErrorMessage(err) });
    });
    log("log", { event: "refresher.started" });
  }

  /**
   * Signals the loop and waits for it to exit, at most `stopTimeoutMs`.
   */
  async stop(): Promise<void> {
    const controller = this.controller;
    const loop = this.loop;
    if (!controller || !loop) return;

    log("log", { event: "refresher.stopping" });
    controller.abort();

    let timer: NodeJS.Timeout | undefined;
    const timedOut = await Promise.race([
      loop.then(() => false),
      new Promise<boolean>((resolve) => {
        timer = setTimeout(() => resolve(true), this.config.stopTimeoutMs);
        timer.unref();
      })
    ]);
    clearTimeout(timer);

    this.controller = undefined;
    this.loop = undefined;
    log(timedOut ? "warn" : "log", { event: timedOut ? "refresher.stop_timeout" : "refresher.stopped" });
  }

  isRunning(): boolean {
    return this.controller != null && !this.controller.signal.aborted;
  }

  async getStatus(): Promise<UpdaterStatus> {
    const stats = await this.deps.store.getStats();
    const activity = this.activity.snapshot();
    return {
      running: this.isRunning(),
      lastUpdateTime: activity.lastUpdateTime ? activity.lastUpdateTime.toISOString() : null,
      updatesToday: activity.updatesToday,
      errorsToday: activity.errorsToday,
      queueSize: stats.queueSize,
      staleStations: stats.staleStations,
      totalStations: stats.totalStations,
      freshStations: stats.freshStations
    };
  }

  /**
   * One sweep plus one drain attempt. Resolves `true` when a queued pool was handled.
   */
  async runCycle(signal: AbortSignal = new AbortController().signal): Promise<boolean> {
    await this.sweepStale();
    return this.drainOne(signal);
  }

  async sweepStale(): Promise<number> {
    const { store } = this.deps;
    const staleIds = await store.getStaleStationIds({ limit: this.config.sweepLimit });
    if (staleIds.length === 0) return 0;

    const stations = await store.getStations(staleIds);
    for (const poolId of staleIds) {
      const market = stations.get(poolId)?.market ?? this.config.defaultMarket;
      await store.enqueue(poolId, market, this.config.sweepPriority);
    }
    return staleIds.length;
  }

  async drainOne(signal: AbortSignal): Promise<boolean> {
    const { store, client, limiter } = this.deps;

    await limiter.awaitTurn(signal);
    if (signal.aborted) return false;

    const target = await store.dequeueNext();
    if (!target) return false;

    const startedAt = this.now().getTime();
    let success = false;
    let errorMessage: string | null = null;
    let fatal: StoreFailureError | undefined;

    try {
      const outcome = await refreshStation({ store, client, limiter, config: this.config }, target, signal);
      if (outcome.aborted) {
        log("log", { event: "refresh.abandoned", poolId: target.poolId, pricesSaved: outcome.pricesSaved });
        return true;
      }
      success = true;
      this.activity.recordSuccess();
      log("log", {
        event: "refresh.completed",
        poolId: target.poolId,
        pricesSaved: outcome.pricesSaved,
        pricesFailed: outcome.pricesFailed
      });
    } catch (err) {
      errorMessage = toErrorMessage(err);
      if (isFatalForItem(err)) {
        fatal = err;
      } else {
        this.activity.recordError();
        log("warn", { event: "refresh.failed", poolId: target.poolId, market: target.market, message: errorMessage });
      }
    }

    await store.removeFromQueue(target.poolId);
    await store.logUpdate({
      poolId: target.poolId,
      kind: "queued-sweep",
      success,
      errorMessage,
      durationMs: this.now().getTime() - startedAt
    });

    // the loop counts and backs off
    if (fatal) throw fatal;
    return true;
  }

  /**
   * Drops update-log entries past the retention window, at most once per prune interval.
   */
  async pruneLogIfDue(): Promise<number> {
    const nowMs = this.now().getTime();
    if (this.lastPrunedAt != null && nowMs - this.lastPrunedAt < this.config.logPruneIntervalMs) return 0;

    const removed = await this.deps.store.pruneUpdateLog(this.config.logRetentionDays);
    this.lastPrunedAt = nowMs;
    if (removed > 0) {
      log("log", { event: "update_log.pruned", removed, retentionDays: this.config.logRetentionDays });
    }
    return removed;
  }

  private async run(signal: AbortSignal): Promise<void> {
    await this.sleep(this.config.startupGraceMs, signal);

    while (!signal.aborted) {
      try {
        await this.pruneLogIfDue();
        const processed = await this.runCycle(signal);
        if (!processed && !signal.aborted) {
          await this.sleep(this.config.idleWaitMs, signal);
        }
      } catch (err) {
        this.activity.recordError();
        log("error", { event: "refresher.cycle_failed", message: toErrorMessage(err) });
        await this.sleep(this.config.errorBackoffMs, signal);
      }
    }

    log("log", { event: "refresher.loop_ended" });
  }
}
