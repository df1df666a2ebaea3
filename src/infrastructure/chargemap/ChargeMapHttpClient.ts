import { UpstreamRequestError } from "../../core/cache/cache.errors";
import type { RawPool } from "../../core/pool/pool.types";
import type { RawPrice } from "../../core/price/normalizePrice";
import type { ChargingNetworkClient, FetchPriceParams } from "../../ports/ChargingNetworkClient";

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * HTTP client for the charging network's map API (native fetch, Node 20).
 *
 * There is no retry here: every attempt is an upstream call that has to pass the
 * shared rate limiter, so retrying is left to the refresh loop.
 */
export class ChargeMapHttpClient implements ChargingNetworkClient {
  constructor(
    private readonly baseUrl: string,
    private readonly timeoutMs = 30000
  ) {}

  async fetchPoolDetails(poolId: string, market: string): Promise<RawPool | null> {
    const json = await this.post(
      [market, "query"],
      { dcsPoolIds: [poolId] },
      { "rest-api-path": "pools" }
    );
    return this.firstItem(json);
  }

  async fetchPrice(params: FetchPriceParams): Promise<RawPrice | null> {
    const json = await this.post(
      [params.market, "tariffs", params.tariffId, "prices"],
      [{ charge_point: params.chargePointId, power_type: params.powerType, power: params.power }]
    );
    return this.firstItem(json);
  }

  private buildUrl(segments: string[]): URL {
    const url = new URL(this.baseUrl);
    const base = url.pathname.endsWith("/") ? url.pathname.slice(0, -1) : url.pathname;
    url.pathname = `${base}/${segments.map(encodeURIComponent).join("/")}`;
    return url;
  }

  private firstItem(json: unknown): Record<string, unknown> | null {
    if (!Array.isArray(json)) {
      throw new UpstreamRequestError({ message: "Upstream response is not an array" });
    }
    const [first] = json;
    return isRecord(first) ? first : null;
  }

  private async post(segments: string[], body: unknown, extraHeaders: Record<string, string> = {}): Promise<unknown> {
    const url = this.buildUrl(segments);
    const safeRequestUrl = `${url.origin}${url.pathname}`;

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      let res: Response;
      try {
        res = await fetch(url.toString(), {
          method: "POST",
          headers: {
            "Content-Type": "application/json",
            Accept: "application/json, text/plain, */*",
            ...extraHeaders
          },
          body: JSON.stringify(body),
          signal: controller.signal
        });
      } catch (err) {
        throw this.failure(err, controller.signal, safeRequestUrl);
      }

      if (!res.ok) {
        await res.text().catch(() => "");
        const error = new UpstreamRequestError({
          message: `Upstream request failed: ${res.status}`,
          status: res.status,
          requestUrl: safeRequestUrl
        });
        this.warn(error);
        throw error;
      }

      // the timer stays armed until the body is read
      let text: string;
      try {
        text = await res.text();
      } catch (err) {
        throw this.failure(err, controller.signal, safeRequestUrl, res.status);
      }

      try {
        const parsed: unknown = JSON.parse(text);
        return parsed;
      } catch (err) {
        throw new UpstreamRequestError({
          message: "Upstream response is not valid JSON",
          status: res.status,
          requestUrl: safeRequestUrl,
          cause: err
        });
      }
    } finally {
      clearTimeout(timeout);
    }
  }

  private failure(err: unknown, signal: AbortSignal, requestUrl: string, status?: number): UpstreamRequestError {
    const timedOut = signal.aborted;
    const error = new UpstreamRequestError({
      message: timedOut
        ? `Upstream request timeout after ${this.timeoutMs}ms`
        : `Upstream request failed: ${err instanceof Error ? err.message : String(err)}`,
      status,
      isTimeout: timedOut,
      requestUrl,
      cause: err
    });
    this.warn(error);
    return error;
  }

  private warn(error: UpstreamRequestError): void {
    // eslint-disable-next-line no-console
    console.warn(JSON.stringify({
      event: "http.request_failed",
      status: error.status ?? null,
      timeout: error.isTimeout,
      url: error.requestUrl ?? null
    }));
  }
}
