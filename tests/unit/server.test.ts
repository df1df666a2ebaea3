import type http from "http";
import type { AddressInfo } from "net";
import { StoreFailureError, UpstreamRequestError } from "../../src/core/cache/cache.errors";
import { createServer, statusForError } from "../../src/server";
import { buildRawPool } from "../support/fakes";
import { createTestService } from "../support/testService";

const listen = async (server: http.Server): Promise<string> => {
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", () => resolve()));
  const address = server.address() as AddressInfo;
  return `http://127.0.0.1:${address.port}`;
};

const close = (server: http.Server) =>
  new Promise<void>((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });

describe("admin server", () => {
  let errorSpy: jest.SpyInstance;
  let server: http.Server;
  let baseUrl: string;
  let ctx: ReturnType<typeof createTestService>;

  beforeEach(async () => {
    jest.spyOn(console, "warn").mockImplementation(() => undefined);
    errorSpy = jest.spyOn(console, "error").mockImplementation(() => undefined);
    ctx = createTestService();
    server = createServer(ctx.service);
    baseUrl = await listen(server);
  });

  afterEach(async () => {
    await close(server);
    jest.restoreAllMocks();
  });

  const post = (path: string, body: string) =>
    fetch(`${baseUrl}${path}`, { method: "POST", headers: { "content-type": "application/json" }, body });

  it("answers health checks", async () => {
    const res = await fetch(`${baseUrl}/health`);
    expect(res.status).toBe(200);
    await expect(res.json()).resolves.toEqual({ ok: true });
  });

  it("returns 404 for unknown routes", async () => {
    const res = await fetch(`${baseUrl}/nope`);
    expect(res.status).toBe(404);
    await expect(res.json()).resolves.toEqual({ error: "not_found" });
  });

  it("reports cache stats, updater status and limiter usage", async () => {
    ctx.limiter.recordRequest();
    const res = await fetch(`${baseUrl}/cache/stats`);

    expect(res.status).toBe(200);
    await expect(res.json()).resolves.toEqual({
      cache: {
        totalStations: 0,
        totalPrices: 0,
        freshStations: 0,
        staleStations: 0,
        queueSize: 0,
        cacheExpiryHours: 24
      },
      updater: {
        running: false,
        lastUpdateTime: null,
        updatesToday: 0,
        errorsToday: 0,
        queueSize: 0,
        staleStations: 0,
        totalStations: 0,
        freshStations: 0
      },
      rateLimit: { inWindow: 1, limit: 3, windowMs: 10000 }
    });
  });

  it("refreshes a pool on demand and returns its prices", async () => {
    ctx.client.pools.set("p1", buildRawPool("p1"));

    const res = await post("/cache/refresh", JSON.stringify({ poolId: "p1" }));
    const body = (await res.json()) as { success: boolean; station: { poolId: string; market: string }; prices: Record<string, unknown> };

    expect(res.status).toBe(200);
    expect(body.success).toBe(true);
    expect(body.station).toMatchObject({ poolId: "p1", market: "de" });
    expect(Object.keys(body.prices).sort()).toEqual(["FLEX_AC", "FLEX_DC", "SMART_AC", "SMART_DC"]);
  });

  it("rejects a refresh without poolId", async () => {
    const res = await post("/cache/refresh", JSON.stringify({ market: "de" }));
    expect(res.status).toBe(400);
    await expect(res.json()).resolves.toEqual({ success: false, error: "No poolId provided" });
  });

  it("rejects malformed JSON bodies", async () => {
    const res = await post("/cache/refresh", "{oops");
    expect(res.status).toBe(400);
    await expect(res.json()).resolves.toEqual({ success: false, error: "Request body is not valid JSON" });
  });

  it("rejects non-object JSON bodies", async () => {
    const res = await post("/cache/queue", "[1,2]");
    expect(res.status).toBe(400);
    await expect(res.json()).resolves.toEqual({ success: false, error: "Request body must be a JSON object" });
  });

  it("answers 429 while the shared quota is exhausted", async () => {
    for (let i = 0; i < 3; i += 1) ctx.limiter.recordRequest();

    const res = await post("/cache/refresh", JSON.stringify({ poolId: "p1" }));

    expect(res.status).toBe(429);
    await expect(res.json()).resolves.toEqual({ success: false, error: "Rate limit exceeded, please wait a moment" });
  });

  it("answers 502 when the upstream does not know the pool", async () => {
    const res = await post("/cache/refresh", JSON.stringify({ poolId: "ghost" }));

    expect(res.status).toBe(502);
    await expect(res.json()).resolves.toEqual({
      success: false,
      error: "Pool ghost was not returned by the upstream API"
    });
  });

  it("answers 500 and logs store failures", async () => {
    ctx.store.failures.set("queueSize", new StoreFailureError("queueSize", new Error("down")));

    const res = await post("/cache/queue", JSON.stringify({ poolId: "p1" }));

    expect(res.status).toBe(500);
    expect(errorSpy).toHaveBeenCalledWith(
      JSON.stringify({
        event: "server.request_failed",
        path: "/cache/queue",
        status: 500,
        message: "Store operation queueSize failed: down"
      })
    );
  });

  it("queues a pool with default priority", async () => {
    const res = await post("/cache/queue", JSON.stringify({ poolId: " p1 ", market: "at" }));

    expect(res.status).toBe(200);
    await expect(res.json()).resolves.toEqual({ queued: true, queueSize: 1 });
    expect(ctx.store.queue.get("p1")).toMatchObject({ market: "at", priority: 5 });
  });

  it("queues with an explicit priority and rejects non-integer ones", async () => {
    await post("/cache/queue", JSON.stringify({ poolId: "p1", priority: 8 }));
    expect(ctx.store.queue.get("p1")?.priority).toBe(8);

    const res = await post("/cache/queue", JSON.stringify({ poolId: "p2", priority: "high" }));
    expect(res.status).toBe(400);
    await expect(res.json()).resolves.toEqual({ success: false, error: "priority must be an integer" });
  });
});

describe("statusForError", () => {
  it("maps upstream failures to 502 and unknown errors to 500", () => {
    expect(statusForError(new UpstreamRequestError({ message: "x" }))).toBe(502);
    expect(statusForError(new Error("x"))).toBe(500);
    expect(statusForError("x")).toBe(500);
  });
});
