import http from "http";
import type { StationCacheService } from "./application/station-cache/StationCacheService";
import { RateLimitExceededError, UpstreamRequestError } from "./core/cache/cache.errors";
import { InvalidPoolPayloadError } from "./core/pool/normalizePool";

type JsonBody = Record<string, unknown>;

class BadRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BadRequestError";
  }
}

const isJsonBody = (value: unknown): value is JsonBody =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const MAX_BODY_BYTES = 64 * 1024;

const send = (res: http.ServerResponse, status: number, payload: unknown) => {
  res.writeHead(status, { "content-type": "application/json" });
  res.end(JSON.stringify(payload));
};

const readJsonBody = (req: http.IncomingMessage): Promise<JsonBody> =>
  new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    req.on("data", (chunk: Buffer) => {
      size += chunk.length;
      if (size > MAX_BODY_BYTES) {
        reject(new BadRequestError("Request body too large"));
        req.destroy();
        return;
      }
      chunks.push(chunk);
    });
    req.on("end", () => {
      const text = Buffer.concat(chunks).toString("utf8");
      if (text.trim() === "") return resolve({});
      try {
        const parsed: unknown = JSON.parse(text);
        if (!isJsonBody(parsed)) {
          return reject(new BadRequestError("Request body must be a JSON object"));
        }
        resolve(parsed);
      } catch {
        reject(new BadRequestError("Request body is not valid JSON"));
      }
    });
    req.on("error", reject);
  });

const requirePoolId = (body: JsonBody): string => {
  const poolId = body.poolId;
  if (typeof poolId !== "string" || poolId.trim() === "") {
    throw new BadRequestError("No poolId provided");
  }
  return poolId.trim();
};

const optionalMarket = (body: JsonBody): string | undefined =>
  typeof body.market === "string" && body.market.trim() !== "" ? body.market.trim() : undefined;

const optionalPriority = (body: JsonBody): number | undefined => {
  if (body.priority == null) return undefined;
  if (typeof body.priority !== "number" || !Number.isInteger(body.priority)) {
    throw new BadRequestError("priority must be an integer");
  }
  return body.priority;
};

export const statusForError = (err: unknown): number => {
  if (err instanceof BadRequestError) return 400;
  if (err instanceof RateLimitExceededError) return 429;
  if (err instanceof UpstreamRequestError || err instanceof InvalidPoolPayloadError) return 502;
  return 500;
};

const route = async (service: StationCacheService, req: http.IncomingMessage, res: http.ServerResponse) => {
  const { pathname } = new URL(req.url ?? "/", "http://localhost");
  const method = req.method ?? "GET";

  if (method === "GET" && pathname === "/health") {
    return send(res, 200, { ok: true });
  }

  if (method === "GET" && pathname === "/cache/stats") {
    const [cache, updater] = await Promise.all([service.getStats(), service.getUpdaterStatus()]);
    return send(res, 200, { cache, updater, rateLimit: service.getRateLimit() });
  }

  if (method === "POST" && pathname === "/cache/refresh") {
    const body = await readJsonBody(req);
    const result = await service.refreshWithPrices(requirePoolId(body), optionalMarket(body));
    return send(res, 200, { success: true, ...result });
  }

  if (method === "POST" && pathname === "/cache/queue") {
    const body = await readJsonBody(req);
    const queueSize = await service.enqueue(requirePoolId(body), optionalMarket(body), optionalPriority(body));
    return send(res, 200, { queued: true, queueSize });
  }

  return send(res, 404, { error: "not_found" });
};

export const createServer = (service: StationCacheService) => {
  return http.createServer((req, res) => {
    route(service, req, res).catch((err: unknown) => {
      const status = statusForError(err);
      const message = err instanceof Error ? err.message : String(err);
      if (status >= 500) {
        // eslint-disable-next-line no-console
        console.error(JSON.stringify({ event: "server.request_failed", path: req.url ?? null, status, message }));
      }
      if (!res.headersSent) {
        send(res, status, { success: false, error: message });
      }
    });
  });
};
