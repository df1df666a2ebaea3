export type CacheFailureCode = "rate_limited" | "upstream_failed" | "store_failed";

export type CacheErrorContext = Partial<{
  poolId: string;
  market: string;
  operation: string;
  status: number;
  requestUrl: string;
}>;

export class CacheServiceError extends Error {
  readonly code: CacheFailureCode;
  readonly context: CacheErrorContext;
  readonly cause?: unknown;

  constructor(args: { code: CacheFailureCode; message: string; context?: CacheErrorContext; cause?: unknown }) {
    super(args.message);
    this.name = "CacheServiceError";
    this.code = args.code;
    this.context = args.context ?? {};
    this.cause = args.cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Manual refresh found the shared quota exhausted. Callers should retry shortly.
 */
export class RateLimitExceededError extends CacheServiceError {
  constructor(context: CacheErrorContext = {}) {
    super({ code: "rate_limited", message: "Rate limit exceeded, please wait a moment", context });
    this.name = "RateLimitExceededError";
  }
}

export class UpstreamRequestError extends CacheServiceError {
  readonly status?: number;
  readonly isTimeout: boolean;
  readonly requestUrl?: string;

  constructor(args: {
    message: string;
    status?: number;
    isTimeout?: boolean;
    requestUrl?: string;
    context?: CacheErrorContext;
    cause?: unknown;
  }) {
    super({
      code: "upstream_failed",
      message: args.message,
      context: {
        ...args.context,
        ...(args.status != null ? { status: args.status } : {}),
        ...(args.requestUrl ? { requestUrl: args.requestUrl } : {})
      },
      cause: args.cause
    });
    this.name = "UpstreamRequestError";
    this.status = args.status;
    this.isTimeout = args.isTimeout ?? false;
    this.requestUrl = args.requestUrl;
  }
}

export class StoreFailureError extends CacheServiceError {
  constructor(operation: string, cause: unknown) {
    super({
      code: "store_failed",
      message: `Store operation ${operation} failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      context: { operation },
      cause
    });
    this.name = "StoreFailureError";
  }
}
