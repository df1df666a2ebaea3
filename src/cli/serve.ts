#!/usr/bin/env node
import { runCacheService } from "../composition/root";

type ErrorContext = Partial<{
  poolId: string;
  market: string;
  operation: string;
  status: number;
}>;

type CliErrorEnvelope = {
  event: "service.failed";
  name: string;
  message: string;
  code?: string;
  context?: ErrorContext;
  status?: number;
  stack?: string;
};

const stringContextKeys = ["poolId", "market", "operation"] as const;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

const extractContext = (value: unknown): ErrorContext | undefined => {
  if (!isRecord(value)) return undefined;

  const sanitizedContext: ErrorContext = {};
  for (const key of stringContextKeys) {
    const raw = value[key];
    if (typeof raw === "string" && raw !== "") {
      sanitizedContext[key] = raw;
    }
  }
  if (typeof value.status === "number" && Number.isFinite(value.status)) {
    sanitizedContext.status = value.status;
  }

  return Object.keys(sanitizedContext).length > 0 ? sanitizedContext : undefined;
};

export const isDebugMode = (env: NodeJS.ProcessEnv = process.env): boolean => {
  const debug = env.DEBUG?.toLowerCase();
  return debug === "1" || debug === "true";
};

export const buildCliErrorEnvelope = (err: unknown, includeStack: boolean): CliErrorEnvelope => {
  const error = err instanceof Error ? err : new Error(String(err));
  const errorRecord = isRecord(err) ? err : {};

  const envelope: CliErrorEnvelope = {
    event: "service.failed",
    name: error.name || "Error",
    message: error.message
  };

  if (typeof errorRecord.code === "string") {
    envelope.code = errorRecord.code;
  }

  const context = extractContext(errorRecord.context);
  if (context) {
    envelope.context = context;
  }

  if (typeof errorRecord.status === "number" && Number.isFinite(errorRecord.status)) {
    envelope.status = errorRecord.status;
  }

  if (includeStack && typeof error.stack === "string") {
    envelope.stack = error.stack;
  }

  return envelope;
};

const fail = (err: unknown): never => {
  const envelope = buildCliErrorEnvelope(err, isDebugMode());
  // eslint-disable-next-line no-console
  console.error(JSON.stringify(envelope));
  return process.exit(1);
};

export const executeServeCli = async (): Promise<void> => {
  try {
    const running = await runCacheService();

    let stopping = false;
    const onSignal = (signal: NodeJS.Signals) => {
      if (stopping) return;
      stopping = true;
      // eslint-disable-next-line no-console
      console.log(JSON.stringify({ event: "service.stopping", signal }));
      running.shutdown().then(
        () => process.exit(0),
        (err: unknown) => fail(err)
      );
    };

    process.once("SIGINT", onSignal);
    process.once("SIGTERM", onSignal);
  } catch (err) {
    fail(err);
  }
};

if (require.main === module) {
  void executeServeCli();
}
