#!/usr/bin/env node
import { runScan } from "../composition/root";

type ErrorContext = Partial<{
  start: number;
  end: number;
  workerCount: number;
}>;

type CliErrorEnvelope = {
  event: "scan.failed";
  name: string;
  message: string;
  code?: string;
  context?: ErrorContext;
  stack?: string;
};

const allowedContextKeys: Array<keyof ErrorContext> = ["start", "end", "workerCount"];

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

const extractContext = (value: unknown): ErrorContext | undefined => {
  if (!isRecord(value)) return undefined;

  const sanitizedContext: ErrorContext = {};
  for (const key of allowedContextKeys) {
    const raw = value[key];
    if (typeof raw === "number" && Number.isFinite(raw)) {
      sanitizedContext[key] = raw;
    }
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
    event: "scan.failed",
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

  if (includeStack && typeof error.stack === "string") {
    envelope.stack = error.stack;
  }

  return envelope;
};

const shutdownSignals: NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

/**
 * The first SIGINT/SIGTERM cancels the scan; later ones are ignored so the final persist can finish.
 */
export const bindShutdownSignals = (controller: AbortController, proc: NodeJS.Process = process): (() => void) => {
  const onSignal = (signal: NodeJS.Signals) => {
    if (controller.signal.aborted) {
      // eslint-disable-next-line no-console
      console.warn(JSON.stringify({ event: "scan.signal_ignored", signal }));
      return;
    }
    // eslint-disable-next-line no-console
    console.warn(JSON.stringify({ event: "scan.signal", signal }));
    controller.abort();
  };

  for (const signal of shutdownSignals) proc.on(signal, onSignal);
  return () => {
    for (const signal of shutdownSignals) proc.off(signal, onSignal);
  };
};

export const executeScanCli = async (): Promise<void> => {
  const controller = new AbortController();
  const unbind = bindShutdownSignals(controller);
  try {
    await runScan({ signal: controller.signal });
  } catch (err) {
    const envelope = buildCliErrorEnvelope(err, isDebugMode());
    // eslint-disable-next-line no-console
    console.error(JSON.stringify(envelope));
    process.exit(1);
  } finally {
    unbind();
  }
};

if (require.main === module) {
  void executeScanCli();
}
