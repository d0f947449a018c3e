import type { FetchOutcome, Identifier } from "../../core/scan/scan.types";

export type ScanFailureCode = "config_invalid" | "writer_init_failed";

export type ScanErrorContext = {
  start?: number;
  end?: number;
  workerCount?: number;
};

export const toErrorMessage = (reason: unknown): string => {
  if (reason instanceof Error) return reason.message;
  return String(reason);
};

export class ScanFatalError extends Error {
  readonly code: ScanFailureCode;
  readonly context: ScanErrorContext;

  constructor(args: { code: ScanFailureCode; message: string; context: ScanErrorContext; cause?: unknown }) {
    super(args.message, { cause: args.cause });
    this.name = "ScanFatalError";
    this.code = args.code;
    this.context = args.context;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export const wrapConfigFailure = (reason: unknown, context: ScanErrorContext = {}) => {
  const cause = reason instanceof Error ? reason.cause ?? reason : reason;
  return new ScanFatalError({
    code: "config_invalid",
    message: `Invalid scan configuration: ${toErrorMessage(reason)}`,
    context,
    cause
  });
};

export const wrapWriterInitFailure = (reason: unknown, context: ScanErrorContext = {}) =>
  new ScanFatalError({
    code: "writer_init_failed",
    message: `Snapshot writer could not be initialised: ${toErrorMessage(reason)}`,
    context,
    cause: reason
  });

export type ScanRunSummary = {
  total: number;
  processed: number;
  found: number;
  notFound: number;
  failed: number;
  drained: number;
  cancelled: boolean;
  checkpoints: number;
};

export const createScanRunSummaryTracker = (total: number) => {
  let processed = 0;
  let found = 0;
  let notFound = 0;
  let failed = 0;
  let drained = 0;
  let cancelled = false;
  let checkpoints = 0;
  let lastIdentifier: Identifier | undefined;

  return {
    record: (outcome: FetchOutcome) => {
      processed += 1;
      lastIdentifier = outcome.identifier;
      if (outcome.kind === "success") found += 1;
      else if (outcome.kind === "not_found") notFound += 1;
      else failed += 1;
      return processed;
    },
    addDrained: (count: number) => {
      drained += count;
    },
    markCancelled: () => {
      cancelled = true;
    },
    addCheckpoint: () => {
      checkpoints += 1;
    },
    progress: () => ({ processed, total, found, lastIdentifier }),
    summary: (): ScanRunSummary => ({
      total,
      processed,
      found,
      notFound,
      failed,
      drained,
      cancelled,
      checkpoints
    })
  };
};
