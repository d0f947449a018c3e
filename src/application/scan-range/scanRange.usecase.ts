import type { LookupClient } from "../../ports/LookupClient";
import type { SnapshotWriter } from "../../ports/SnapshotWriter";
import { RateController } from "../../core/rate/RateController";
import { WorkQueue } from "../../core/queue/WorkQueue";
import { failure, type FetchOutcome } from "../../core/scan/scan.types";
import { FetchWorker } from "./fetchWorker";
import { ResultSink, createSnapshotLabeler } from "./resultSink";
import type { ScanConfigInput } from "./scan.config";
import { resolveScanConfig } from "./scan.config";
import { createScanRunSummaryTracker, toErrorMessage, type ScanRunSummary } from "./scan.error-handler";

export type ScanRangeDeps = {
  client: LookupClient;
  writer: SnapshotWriter;
  config: ScanConfigInput;
  signal?: AbortSignal;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
  randomFn?: () => number;
  rate?: RateController;
};

/**
 * Resolves once every worker has returned, or once the join timeout has elapsed after a
 * cancellation. The boolean tells whether all workers finished.
 */
const joinWorkers = (
  workers: Promise<void>[],
  signal: AbortSignal | undefined,
  joinTimeoutMs: number
): Promise<boolean> =>
  new Promise<boolean>((resolve) => {
    let timer: NodeJS.Timeout | undefined;
    const onAbort = () => {
      timer = setTimeout(() => resolve(false), joinTimeoutMs);
    };
    const finish = () => {
      if (timer) clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
      resolve(true);
    };

    void Promise.all(workers).then(finish, finish);
    if (signal?.aborted) onAbort();
    else signal?.addEventListener("abort", onAbort, { once: true });
  });

/**
 * Scans an inclusive identifier range with a fixed pool of workers draining one shared queue,
 * checkpoints results on a fixed period and always finishes with a final persist. Outcomes of
 * workers still running after a join timeout are logged and dropped.
 */
export const scanRange = async (deps: ScanRangeDeps): Promise<ScanRunSummary> => {
  const { client, writer, signal } = deps;
  const config = resolveScanConfig(deps.config);
  const now = deps.now ?? (() => new Date());

  const rate = deps.rate ?? new RateController(config.rate);
  const worker = new FetchWorker({
    client,
    rate,
    maxRetries: config.maxRetries,
    pacingMode: config.pacingMode,
    backoff: config.backoff,
    randomFn: deps.randomFn,
    sleep: deps.sleep,
    now
  });
  const sink = new ResultSink(writer);
  const queue = WorkQueue.fromRange(config.start, config.end);
  const tracker = createScanRunSummaryTracker(queue.size);
  const nextLabel = createSnapshotLabeler(now);
  let finalized = false;

  console.log(JSON.stringify({
    event: "scan.started",
    start: config.start,
    end: config.end,
    workerCount: config.workerCount,
    maxRetries: config.maxRetries,
    pacingMode: config.pacingMode
  }));

  const onAbort = () => {
    tracker.markCancelled();
    const drained = queue.drain();
    tracker.addDrained(drained);
    // eslint-disable-next-line no-console
    console.warn(JSON.stringify({ event: "scan.cancelled", drained, inFlight: queue.inFlight }));
  };
  if (signal?.aborted) onAbort();
  else signal?.addEventListener("abort", onAbort, { once: true });

  const checkpointTimer = setInterval(() => {
    tracker.addCheckpoint();
    const label = nextLabel();
    console.log(JSON.stringify({ event: "scan.checkpoint", label, ...tracker.progress() }));
    void sink.snapshotAndPersist(label);
  }, config.checkpointIntervalMs);
  checkpointTimer.unref();

  const route = (outcome: FetchOutcome) => {
    if (finalized) {
      // eslint-disable-next-line no-console
      console.warn(JSON.stringify({
        event: "scan.outcome_dropped",
        identifier: outcome.identifier,
        kind: outcome.kind,
        reason: "arrived after the final persist"
      }));
      return;
    }
    sink.append(outcome);
    const processed = tracker.record(outcome);
    if (processed % config.progressEvery === 0 || processed === tracker.progress().total) {
      console.log(JSON.stringify({ event: "scan.progress", ...tracker.progress() }));
    }
  };

  const runWorker = async (): Promise<void> => {
    while (true) {
      const next = queue.tryPop();
      if (next.done) return;

      const identifier = next.value;
      try {
        let outcome: FetchOutcome;
        try {
          outcome = await worker.fetch(identifier, { signal });
        } catch (err) {
          outcome = failure(identifier, toErrorMessage(err), now());
        }
        route(outcome);
      } finally {
        queue.taskDone();
      }
    }
  };

  const workers = Array.from({ length: config.workerCount }, () => runWorker());

  try {
    const joined = await joinWorkers(workers, signal, config.joinTimeoutMs);
    if (!joined) {
      // eslint-disable-next-line no-console
      console.warn(JSON.stringify({ event: "scan.join_timeout", inFlight: queue.inFlight }));
    }
  } finally {
    clearInterval(checkpointTimer);
    signal?.removeEventListener("abort", onAbort);
  }

  finalized = true;
  await sink.snapshotAndPersist(nextLabel());

  const summary = tracker.summary();
  console.log(JSON.stringify({
    event: "scan.completed",
    ...summary,
    records: sink.recordCount,
    errors: sink.errorCount
  }));
  return summary;
};
