import type { LookupClient } from "../../ports/LookupClient";
import type { RateController } from "../../core/rate/RateController";
import { isLookupRequestError } from "../../core/scan/lookup.errors";
import { parseLookupPayload } from "../../core/records/parseLookupPayload";
import { failure, notFound, success, type FetchOutcome, type Identifier } from "../../core/scan/scan.types";
import { retry, sleep as defaultSleep } from "../../shared/retry/retry";
import type { BackoffConfig, PacingMode } from "./scan.config";
import { toErrorMessage } from "./scan.error-handler";

export type FetchWorkerDeps = {
  client: LookupClient;
  rate: RateController;
  maxRetries: number;
  pacingMode: PacingMode;
  backoff: BackoffConfig;
  randomFn?: () => number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
};

const describeFailure = (error: unknown) =>
  isLookupRequestError(error)
    ? { kind: error.kind, status: error.status ?? null }
    : { kind: "unexpected", status: null };

/**
 * Resolves one identifier against the lookup endpoint.
 *
 * Each attempt is paced by the shared RateController and reports its outcome back to it.
 * Transport failures are retried with exponential backoff; anything else fails the identifier
 * straight away. Once the signal is aborted no further request is sent, including after a
 * pacing or backoff sleep already in progress. The returned promise never rejects.
 */
export class FetchWorker {
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => Date;

  constructor(private readonly deps: FetchWorkerDeps) {
    if (!Number.isInteger(deps.maxRetries) || deps.maxRetries < 1) {
      throw new Error("maxRetries must be an integer >= 1");
    }
    this.sleep = deps.sleep ?? defaultSleep;
    this.now = deps.now ?? (() => new Date());
  }

  async fetch(identifier: Identifier, options: { signal?: AbortSignal } = {}): Promise<FetchOutcome> {
    const { client, rate, pacingMode, backoff, maxRetries } = this.deps;

    let lastError: unknown;
    // A cancelled scan sends nothing more: the identifier fails with its last error, if any.
    const ensureNotCancelled = () => {
      if (!options.signal?.aborted) return;
      throw lastError ?? new Error(`Lookup for id=${identifier} cancelled before it was sent`);
    };

    const attempt = async (): Promise<unknown> => {
      ensureNotCancelled();
      const intervalMs = pacingMode === "optimistic" ? await rate.report(true) : await rate.waitInterval();
      await this.sleep(intervalMs);
      ensureNotCancelled();

      let payload: unknown;
      try {
        payload = await client.lookup(identifier);
      } catch (err) {
        lastError = err;
        await rate.report(false);
        throw err;
      }

      if (pacingMode === "confirmed") await rate.report(true);
      return payload;
    };

    try {
      const payload = await retry(attempt, {
        retries: maxRetries - 1,
        baseDelayMs: backoff.baseDelayMs,
        maxDelayMs: backoff.maxDelayMs,
        jitterMs: backoff.jitterMs,
        randomFn: this.deps.randomFn,
        sleep: this.sleep,
        shouldRetry: (err) => {
          if (options.signal?.aborted || !isLookupRequestError(err)) return false;
          return err.retryDelayMs != null ? { retry: true, delayMs: err.retryDelayMs } : true;
        },
        onRetry: ({ attempt: attemptNo, maxAttempts, delayMs, error }) => {
          // eslint-disable-next-line no-console
          console.warn(JSON.stringify({
            event: "fetch.retry",
            identifier,
            attempt: attemptNo,
            maxAttempts,
            delayMs,
            ...describeFailure(error)
          }));
        },
        onGiveUp: ({ attempt: attemptNo, maxAttempts, error }) => {
          // eslint-disable-next-line no-console
          console.warn(JSON.stringify({
            event: "fetch.give_up",
            identifier,
            attempt: attemptNo,
            maxAttempts,
            ...describeFailure(error)
          }));
        }
      });

      const record = parseLookupPayload(payload);
      return record ? success(identifier, record) : notFound(identifier);
    } catch (err) {
      return failure(identifier, toErrorMessage(err), this.now());
    }
  }
}
