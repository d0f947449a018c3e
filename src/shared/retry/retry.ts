export type RetryDecision =
  | boolean
  | {
      retry: boolean;
      delayMs?: number;
    };

export type RetryOptions = {
  retries: number;          // max attempts after initial try (e.g. 2 means up to 3 total tries)
  baseDelayMs: number;      // backoff before retry n is baseDelayMs * 2^n
  maxDelayMs: number;       // cap for the exponential part
  jitterMs?: number;        // upper bound of the random delay added on top
  shouldRetry: (err: unknown) => RetryDecision;
  onRetry?: (ctx: { attempt: number; maxAttempts: number; delayMs: number; error: unknown }) => void;
  onGiveUp?: (ctx: { attempt: number; maxAttempts: number; error: unknown }) => void;
  randomFn?: () => number;
  sleep?: (ms: number) => Promise<void>;
};

export const sleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

export const computeBackoffMs = (
  attempt: number,
  opts: Pick<RetryOptions, "baseDelayMs" | "maxDelayMs" | "jitterMs"> & { random: number; customDelayMs?: number }
): number => {
  const backoff = opts.customDelayMs != null
    ? Math.min(opts.maxDelayMs, opts.customDelayMs)
    : Math.min(opts.maxDelayMs, opts.baseDelayMs * Math.pow(2, attempt));
  const normalizedRandom = Math.min(1, Math.max(0, opts.random));
  const jitter = Math.floor(Math.max(0, opts.jitterMs ?? 0) * normalizedRandom);
  return backoff + jitter;
};

export const retry = async <T>(fn: (attempt: number) => Promise<T>, opts: RetryOptions): Promise<T> => {
  const {
    retries,
    baseDelayMs,
    maxDelayMs,
    jitterMs = 0,
    shouldRetry,
    onRetry,
    onGiveUp,
    randomFn = Math.random,
    sleep: wait = sleep
  } = opts;

  let attempt = 0;
  const maxAttempts = retries + 1;
  // attempt=0 is first try, then up to retries extra
  while (true) {
    try {
      return await fn(attempt);
    } catch (err) {
      const decision = shouldRetry(err);
      const normalized =
        typeof decision === "boolean"
          ? { retry: decision, delayMs: undefined }
          : decision;
      if (attempt >= retries || !normalized.retry) {
        onGiveUp?.({ attempt: attempt + 1, maxAttempts, error: err });
        throw err;
      }

      const customDelayMs =
        typeof normalized.delayMs === "number" && Number.isFinite(normalized.delayMs) && normalized.delayMs >= 0
          ? normalized.delayMs
          : undefined;
      const waitMs = computeBackoffMs(attempt, {
        baseDelayMs,
        maxDelayMs,
        jitterMs,
        random: randomFn(),
        customDelayMs
      });
      onRetry?.({ attempt: attempt + 1, maxAttempts, delayMs: waitMs, error: err });
      await wait(waitMs);
      attempt += 1;
    }
  }
};
