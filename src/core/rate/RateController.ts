import { createExclusiveSection } from "../../shared/concurrency/limiter";
import { sleep as defaultSleep } from "../../shared/retry/retry";

export type RateState = {
  intervalMs: number;
  timeoutCount: number;
  errorCount: number;
  lastSuccessAt: number;
};

export type RateControllerOptions = {
  initialIntervalMs: number;
  minIntervalMs: number;
  maxIntervalMs: number;
  speedUpWindowMs: number;    // successes closer together than this shrink the interval
  speedUpFactor: number;
  slowDownFactor: number;
  slowDownAfterTimeouts: number;
  cooldownAfterErrors: number;
  cooldownPerErrorMs: number;
  maxCooldownMs: number;
};

export const defaultRateControllerOptions: RateControllerOptions = {
  initialIntervalMs: 300,
  minIntervalMs: 50,
  maxIntervalMs: 5000,
  speedUpWindowMs: 500,
  speedUpFactor: 0.9,
  slowDownFactor: 1.5,
  slowDownAfterTimeouts: 2,
  cooldownAfterErrors: 10,
  cooldownPerErrorMs: 5000,
  maxCooldownMs: 60000
};

/**
 * Reactive pacing shared by every worker of a run.
 *
 * Successes decay the failure counters and, when they arrive in quick succession, shorten the
 * interval. Failures lengthen it once timeouts pile up, and a sustained error streak triggers a
 * cooldown that is slept inside the critical section, so every other caller waits it out too.
 */
export class RateController {
  private readonly options: RateControllerOptions;
  private readonly exclusive = createExclusiveSection();
  private intervalMs: number;
  private timeoutCount = 0;
  private errorCount = 0;
  private lastSuccessAt: number;

  constructor(
    options: Partial<RateControllerOptions> = {},
    private readonly clock: { now: () => number; sleep: (ms: number) => Promise<void> } = {
      now: Date.now,
      sleep: defaultSleep
    }
  ) {
    this.options = { ...defaultRateControllerOptions, ...options };
    if (this.options.minIntervalMs < 0 || this.options.minIntervalMs > this.options.maxIntervalMs) {
      throw new Error(
        `minIntervalMs=${this.options.minIntervalMs} must be within [0..maxIntervalMs=${this.options.maxIntervalMs}]`
      );
    }
    this.intervalMs = this.clamp(this.options.initialIntervalMs);
    this.lastSuccessAt = this.clock.now();
  }

  waitInterval(): Promise<number> {
    return this.exclusive(() => this.intervalMs);
  }

  report(success: boolean): Promise<number> {
    return this.exclusive(async () => {
      const now = this.clock.now();
      if (success) {
        this.onSuccess(now);
      } else {
        await this.onFailure();
      }
      return this.intervalMs;
    });
  }

  state(): RateState {
    return {
      intervalMs: this.intervalMs,
      timeoutCount: this.timeoutCount,
      errorCount: this.errorCount,
      lastSuccessAt: this.lastSuccessAt
    };
  }

  private onSuccess(now: number): void {
    this.timeoutCount = Math.max(0, this.timeoutCount - 1);
    this.errorCount = Math.max(0, this.errorCount - 0.5);
    if (now - this.lastSuccessAt < this.options.speedUpWindowMs) {
      this.intervalMs = this.clamp(this.intervalMs * this.options.speedUpFactor);
    }
    this.lastSuccessAt = now;
  }

  private async onFailure(): Promise<void> {
    this.timeoutCount += 1;
    this.errorCount += 1;

    if (this.timeoutCount > this.options.slowDownAfterTimeouts) {
      this.intervalMs = this.clamp(this.intervalMs * this.options.slowDownFactor);
    }

    if (this.errorCount > this.options.cooldownAfterErrors) {
      const cooldownMs = Math.min(this.options.maxCooldownMs, this.options.cooldownPerErrorMs * this.errorCount);
      // eslint-disable-next-line no-console
      console.warn(JSON.stringify({ event: "rate.cooldown", errorCount: this.errorCount, cooldownMs }));
      await this.clock.sleep(cooldownMs);
      this.errorCount = 0;
    }
  }

  private clamp(intervalMs: number): number {
    return Math.min(this.options.maxIntervalMs, Math.max(this.options.minIntervalMs, intervalMs));
  }
}
