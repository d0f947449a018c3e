import { defaultProjectionFields, type ProjectionFields } from "../../core/records/projection";
import { defaultRateControllerOptions, type RateControllerOptions } from "../../core/rate/RateController";

export type PacingMode = "optimistic" | "confirmed";

export const pacingModes: readonly PacingMode[] = ["optimistic", "confirmed"];

export type BackoffConfig = {
  baseDelayMs: number;
  maxDelayMs: number;
  jitterMs: number;
};

export type ScanConfig = {
  start: number;
  end: number;
  workerCount: number;
  maxRetries: number;
  pacingMode: PacingMode;
  checkpointIntervalMs: number;
  joinTimeoutMs: number;
  progressEvery: number;
  backoff: BackoffConfig;
  rate: RateControllerOptions;
  projection: ProjectionFields;
};

export type ScanConfigInput = Partial<Omit<ScanConfig, "backoff" | "rate" | "projection">> & {
  backoff?: Partial<BackoffConfig>;
  rate?: Partial<RateControllerOptions>;
  projection?: Partial<ProjectionFields>;
};

export const defaultScanConfig: ScanConfig = {
  start: 1,
  end: 50000,
  workerCount: 5,
  maxRetries: 3,
  pacingMode: "optimistic",
  checkpointIntervalMs: 60 * 60 * 1000,
  joinTimeoutMs: 5000,
  progressEvery: 100,
  backoff: { baseDelayMs: 1000, maxDelayMs: 30000, jitterMs: 1000 },
  rate: defaultRateControllerOptions,
  projection: defaultProjectionFields
};

export const scanCaps = {
  start: { min: 1, max: Number.MAX_SAFE_INTEGER },
  end: { min: 1, max: Number.MAX_SAFE_INTEGER },
  workerCount: { min: 1, max: 64 },
  maxRetries: { min: 1, max: 10 },
  checkpointIntervalMs: { min: 1, max: 24 * 60 * 60 * 1000 },
  joinTimeoutMs: { min: 0, max: 600000 },
  progressEvery: { min: 1, max: 1000000 }
} as const;

const assertIntegerInRange = (name: string, value: number, min: number, max: number) => {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(`${name}=${String(value)} is out of allowed range [${min}..${max}]`);
  }
};

const assertNonNegative = (name: string, value: number) => {
  if (!Number.isFinite(value) || value < 0) {
    throw new Error(`${name}=${String(value)} must be a non-negative number`);
  }
};

export const isPacingMode = (value: string): value is PacingMode =>
  pacingModes.some((mode) => mode === value);

export const validateScanConfig = (config: ScanConfig): ScanConfig => {
  assertIntegerInRange("start", config.start, scanCaps.start.min, scanCaps.start.max);
  assertIntegerInRange("end", config.end, scanCaps.end.min, scanCaps.end.max);
  if (config.end < config.start) {
    throw new Error(`end=${config.end} must be >= start=${config.start}`);
  }
  assertIntegerInRange("workerCount", config.workerCount, scanCaps.workerCount.min, scanCaps.workerCount.max);
  assertIntegerInRange("maxRetries", config.maxRetries, scanCaps.maxRetries.min, scanCaps.maxRetries.max);
  assertIntegerInRange(
    "checkpointIntervalMs",
    config.checkpointIntervalMs,
    scanCaps.checkpointIntervalMs.min,
    scanCaps.checkpointIntervalMs.max
  );
  assertIntegerInRange("joinTimeoutMs", config.joinTimeoutMs, scanCaps.joinTimeoutMs.min, scanCaps.joinTimeoutMs.max);
  assertIntegerInRange("progressEvery", config.progressEvery, scanCaps.progressEvery.min, scanCaps.progressEvery.max);
  if (!isPacingMode(config.pacingMode)) {
    throw new Error(`pacingMode=${String(config.pacingMode)} must be one of ${pacingModes.join(", ")}`);
  }
  assertNonNegative("backoff.baseDelayMs", config.backoff.baseDelayMs);
  assertNonNegative("backoff.maxDelayMs", config.backoff.maxDelayMs);
  assertNonNegative("backoff.jitterMs", config.backoff.jitterMs);
  for (const [field, name] of Object.entries(config.projection)) {
    if (name.trim() === "") throw new Error(`projection.${field} must not be empty`);
  }
  return config;
};

export const resolveScanConfig = (input: ScanConfigInput = {}): ScanConfig =>
  validateScanConfig({
    ...defaultScanConfig,
    ...input,
    backoff: { ...defaultScanConfig.backoff, ...input.backoff },
    rate: { ...defaultScanConfig.rate, ...input.rate },
    projection: { ...defaultScanConfig.projection, ...input.projection }
  });
