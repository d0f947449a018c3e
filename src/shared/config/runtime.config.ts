import {
  defaultScanConfig,
  isPacingMode,
  pacingModes,
  type ScanConfig,
  validateScanConfig
} from "../../application/scan-range/scan.config";
import type { ScanErrorContext } from "../../application/scan-range/scan.error-handler";

export const runtimeCaps = {
  connectTimeoutMs: { min: 100, max: 60000 },
  readTimeoutMs: { min: 100, max: 300000 },
  checkpointIntervalMs: { min: 1000, max: 24 * 60 * 60 * 1000 }
} as const;

export type RuntimeConfig = {
  scanConfig: ScanConfig;
  connectTimeoutMs: number;
  readTimeoutMs: number;
};

const parseOptionalIntInRange = (
  env: NodeJS.ProcessEnv,
  name: string,
  range: { min: number; max: number }
): number | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return undefined;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new Error(`${name}=${raw} is out of allowed range [${range.min}..${range.max}]`);
  }

  return value;
};

const parseOptionalPacingMode = (env: NodeJS.ProcessEnv): ScanConfig["pacingMode"] | undefined => {
  const raw = env.SCAN_PACING_MODE;
  if (raw == null || raw.trim() === "") return undefined;

  const value = raw.trim().toLowerCase();
  if (!isPacingMode(value)) {
    throw new Error(`SCAN_PACING_MODE=${raw} must be one of ${pacingModes.join(", ")}`);
  }
  return value;
};

export const loadRuntimeConfigFromEnv = (env: NodeJS.ProcessEnv = process.env): RuntimeConfig => {
  const ids = { min: 1, max: Number.MAX_SAFE_INTEGER };
  const scanConfig = validateScanConfig({
    ...defaultScanConfig,
    start: parseOptionalIntInRange(env, "SCAN_START", ids) ?? defaultScanConfig.start,
    end: parseOptionalIntInRange(env, "SCAN_END", ids) ?? defaultScanConfig.end,
    workerCount: parseOptionalIntInRange(env, "SCAN_WORKERS", { min: 1, max: 64 }) ?? defaultScanConfig.workerCount,
    maxRetries: parseOptionalIntInRange(env, "SCAN_MAX_RETRIES", { min: 1, max: 10 }) ?? defaultScanConfig.maxRetries,
    pacingMode: parseOptionalPacingMode(env) ?? defaultScanConfig.pacingMode,
    checkpointIntervalMs:
      parseOptionalIntInRange(env, "SCAN_CHECKPOINT_INTERVAL_MS", runtimeCaps.checkpointIntervalMs) ??
      defaultScanConfig.checkpointIntervalMs,
    joinTimeoutMs:
      parseOptionalIntInRange(env, "SCAN_JOIN_TIMEOUT_MS", { min: 0, max: 600000 }) ?? defaultScanConfig.joinTimeoutMs,
    progressEvery:
      parseOptionalIntInRange(env, "SCAN_PROGRESS_EVERY", { min: 1, max: 1000000 }) ?? defaultScanConfig.progressEvery
  });

  const connectTimeoutMs =
    parseOptionalIntInRange(env, "LOOKUP_CONNECT_TIMEOUT_MS", runtimeCaps.connectTimeoutMs) ?? 3050;
  const readTimeoutMs =
    parseOptionalIntInRange(env, "LOOKUP_READ_TIMEOUT_MS", runtimeCaps.readTimeoutMs) ?? 30000;

  return { scanConfig, connectTimeoutMs, readTimeoutMs };
};

/**
 * Best-effort range settings for error reports, read without validation so they are available
 * even when the configuration itself is rejected.
 */
export const readRawScanContext = (env: NodeJS.ProcessEnv = process.env): ScanErrorContext => {
  const context: ScanErrorContext = {};
  const fields = [
    ["start", "SCAN_START"],
    ["end", "SCAN_END"],
    ["workerCount", "SCAN_WORKERS"]
  ] as const;

  for (const [key, name] of fields) {
    const raw = env[name];
    if (raw == null || raw.trim() === "") continue;
    const value = Number(raw);
    if (Number.isFinite(value)) context[key] = value;
  }

  return context;
};
