import { scanRange } from "../application/scan-range/scanRange.usecase";
import type { ScanRunSummary } from "../application/scan-range/scan.error-handler";
import { wrapConfigFailure, wrapWriterInitFailure } from "../application/scan-range/scan.error-handler";
import { FileSnapshotWriter } from "../infrastructure/files/FileSnapshotWriter";
import { LookupHttpClient } from "../infrastructure/lookup/LookupHttpClient";
import { MongoSnapshotWriter } from "../infrastructure/mongo/MongoSnapshotWriter";
import type { SnapshotWriter } from "../ports/SnapshotWriter";
import type { ProjectionFields } from "../core/records/projection";
import { loadEnv, type Env } from "../shared/config/env";
import { loadRuntimeConfigFromEnv, readRawScanContext, type RuntimeConfig } from "../shared/config/runtime.config";

const createWriter = (env: Env, projection: ProjectionFields): SnapshotWriter =>
  env.PERSIST_TARGET === "mongo"
    ? new MongoSnapshotWriter(env.MONGO_URI, env.MONGO_DB, projection)
    : new FileSnapshotWriter(env.OUTPUT_DIR, projection);

const loadConfig = (): { env: Env; runtime: RuntimeConfig } => {
  try {
    return { env: loadEnv(), runtime: loadRuntimeConfigFromEnv() };
  } catch (err) {
    throw wrapConfigFailure(err, readRawScanContext());
  }
};

export const runScan = async (opts: { signal?: AbortSignal } = {}): Promise<ScanRunSummary> => {
  const { env, runtime } = loadConfig();
  const { scanConfig, connectTimeoutMs, readTimeoutMs } = runtime;

  const client = new LookupHttpClient(env.LOOKUP_URL, {
    idParam: env.LOOKUP_ID_PARAM,
    connectTimeoutMs,
    readTimeoutMs
  });
  const writer = createWriter(env, scanConfig.projection);

  try {
    try {
      await writer.init?.();
    } catch (err) {
      throw wrapWriterInitFailure(err, {
        start: scanConfig.start,
        end: scanConfig.end,
        workerCount: scanConfig.workerCount
      });
    }
    return await scanRange({ client, writer, config: scanConfig, signal: opts.signal });
  } finally {
    await writer.close?.();
    await client.close();
  }
};
