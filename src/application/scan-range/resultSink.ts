import type { SnapshotWriter, SnapshotWriteReport } from "../../ports/SnapshotWriter";
import type { FetchFailure, FetchOutcome, LookupRecord, ResultSnapshot } from "../../core/scan/scan.types";
import { createExclusiveSection } from "../../shared/concurrency/limiter";
import { toErrorMessage } from "./scan.error-handler";

export type PersistReport =
  | { ok: true; report: SnapshotWriteReport }
  | { ok: false; label: string; error: string };

const pad = (value: number, width = 2) => String(value).padStart(width, "0");

/** `YYYYMMDD_HHMMSS` in local time. */
export const formatSnapshotLabel = (date: Date): string =>
  `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
  `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;

/**
 * Labels for successive persists of one run. A label that would repeat the previous one
 * (two persists within the same second) gets a `_2`, `_3`, ... suffix.
 */
export const createSnapshotLabeler = (now: () => Date) => {
  let lastBase: string | undefined;
  let repeats = 0;

  return (): string => {
    const base = formatSnapshotLabel(now());
    if (base !== lastBase) {
      lastBase = base;
      repeats = 0;
      return base;
    }
    repeats += 1;
    return `${base}_${repeats + 1}`;
  };
};

/**
 * Accumulates outcomes for the whole run. Nothing is ever removed, so every persisted
 * snapshot is a superset of the previous one.
 */
export class ResultSink {
  private readonly records: LookupRecord[] = [];
  private readonly errors: FetchFailure[] = [];
  private readonly persistSection = createExclusiveSection();

  constructor(private readonly writer: SnapshotWriter) {}

  append(outcome: FetchOutcome): void {
    if (outcome.kind === "success") {
      this.records.push(outcome.record);
    } else if (outcome.kind === "failure") {
      this.errors.push(outcome);
    }
  }

  get recordCount(): number {
    return this.records.length;
  }

  get errorCount(): number {
    return this.errors.length;
  }

  snapshot(): ResultSnapshot {
    return {
      records: this.records.slice(),
      errors: this.errors.slice()
    };
  }

  /**
   * Persists whatever has accumulated at the moment the write starts. Writes are serialised;
   * a failing writer is logged and reported, never thrown.
   */
  snapshotAndPersist(label: string): Promise<PersistReport> {
    return this.persistSection(async (): Promise<PersistReport> => {
      const snapshot = this.snapshot();
      try {
        const report = await this.writer.write(snapshot, label);
        console.log(JSON.stringify({ event: "scan.persisted", ...report }));
        return { ok: true, report };
      } catch (err) {
        const error = toErrorMessage(err);
        // eslint-disable-next-line no-console
        console.error(JSON.stringify({
          event: "scan.persist_failed",
          label,
          records: snapshot.records.length,
          errors: snapshot.errors.length,
          error
        }));
        return { ok: false, label, error };
      }
    });
  }
}
