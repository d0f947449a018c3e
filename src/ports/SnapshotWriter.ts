import type { ResultSnapshot } from "../core/scan/scan.types";

export type SnapshotWriteReport = {
  label: string;
  records: number;
  errors: number;
  targets: string[];
};

export interface SnapshotWriter {
  /** Prepares the target (directories, connections, indexes) before the first write. */
  init?(): Promise<void>;
  write(snapshot: ResultSnapshot, label: string): Promise<SnapshotWriteReport>;
  close?(): Promise<void>;
}
