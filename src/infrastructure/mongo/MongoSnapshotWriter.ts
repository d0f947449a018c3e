import type { Collection, MongoClient } from "mongodb";
import type { SnapshotWriter, SnapshotWriteReport } from "../../ports/SnapshotWriter";
import type { FetchFailure, LookupRecord, LookupValue, ResultSnapshot } from "../../core/scan/scan.types";
import { defaultProjectionFields, projectRecord, type ProjectionFields } from "../../core/records/projection";
import { createMongoClient } from "./MongoClientFactory";
import { mongoIndexes } from "./mongo.indexes";

export type RecordDoc = {
  identifier: number;
  name: LookupValue;
  code: LookupValue;
  raw: LookupRecord;
  snapshotLabel: string;
  updatedAt: Date;
};

export type ErrorDoc = {
  identifier: number;
  error: string;
  at: Date;
  snapshotLabel: string;
};

export const parseRecordIdentifier = (value: LookupValue): number | undefined => {
  if (typeof value === "number") {
    return Number.isSafeInteger(value) && value > 0 ? value : undefined;
  }

  if (typeof value === "string") {
    const normalized = value.trim();
    if (!/^\d+$/.test(normalized)) return undefined;
    const parsed = Number.parseInt(normalized, 10);
    return Number.isSafeInteger(parsed) && parsed > 0 ? parsed : undefined;
  }

  return undefined;
};

/**
 * Keeps the latest value seen for each identifier inside one snapshot.
 */
export const dedupeByIdentifier = <T extends { identifier: number }>(docs: T[]): T[] => {
  const byIdentifier = new Map<number, T>();
  for (const doc of docs) {
    byIdentifier.set(doc.identifier, doc);
  }
  return Array.from(byIdentifier.values());
};

/**
 * Mongo snapshot target using bulk upserts keyed by `identifier`. Re-writing a cumulative
 * snapshot only refreshes documents that already exist.
 */
export class MongoSnapshotWriter implements SnapshotWriter {
  private client?: MongoClient;
  private collections?: { records: Collection<RecordDoc>; errors: Collection<ErrorDoc> };

  constructor(
    private readonly mongoUri: string,
    private readonly dbName = "cinema_scan",
    private readonly projection: ProjectionFields = defaultProjectionFields,
    private readonly collectionNames = { records: "records", errors: "fetch_errors" }
  ) {}

  async init(): Promise<void> {
    await this.getCollections();
  }

  private async getCollections(): Promise<{ records: Collection<RecordDoc>; errors: Collection<ErrorDoc> }> {
    if (this.collections) return this.collections;

    this.client = await createMongoClient(this.mongoUri);
    const db = this.client.db(this.dbName);
    const records = db.collection<RecordDoc>(this.collectionNames.records);
    const errors = db.collection<ErrorDoc>(this.collectionNames.errors);

    for (const idx of mongoIndexes.recordCollection) {
      await records.createIndex(idx.keys, idx.options);
    }
    for (const idx of mongoIndexes.errorCollection) {
      await errors.createIndex(idx.keys, idx.options);
    }

    this.collections = { records, errors };
    return this.collections;
  }

  toRecordDocs(records: LookupRecord[], label: string, updatedAt: Date): { docs: RecordDoc[]; skipped: number } {
    const docs: RecordDoc[] = [];
    let skipped = 0;
    for (const raw of records) {
      const projected = projectRecord(raw, this.projection);
      const identifier = parseRecordIdentifier(projected.identifier);
      if (identifier == null) {
        skipped += 1;
        continue;
      }
      docs.push({ identifier, name: projected.name, code: projected.code, raw, snapshotLabel: label, updatedAt });
    }
    return { docs: dedupeByIdentifier(docs), skipped };
  }

  async write(snapshot: ResultSnapshot, label: string): Promise<SnapshotWriteReport> {
    const { docs, skipped } = this.toRecordDocs(snapshot.records, label, new Date());
    const errorDocs = dedupeByIdentifier(
      snapshot.errors.map((entry: FetchFailure): ErrorDoc => ({
        identifier: entry.identifier,
        error: entry.reason,
        at: entry.at,
        snapshotLabel: label
      }))
    );

    if (skipped > 0) {
      // eslint-disable-next-line no-console
      console.warn(JSON.stringify({ event: "scan.persist_skipped", label, skipped, reason: "missing identifier field" }));
    }

    if (docs.length === 0 && errorDocs.length === 0) {
      return { label, records: 0, errors: 0, targets: [] };
    }

    const { records, errors } = await this.getCollections();
    if (docs.length > 0) {
      await records.bulkWrite(
        docs.map((doc) => ({
          updateOne: {
            filter: { identifier: doc.identifier },
            update: { $set: doc },
            upsert: true
          }
        })),
        { ordered: false }
      );
    }
    if (errorDocs.length > 0) {
      await errors.bulkWrite(
        errorDocs.map((doc) => ({
          updateOne: {
            filter: { identifier: doc.identifier },
            update: { $set: doc },
            upsert: true
          }
        })),
        { ordered: false }
      );
    }

    return {
      label,
      records: docs.length,
      errors: errorDocs.length,
      targets: [
        `${this.dbName}.${this.collectionNames.records}`,
        `${this.dbName}.${this.collectionNames.errors}`
      ]
    };
  }

  async close(): Promise<void> {
    await this.client?.close();
    this.client = undefined;
    this.collections = undefined;
  }
}
