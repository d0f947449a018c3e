import type { LookupRecord, LookupValue } from "../scan/scan.types";

export type ProjectionFields = {
  identifier: string;
  name: string;
  code: string;
};

export type ProjectedRecord = {
  identifier: LookupValue;
  name: LookupValue;
  code: LookupValue;
};

export const defaultProjectionFields: ProjectionFields = {
  identifier: "CinemaID",
  name: "CinemaName",
  code: "ZZID"
};

export const projectRecord = (record: LookupRecord, fields: ProjectionFields = defaultProjectionFields): ProjectedRecord => ({
  identifier: record[fields.identifier] ?? null,
  name: record[fields.name] ?? null,
  code: record[fields.code] ?? null
});

/** Union of every field seen across records, in first-seen order. */
export const collectColumns = (records: LookupRecord[]): string[] => {
  const columns = new Set<string>();
  for (const record of records) {
    for (const field of Object.keys(record)) columns.add(field);
  }
  return Array.from(columns);
};
