import type { LookupRecord, LookupValue } from "../scan/scan.types";

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const toLookupValue = (value: unknown): LookupValue => {
  if (value == null) return null;
  if (typeof value === "string" || typeof value === "boolean") return value;
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  return JSON.stringify(value) ?? null;
};

/**
 * Extracts the first row of `data.table0` from a lookup response.
 *
 * Returns undefined when the endpoint reports anything other than `status: 1`, or when
 * the table is missing, empty, or starts with an empty row.
 */
export const parseLookupPayload = (payload: unknown): LookupRecord | undefined => {
  if (!isRecord(payload) || payload.status !== 1) return undefined;

  const data = payload.data;
  if (!isRecord(data)) return undefined;

  const table = data.table0;
  if (!Array.isArray(table) || table.length === 0) return undefined;

  const row: unknown = table[0];
  if (!isRecord(row) || Object.keys(row).length === 0) return undefined;

  const record: LookupRecord = {};
  for (const [field, value] of Object.entries(row)) {
    record[field] = toLookupValue(value);
  }
  return record;
};
