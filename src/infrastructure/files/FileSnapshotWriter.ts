import { mkdir, writeFile } from "fs/promises";
import path from "path";
import { stringify } from "csv-stringify/sync";
import { Workbook } from "exceljs";
import type { SnapshotWriter, SnapshotWriteReport } from "../../ports/SnapshotWriter";
import type { LookupValue, ResultSnapshot } from "../../core/scan/scan.types";
import { collectColumns, defaultProjectionFields, projectRecord, type ProjectionFields } from "../../core/records/projection";

export const projectionColumns = ["identifier", "name", "code"] as const;
export const errorColumns = ["identifier", "error", "timestamp"] as const;

type Row = Record<string, LookupValue | undefined>;

type SheetView = {
  name: string;
  columns: string[];
  rows: Row[];
};

/** RFC 4180 text with a header row; null and missing cells are empty. */
export const toCsv = (columns: string[], rows: Row[]): string => {
  if (columns.length === 0) return "";
  return stringify([columns, ...rows.map((row) => columns.map((column) => row[column] ?? null))], {
    record_delimiter: "windows",
    cast: { boolean: (value) => String(value) }
  });
};

const writeWorkbook = async (target: string, view: SheetView): Promise<void> => {
  const workbook = new Workbook();
  const worksheet = workbook.addWorksheet(view.name);

  worksheet.columns = view.columns.map((column) => ({ header: column, key: column, width: 20 }));
  worksheet.getRow(1).font = { bold: true };

  for (const row of view.rows) {
    worksheet.addRow(row);
  }

  await workbook.xlsx.writeFile(target);
};

/**
 * Writes the full records, their projection and the error log for one snapshot label, each as
 * an `.xlsx` workbook and a `.csv` file. Files of earlier labels are left untouched.
 */
export class FileSnapshotWriter implements SnapshotWriter {
  constructor(
    private readonly outputDir: string,
    private readonly projection: ProjectionFields = defaultProjectionFields
  ) {}

  async init(): Promise<void> {
    await mkdir(this.outputDir, { recursive: true });
  }

  async write(snapshot: ResultSnapshot, label: string): Promise<SnapshotWriteReport> {
    await this.init();

    const views: SheetView[] = [
      {
        name: "records",
        columns: collectColumns(snapshot.records),
        rows: snapshot.records
      },
      {
        name: "projection",
        columns: [...projectionColumns],
        rows: snapshot.records.map((record) => projectRecord(record, this.projection))
      },
      {
        name: "errors",
        columns: [...errorColumns],
        rows: snapshot.errors.map((entry) => ({
          identifier: entry.identifier,
          error: entry.reason,
          timestamp: entry.at.toISOString()
        }))
      }
    ];

    const targets: string[] = [];
    for (const view of views) {
      const workbookTarget = path.join(this.outputDir, `${view.name}_${label}.xlsx`);
      await writeWorkbook(workbookTarget, view);
      targets.push(workbookTarget);

      const csvTarget = path.join(this.outputDir, `${view.name}_${label}.csv`);
      await writeFile(csvTarget, toCsv(view.columns, view.rows), "utf8");
      targets.push(csvTarget);
    }

    return {
      label,
      records: snapshot.records.length,
      errors: snapshot.errors.length,
      targets
    };
  }
}
