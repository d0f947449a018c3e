import {
  dedupeByIdentifier,
  MongoSnapshotWriter,
  parseRecordIdentifier
} from "../../src/infrastructure/mongo/MongoSnapshotWriter";
import type { ResultSnapshot } from "../../src/core/scan/scan.types";

type FakeCollections = {
  records: { bulkWrite: jest.Mock };
  errors: { bulkWrite: jest.Mock };
};

const withFakeCollections = (writer: MongoSnapshotWriter): FakeCollections => {
  const collections: FakeCollections = {
    records: { bulkWrite: jest.fn().mockResolvedValue({}) },
    errors: { bulkWrite: jest.fn().mockResolvedValue({}) }
  };
  (writer as unknown as { getCollections: () => Promise<FakeCollections> }).getCollections = async () => collections;
  return collections;
};

describe("MongoSnapshotWriter", () => {
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    warnSpy = jest.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    warnSpy.mockRestore();
  });

  it.each([
    [12, 12],
    ["12", 12],
    [" 7 ", 7],
    [0, undefined],
    [-3, undefined],
    [1.5, undefined],
    ["12a", undefined],
    [null, undefined],
    [true, undefined]
  ])("parses record identifier %p as %p", (value, expected) => {
    expect(parseRecordIdentifier(value)).toBe(expected);
  });

  it("dedupe helper keeps the last occurrence per identifier", () => {
    const deduped = dedupeByIdentifier([
      { identifier: 1, v: "old" },
      { identifier: 2, v: "only" },
      { identifier: 1, v: "new" }
    ]);

    expect(deduped).toEqual([
      { identifier: 1, v: "new" },
      { identifier: 2, v: "only" }
    ]);
  });

  it("returns early for empty snapshots without connecting", async () => {
    const writer = new MongoSnapshotWriter("mongodb://localhost:27017/cinema_scan");
    const getCollections = jest.fn();
    (writer as unknown as { getCollections: typeof getCollections }).getCollections = getCollections;

    await expect(writer.write({ records: [], errors: [] }, "L")).resolves.toEqual({
      label: "L",
      records: 0,
      errors: 0,
      targets: []
    });
    expect(getCollections).not.toHaveBeenCalled();
  });

  it("upserts records by identifier with projection fields and raw payload", async () => {
    const writer = new MongoSnapshotWriter("mongodb://localhost:27017/cinema_scan", "scan_db");
    const collections = withFakeCollections(writer);
    const at = new Date("2026-03-01T08:00:00.000Z");
    const snapshot: ResultSnapshot = {
      records: [
        { CinemaID: 1, CinemaName: "A", ZZID: "44010001" },
        { CinemaID: "2", CinemaName: "B", ZZID: "44010002" }
      ],
      errors: [{ kind: "failure", identifier: 9, reason: "HTTP 503", at }]
    };

    const report = await writer.write(snapshot, "20260301_080000");

    expect(report).toEqual({
      label: "20260301_080000",
      records: 2,
      errors: 1,
      targets: ["scan_db.records", "scan_db.fetch_errors"]
    });

    const [recordOps, recordOptions] = collections.records.bulkWrite.mock.calls[0] as [
      Array<{ updateOne: { filter: unknown; update: { $set: Record<string, unknown> }; upsert: boolean } }>,
      unknown
    ];
    expect(recordOptions).toEqual({ ordered: false });
    expect(recordOps.map((op) => op.updateOne.filter)).toEqual([{ identifier: 1 }, { identifier: 2 }]);
    expect(recordOps[1].updateOne.upsert).toBe(true);
    expect(recordOps[1].updateOne.update.$set).toMatchObject({
      identifier: 2,
      name: "B",
      code: "44010002",
      raw: { CinemaID: "2", CinemaName: "B", ZZID: "44010002" },
      snapshotLabel: "20260301_080000"
    });

    expect(collections.errors.bulkWrite).toHaveBeenCalledWith(
      [
        {
          updateOne: {
            filter: { identifier: 9 },
            update: { $set: { identifier: 9, error: "HTTP 503", at, snapshotLabel: "20260301_080000" } },
            upsert: true
          }
        }
      ],
      { ordered: false }
    );
  });

  it("skips records without a usable identifier and logs how many", async () => {
    const writer = new MongoSnapshotWriter("mongodb://localhost:27017/cinema_scan");
    const collections = withFakeCollections(writer);

    const report = await writer.write({ records: [{ CinemaName: "no id" }, { CinemaID: 3 }], errors: [] }, "L");

    expect(report.records).toBe(1);
    expect(collections.errors.bulkWrite).not.toHaveBeenCalled();
    expect(JSON.parse(String(warnSpy.mock.calls[0][0]))).toEqual({
      event: "scan.persist_skipped",
      label: "L",
      skipped: 1,
      reason: "missing identifier field"
    });
  });

  it("close is safe before any connection was made", async () => {
    const writer = new MongoSnapshotWriter("mongodb://localhost:27017/cinema_scan");
    await expect(writer.close()).resolves.toBeUndefined();
  });
});
