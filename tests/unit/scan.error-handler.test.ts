import {
  ScanFatalError,
  createScanRunSummaryTracker,
  toErrorMessage,
  wrapConfigFailure,
  wrapWriterInitFailure
} from "../../src/application/scan-range/scan.error-handler";
import { failure, notFound, success } from "../../src/core/scan/scan.types";

describe("scan error handler", () => {
  it("extracts messages from errors and arbitrary values", () => {
    expect(toErrorMessage(new Error("boom"))).toBe("boom");
    expect(toErrorMessage("plain")).toBe("plain");
    expect(toErrorMessage(42)).toBe("42");
  });

  it("wraps configuration failures with code and context", () => {
    const original = new Error("SCAN_WORKERS=99 is out of allowed range [1..64]");
    const wrapped = wrapConfigFailure(original, { workerCount: 99 });

    expect(wrapped).toBeInstanceOf(ScanFatalError);
    expect(wrapped.name).toBe("ScanFatalError");
    expect(wrapped.code).toBe("config_invalid");
    expect(wrapped.context).toEqual({ workerCount: 99 });
    expect(wrapped.message).toBe("Invalid scan configuration: SCAN_WORKERS=99 is out of allowed range [1..64]");
    expect(wrapped.cause).toBe(original);
  });

  it("wraps writer init failures", () => {
    const wrapped = wrapWriterInitFailure(new Error("connect ECONNREFUSED"));

    expect(wrapped.code).toBe("writer_init_failed");
    expect(wrapped.message).toBe("Snapshot writer could not be initialised: connect ECONNREFUSED");
    expect(wrapped.context).toEqual({});
  });
});

describe("createScanRunSummaryTracker", () => {
  it("counts outcomes by kind and tracks the last identifier", () => {
    const tracker = createScanRunSummaryTracker(5);
    const at = new Date("2026-01-01T00:00:00.000Z");

    expect(tracker.record(success(1, { CinemaID: 1 }))).toBe(1);
    expect(tracker.record(notFound(2))).toBe(2);
    expect(tracker.record(failure(3, "HTTP 503", at))).toBe(3);
    tracker.addDrained(2);
    tracker.addCheckpoint();
    tracker.markCancelled();

    expect(tracker.progress()).toEqual({ processed: 3, total: 5, found: 1, lastIdentifier: 3 });
    expect(tracker.summary()).toEqual({
      total: 5,
      processed: 3,
      found: 1,
      notFound: 1,
      failed: 1,
      drained: 2,
      cancelled: true,
      checkpoints: 1
    });
  });
});
