import { describe, it, expect } from "vitest";
import type { CanonicalItem, RawRecord } from "../../schema/src/types.js";
import { checkAnalysisInvariants } from "../../schema/src/invariants.js";
import { createLogger, type LogSink } from "../src/logger.js";
import { analysisToJson, runInventoryAnalysis } from "../src/run-analysis.js";

const quiet = createLogger("test", "silent");

function capture(level: "info" | "debug") {
  const lines: string[] = [];
  const push = (message: unknown) => {
    lines.push(String(message));
  };
  const sink: LogSink = { error: push, warn: push, info: push, debug: push };
  return { logger: createLogger("inventory/analysis", level, sink), lines };
}

const upload: RawRecord[] = [
  { "Part No": "U-1", Quantity: "28", "RM Qty": "20", Value: "1,000", Vendor: "Acme" },
  { "Part No": "U-2", Quantity: "22", "RM Qty": "20", Value: "250", Vendor: "Acme" },
];

describe("runInventoryAnalysis", () => {
  it("analyzes uploaded records without notices", () => {
    const a = runInventoryAnalysis({ records: upload }, { logger: quiet });

    expect(a.source).toBe("upload");
    expect(a.tolerance).toBe(30);
    expect(a.notices).toEqual([]);
    expect(a.ingest).toEqual({ total: 2, accepted: 2, invalid: 0, failed: 0 });
    expect(a.processed.map((p) => [p.material, p.status])).toEqual([
      ["U-1", "EXCESS"],
      ["U-2", "WITHIN_NORMS"],
    ]);
    expect(a.summary.EXCESS).toEqual({ count: 1, value: 1000 });
    expect(a.vendors.get("Acme")).toMatchObject({ total_parts: 2, excess_parts: 1, normal_parts: 1, total_value: 1250 });
    expect(checkAnalysisInvariants(a)).toEqual([]);
  });

  it("uses the request tolerance over the configured one", () => {
    const a = runInventoryAnalysis({ records: upload, tolerance: 50 }, { logger: quiet });
    expect(a.tolerance).toBe(50);
    expect(a.summary.WITHIN_NORMS.count).toBe(2);
  });

  it("falls back to sample data when no records are supplied", () => {
    const a = runInventoryAnalysis({}, { logger: quiet });

    expect(a.source).toBe("sample");
    expect(a.ingest).toBeNull();
    expect(a.notices).toEqual([
      { code: "SAMPLE_DATA_DEFAULT", message: "No inventory records supplied; using sample data." },
    ]);
    expect(a.processed).toHaveLength(20);
    expect(a.summary.SHORT).toEqual({ count: 6, value: 13675 });
    expect(checkAnalysisInvariants(a)).toEqual([]);
  });

  it("falls back when required columns are missing and names them", () => {
    const a = runInventoryAnalysis({ records: [{ Material: "X-1", Vendor: "Acme" }] }, { logger: quiet });

    expect(a.source).toBe("sample");
    expect(a.notices).toEqual([
      {
        code: "MISSING_REQUIRED_COLUMN",
        message: "Required column(s) not found: QTY/Quantity, RM/Norm QTY; using sample data.",
      },
    ]);
    expect(a.ingest).toEqual({ total: 1, accepted: 0, invalid: 0, failed: 0 });
  });

  it("falls back when no row survives validation", () => {
    const a = runInventoryAnalysis({ records: [{ Material: "nan", QTY: 1, RM: 1 }] }, { logger: quiet });

    expect(a.source).toBe("sample");
    expect(a.notices.map((n) => n.code)).toEqual(["NO_VALID_RECORDS"]);
    expect(a.ingest).toEqual({ total: 1, accepted: 0, invalid: 1, failed: 0 });
  });

  it("uses an injected fallback dataset", () => {
    const fallback: CanonicalItem[] = [
      { material: "S-1", description: "", qty: 1, norm_qty: 10, stock_value: 7, vendor: "Spare" },
    ];
    const a = runInventoryAnalysis({ records: [] }, { logger: quiet, loadSample: () => fallback });

    expect(a.processed.map((p) => [p.material, p.status])).toEqual([["S-1", "SHORT"]]);
    expect(a.notices.map((n) => n.code)).toEqual(["NO_VALID_RECORDS"]);
  });

  it("takes the tolerance default from config", () => {
    const a = runInventoryAnalysis(
      { records: upload },
      { logger: quiet, config: { tolerance: 5, topK: 10, topKPerVendor: 3, logLevel: "silent" } }
    );
    expect(a.processed.map((p) => p.status)).toEqual(["EXCESS", "EXCESS"]);
  });

  it("throws on an invalid tolerance", () => {
    expect(() => runInventoryAnalysis({ records: upload, tolerance: -10 }, { logger: quiet })).toThrow();
  });

  it("logs a one-line summary at info", () => {
    const { logger, lines } = capture("info");
    runInventoryAnalysis({ records: upload }, { logger });

    expect(lines).toEqual([
      "[inventory/analysis] source=upload items=2 tolerance=30 within=1 excess=1 short=0 vendors=1",
    ]);
  });

  it("logs skipped rows at debug", () => {
    const broken: RawRecord = { Material: "B-1", RM: 1 };
    Object.defineProperty(broken, "QTY", {
      enumerable: true,
      get() {
        throw new Error("unreadable cell");
      },
    });

    const { logger, lines } = capture("debug");
    const a = runInventoryAnalysis({ records: [broken, { Material: "B-2", QTY: 1, RM: 1 }] }, { logger });

    expect(a.ingest).toEqual({ total: 2, accepted: 1, invalid: 0, failed: 1 });
    expect(lines[0]).toBe("[inventory/analysis] skipped row 0: unreadable cell");
  });
});

describe("analysisToJson", () => {
  it("turns the vendor map into an object in first-seen order", () => {
    const json = analysisToJson(runInventoryAnalysis({}, { logger: quiet }));

    expect(Object.keys(json.vendors)).toEqual([
      "Northwind Metals",
      "Keystone Castings",
      "Harbor Seals",
      "Orbit Bearings",
      "Pioneer Valves",
    ]);
    expect(json.vendors["Harbor Seals"]).toMatchObject({ total_parts: 4, total_value: 3700, short_parts: 1, normal_parts: 3 });
    expect(JSON.parse(JSON.stringify(json)).source).toBe("sample");
  });
});
