import { describe, it, expect } from "vitest";
import { loadSampleInventory } from "../../ingest/src/sample.js";
import { processInventory } from "../src/variance.js";
import { computeFilterStats, filterProcessed, totalItemCount, totalStockValue } from "../src/stats.js";

describe("filter stats", () => {
  const { processed, summary } = processInventory(loadSampleInventory(), 30);

  it("filters by status and vendor together", () => {
    const rows = filterProcessed(processed, { status: "SHORT", vendor: "Orbit Bearings" });
    expect(rows.map((p) => p.material)).toEqual(["PX1005-BRG", "PX1008-CPL"]);
    expect(filterProcessed(processed)).toHaveLength(20);
  });

  it("counts items beyond 1.5x the tolerance as critical", () => {
    const stats = computeFilterStats(processed, 30);
    expect(stats.count).toBe(20);
    expect(stats.total_stock_value).toBe(31634);
    expect(stats.critical_items).toBe(6);
  });

  it("averages variance percent over the filtered rows", () => {
    const stats = computeFilterStats(filterProcessed(processed, { vendor: "Orbit Bearings" }), 30);
    // (-41.666.. - 66.666.. + 60 + 40) / 4
    expect(stats.average_variance_percent).toBeCloseTo(-2.0833, 3);
    expect(stats.total_stock_value).toBe(4114);
  });

  it("reports zeros for an empty selection", () => {
    expect(computeFilterStats([], 30)).toEqual({
      count: 0,
      average_variance_percent: 0,
      total_stock_value: 0,
      critical_items: 0,
    });
  });

  it("totals the status summary", () => {
    expect(totalStockValue(summary)).toBe(31634);
    expect(totalItemCount(summary)).toBe(20);
  });
});
