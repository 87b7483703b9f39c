import type {
  ProcessedItem,
  VendorSummary,
  VendorSummaryMap,
} from "../../schema/src/types.js";

function emptyVendorSummary(): VendorSummary {
  return {
    total_parts: 0,
    total_qty: 0,
    total_rm: 0,
    total_value: 0,
    short_parts: 0,
    excess_parts: 0,
    normal_parts: 0,
    short_value: 0,
    excess_value: 0,
    normal_value: 0,
  };
}

/** Single pass; vendors appear in the order they are first seen. */
export function summarizeByVendor(processed: readonly ProcessedItem[]): VendorSummaryMap {
  const out: VendorSummaryMap = new Map();

  for (const item of processed) {
    let s = out.get(item.vendor);
    if (!s) {
      s = emptyVendorSummary();
      out.set(item.vendor, s);
    }

    s.total_parts += 1;
    s.total_qty += item.qty;
    s.total_rm += item.norm_qty;
    s.total_value += item.stock_value;

    if (item.status === "SHORT") {
      s.short_parts += 1;
      s.short_value += item.stock_value;
    } else if (item.status === "EXCESS") {
      s.excess_parts += 1;
      s.excess_value += item.stock_value;
    } else {
      s.normal_parts += 1;
      s.normal_value += item.stock_value;
    }
  }

  return out;
}

/** Distinct vendor names, alphabetical (for pickers and filters). */
export function listVendors(processed: readonly ProcessedItem[]): string[] {
  return [...new Set(processed.map((p) => p.vendor))].sort((a, b) => a.localeCompare(b));
}

export type VendorMetric = keyof VendorSummary;

export type RankedVendor = { vendor: string; summary: VendorSummary };

export function rankVendorsBy(summary: VendorSummaryMap, metric: VendorMetric, k = 10): RankedVendor[] {
  return [...summary.entries()]
    .map(([vendor, s]) => ({ vendor, summary: s }))
    .sort((a, b) => b.summary[metric] - a.summary[metric])
    .slice(0, k);
}
