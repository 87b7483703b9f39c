import type { ProcessedItem, SummaryTotals, VendorSummaryMap } from "./types.js";
import { INVENTORY_STATUSES } from "./types.js";

export type InvariantViolationCode =
  | "STATUS_PARTITION"
  | "VARIANCE_MISMATCH"
  | "VENDOR_PARTITION"
  | "VENDOR_TOTAL";

export type InvariantViolation = {
  code: InvariantViolationCode;
  message: string;
  path: string; // JSON pointer-like path for debugging
};

export type AnalysisSnapshot = {
  processed: readonly ProcessedItem[];
  summary: SummaryTotals;
  vendors: VendorSummaryMap;
};

export function checkAnalysisInvariants(a: AnalysisSnapshot): InvariantViolation[] {
  const v: InvariantViolation[] = [];

  // ---- Status counts partition the processed list
  const counted = INVENTORY_STATUSES.reduce((s, status) => s + a.summary[status].count, 0);
  if (counted !== a.processed.length) {
    v.push({
      code: "STATUS_PARTITION",
      message: `Status counts sum to ${counted} but ${a.processed.length} items were processed`,
      path: "/summary",
    });
  }

  // ---- Variance value is exactly qty - norm_qty
  a.processed.forEach((item, i) => {
    if (item.variance_value !== item.qty - item.norm_qty) {
      v.push({
        code: "VARIANCE_MISMATCH",
        message: `Item '${item.material}' variance_value ${item.variance_value} != ${item.qty} - ${item.norm_qty}`,
        path: `/processed/${i}/variance_value`,
      });
    }
  });

  // ---- Per-vendor status split
  let vendorParts = 0;
  for (const [vendor, s] of a.vendors.entries()) {
    vendorParts += s.total_parts;
    const split = s.short_parts + s.excess_parts + s.normal_parts;
    if (split !== s.total_parts) {
      v.push({
        code: "VENDOR_PARTITION",
        message: `Vendor '${vendor}' status split ${split} != total_parts ${s.total_parts}`,
        path: `/vendors/${vendor}`,
      });
    }
  }

  if (vendorParts !== a.processed.length) {
    v.push({
      code: "VENDOR_TOTAL",
      message: `Vendor total_parts sum to ${vendorParts} but ${a.processed.length} items were processed`,
      path: "/vendors",
    });
  }

  return v;
}
