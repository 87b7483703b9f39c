import type { InventoryStatus, ProcessedItem } from "../../schema/src/types.js";

export const DEFAULT_TOP_K = 10;
export const DEFAULT_TOP_K_PER_VENDOR = 3;

/**
 * Shortages rank by size of the deficit; excess and within-norms rank by the
 * signed surplus.
 */
export function rankingKey(status: InventoryStatus): (p: ProcessedItem) => number {
  return status === "SHORT" ? (p) => Math.abs(p.variance_value) : (p) => p.variance_value;
}

// Array.prototype.sort is stable, so equal keys keep input order.
function topBy(items: readonly ProcessedItem[], key: (p: ProcessedItem) => number, k: number): ProcessedItem[] {
  return [...items].sort((a, b) => key(b) - key(a)).slice(0, Math.max(0, k));
}

export function topPartsByStatus(
  processed: readonly ProcessedItem[],
  status: InventoryStatus,
  k = DEFAULT_TOP_K
): ProcessedItem[] {
  return topBy(
    processed.filter((p) => p.status === status),
    rankingKey(status),
    k
  );
}

export type VendorTopParts = {
  vendor: string;
  parts: ProcessedItem[];
};

/** Top k parts of the given status within each vendor, vendors in first-seen order. */
export function topPartsByVendor(
  processed: readonly ProcessedItem[],
  status: InventoryStatus,
  k = DEFAULT_TOP_K_PER_VENDOR
): VendorTopParts[] {
  const groups = new Map<string, ProcessedItem[]>();
  for (const p of processed) {
    if (p.status !== status) continue;
    const g = groups.get(p.vendor) ?? [];
    g.push(p);
    groups.set(p.vendor, g);
  }

  const key = rankingKey(status);
  return [...groups.entries()].map(([vendor, items]) => ({ vendor, parts: topBy(items, key, k) }));
}

export function topPartsByAbsoluteVariance(processed: readonly ProcessedItem[], k = DEFAULT_TOP_K): ProcessedItem[] {
  return topBy(processed, (p) => Math.abs(p.variance_value), k);
}

export function topPartsByStockValue(processed: readonly ProcessedItem[], k = DEFAULT_TOP_K): ProcessedItem[] {
  return topBy(processed, (p) => p.stock_value, k);
}
