import type {
  InventoryStatus,
  ProcessedItem,
  SummaryTotals,
} from "../../schema/src/types.js";
import { INVENTORY_STATUSES } from "../../schema/src/types.js";

export type ProcessedFilter = {
  status?: InventoryStatus;
  vendor?: string;
};

export function filterProcessed(processed: readonly ProcessedItem[], f: ProcessedFilter = {}): ProcessedItem[] {
  return processed.filter(
    (p) => (f.status === undefined || p.status === f.status) && (f.vendor === undefined || p.vendor === f.vendor)
  );
}

export type FilterStats = {
  count: number;
  average_variance_percent: number;
  total_stock_value: number;
  critical_items: number; // |variance %| beyond 1.5x tolerance
};

export const CRITICAL_TOLERANCE_FACTOR = 1.5;

export function computeFilterStats(items: readonly ProcessedItem[], tolerance: number): FilterStats {
  const count = items.length;
  const sumPct = items.reduce((s, p) => s + p.variance_percent, 0);

  return {
    count,
    average_variance_percent: count > 0 ? sumPct / count : 0,
    total_stock_value: items.reduce((s, p) => s + p.stock_value, 0),
    critical_items: items.filter((p) => Math.abs(p.variance_percent) > tolerance * CRITICAL_TOLERANCE_FACTOR).length,
  };
}

export function totalStockValue(summary: SummaryTotals): number {
  return INVENTORY_STATUSES.reduce((s, status) => s + summary[status].value, 0);
}

export function totalItemCount(summary: SummaryTotals): number {
  return INVENTORY_STATUSES.reduce((s, status) => s + summary[status].count, 0);
}
