import type {
  CanonicalItem,
  InventoryStatus,
  ProcessedItem,
  SummaryTotals,
} from "../../schema/src/types.js";
import { parseTolerance } from "../../schema/src/validate.js";

export type Variance = {
  percent: number;
  value: number; // qty - norm
};

/**
 * Signed deviation of qty from norm.
 *
 * A zero norm yields percent = 0 while value keeps the raw difference, so a
 * positive qty against a zero norm classifies as WITHIN_NORMS.
 */
export function calculateVariance(qty: number, norm: number): Variance {
  const value = qty - norm;
  if (norm === 0) return { percent: 0, value };
  return { percent: (value / norm) * 100, value };
}

export function determineStatus(percent: number, tolerance: number): InventoryStatus {
  if (Math.abs(percent) <= tolerance) return "WITHIN_NORMS";
  if (percent > tolerance) return "EXCESS";
  return "SHORT";
}

export function emptySummaryTotals(): SummaryTotals {
  return {
    WITHIN_NORMS: { count: 0, value: 0 },
    EXCESS: { count: 0, value: 0 },
    SHORT: { count: 0, value: 0 },
  };
}

export type ProcessedInventory = {
  processed: ProcessedItem[];
  summary: SummaryTotals;
};

/**
 * Classify every item against the tolerance band (percent, e.g. 30 for ±30%).
 * Output order matches input order; ranking relies on it for tie-breaking.
 */
export function processInventory(items: readonly CanonicalItem[], tolerance: number): ProcessedInventory {
  const tol = parseTolerance(tolerance);
  const summary = emptySummaryTotals();

  const processed = items.map((item) => {
    const { percent, value } = calculateVariance(item.qty, item.norm_qty);
    const status = determineStatus(percent, tol);

    summary[status].count += 1;
    summary[status].value += item.stock_value;

    const row: ProcessedItem = Object.freeze({
      material: item.material,
      description: item.description,
      qty: item.qty,
      norm_qty: item.norm_qty,
      variance_percent: percent,
      variance_value: value,
      status,
      stock_value: item.stock_value,
      vendor: item.vendor,
    });
    return row;
  });

  return { processed, summary };
}
