// ---------- Variance / classification (stable public API) ----------
export {
  calculateVariance,
  determineStatus,
  emptySummaryTotals,
  processInventory,
} from "./variance.js";

export type {
  Variance,
  ProcessedInventory,
} from "./variance.js";

// ---------- Vendor rollups ----------
export {
  summarizeByVendor,
  listVendors,
  rankVendorsBy,
} from "./vendors.js";

export type {
  VendorMetric,
  RankedVendor,
} from "./vendors.js";

// ---------- Ranking ----------
export {
  DEFAULT_TOP_K,
  DEFAULT_TOP_K_PER_VENDOR,
  rankingKey,
  topPartsByStatus,
  topPartsByVendor,
  topPartsByAbsoluteVariance,
  topPartsByStockValue,
} from "./ranking.js";

export type { VendorTopParts } from "./ranking.js";

// ---------- Filters / statistics ----------
export {
  CRITICAL_TOLERANCE_FACTOR,
  filterProcessed,
  computeFilterStats,
  totalStockValue,
  totalItemCount,
} from "./stats.js";

export type { ProcessedFilter, FilterStats } from "./stats.js";
