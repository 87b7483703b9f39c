// Inventory norms data model.
// Types only. Runtime validation lives in validate.ts.

/* ------------------------------- Input ------------------------------- */

export type CellValue = string | number | boolean | null | undefined;

// One keyed row from a spreadsheet/CSV collaborator. Keys are header labels
// as they appear in the source (case and spacing are not normalized).
export type RawRecord = Record<string, CellValue>;

/* ------------------------------- Status ------------------------------ */

export type InventoryStatus = "WITHIN_NORMS" | "EXCESS" | "SHORT";

export const INVENTORY_STATUSES: readonly InventoryStatus[] = [
  "WITHIN_NORMS",
  "EXCESS",
  "SHORT",
];

export const STATUS_LABELS: Record<InventoryStatus, string> = {
  WITHIN_NORMS: "Within Norms",
  EXCESS: "Excess Inventory",
  SHORT: "Short Inventory",
};

/* -------------------------------- Items ------------------------------ */

export type CanonicalItem = Readonly<{
  material: string;
  description: string;
  qty: number;
  norm_qty: number;
  stock_value: number;
  vendor: string;
}>;

export type ProcessedItem = Readonly<
  CanonicalItem & {
    variance_percent: number;
    variance_value: number; // qty - norm_qty
    status: InventoryStatus;
  }
>;

/* ------------------------------ Rollups ------------------------------ */

export type StatusTotals = {
  count: number;
  value: number; // summed stock_value
};

export type SummaryTotals = Record<InventoryStatus, StatusTotals>;

export type VendorSummary = {
  total_parts: number;
  total_qty: number;
  total_rm: number;
  total_value: number;

  short_parts: number;
  excess_parts: number;
  normal_parts: number;

  short_value: number;
  excess_value: number;
  normal_value: number;
};

// Insertion order == first-seen order of the vendor in the processed list.
export type VendorSummaryMap = Map<string, VendorSummary>;

export const UNKNOWN_VENDOR = "Unknown";
