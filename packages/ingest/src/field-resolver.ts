import type { RawRecord } from "../../schema/src/types.js";

export type CanonicalField =
  | "qty"
  | "norm_qty"
  | "material"
  | "description"
  | "stock_value"
  | "vendor";

export type RequiredField = "qty" | "norm_qty" | "material";

// Checked in order; within a field the first candidate present wins.
export const FIELD_SYNONYMS: ReadonlyArray<readonly [CanonicalField, readonly string[]]> = [
  ["qty", ["qty", "quantity", "current_qty", "stock_qty"]],
  ["norm_qty", ["rm", "rm_qty", "required_qty", "norm_qty", "target_qty", "rm_in_qty", "ri_in_qty"]],
  ["material", ["material", "material_code", "part_number", "item_code", "code", "part_no"]],
  [
    "description",
    [
      "description",
      "item_description",
      "part_description",
      "desc",
      "part description",
      "material_description",
      "part_desc",
    ],
  ],
  ["stock_value", ["stock_value", "value", "amount", "cost"]],
  ["vendor", ["vendor", "vendor_name", "supplier", "supplier_name"]],
];

export const REQUIRED_FIELDS: readonly RequiredField[] = ["qty", "norm_qty", "material"];

export type ColumnMapping = Partial<Record<CanonicalField, string>>;

export type ResolvedColumns = ColumnMapping & Record<RequiredField, string>;

export type ColumnResolution =
  | { ok: true; columns: ResolvedColumns }
  | { ok: false; missing: RequiredField[]; columns: ColumnMapping };

export function normalizeHeader(label: string): string {
  return label.trim().toLowerCase().replace(/\s+/g, "_");
}

/**
 * Union of header labels across records, in first-seen order.
 * Spreadsheet rows may omit empty trailing cells, so one row is not enough.
 */
export function collectHeaders(records: readonly RawRecord[]): string[] {
  const seen = new Set<string>();
  for (const r of records) {
    if (r == null || typeof r !== "object") continue;
    for (const k of Object.keys(r)) seen.add(k);
  }
  return [...seen];
}

/**
 * Map dataset headers to canonical fields.
 * Matching is on normalized labels; the returned columns are the original labels.
 */
export function resolveColumns(headers: readonly string[]): ColumnResolution {
  // normalized label -> original label (later duplicates win)
  const available = new Map<string, string>();
  for (const h of headers) available.set(normalizeHeader(h), h);

  const columns: ColumnMapping = {};
  for (const [field, candidates] of FIELD_SYNONYMS) {
    for (const candidate of candidates) {
      const original = available.get(normalizeHeader(candidate));
      if (original !== undefined) {
        columns[field] = original;
        break;
      }
    }
  }

  const { qty, norm_qty, material } = columns;
  if (qty === undefined || norm_qty === undefined || material === undefined) {
    return {
      ok: false,
      missing: REQUIRED_FIELDS.filter((f) => columns[f] === undefined),
      columns,
    };
  }

  return { ok: true, columns: { ...columns, qty, norm_qty, material } };
}
