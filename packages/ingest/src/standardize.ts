import type { CanonicalItem, RawRecord } from "../../schema/src/types.js";
import { UNKNOWN_VENDOR } from "../../schema/src/types.js";
import { safeFloat, safeInt } from "./coerce.js";
import {
  collectHeaders,
  resolveColumns,
  type RequiredField,
  type ResolvedColumns,
} from "./field-resolver.js";

export type StandardizeStats = {
  total: number;
  accepted: number;
  invalid: number; // empty/"nan" material or negative quantities; 0 when a required column is missing
  failed: number; // threw while being built
};

export type StandardizeResult =
  | {
      ok: true;
      items: CanonicalItem[];
      columns: ResolvedColumns | null; // null when there were no records to inspect
      stats: StandardizeStats;
    }
  | {
      ok: false;
      error: "MISSING_REQUIRED_COLUMN";
      missing: RequiredField[];
      items: [];
      stats: StandardizeStats;
    };

export type StandardizeOptions = {
  onRecordError?: (index: number, error: unknown) => void;
};

function cellText(record: RawRecord, column: string | undefined): string {
  if (column === undefined) return "";
  const v = record[column];
  return v == null ? "" : String(v).trim();
}

function isUsableMaterial(material: string): boolean {
  return material !== "" && material.toLowerCase() !== "nan";
}

function buildItem(record: RawRecord, columns: ResolvedColumns): CanonicalItem | null {
  const material = cellText(record, columns.material);
  const qty = safeFloat(record[columns.qty]);
  const norm_qty = safeFloat(record[columns.norm_qty]);

  if (!isUsableMaterial(material) || qty < 0 || norm_qty < 0) return null;

  const vendor = cellText(record, columns.vendor);

  return Object.freeze({
    material,
    description: cellText(record, columns.description),
    qty,
    norm_qty,
    stock_value: columns.stock_value === undefined ? 0 : safeInt(record[columns.stock_value]),
    vendor: vendor === "" ? UNKNOWN_VENDOR : vendor,
  });
}

/**
 * Turn arbitrary keyed rows into canonical items.
 *
 * Rows that fail validation are dropped; a row that throws while being read is
 * skipped and the rest of the batch continues. Accepted items keep row order.
 */
export function standardizeInventoryRecords(
  records: readonly RawRecord[],
  options: StandardizeOptions = {}
): StandardizeResult {
  const stats: StandardizeStats = { total: records.length, accepted: 0, invalid: 0, failed: 0 };

  if (records.length === 0) {
    return { ok: true, items: [], columns: null, stats };
  }

  const resolution = resolveColumns(collectHeaders(records));
  if (!resolution.ok) {
    return {
      ok: false,
      error: "MISSING_REQUIRED_COLUMN",
      missing: resolution.missing,
      items: [],
      stats,
    };
  }

  const items: CanonicalItem[] = [];

  records.forEach((record, index) => {
    try {
      const item = buildItem(record, resolution.columns);
      if (item) {
        items.push(item);
        stats.accepted += 1;
      } else {
        stats.invalid += 1;
      }
    } catch (err) {
      stats.failed += 1;
      options.onRecordError?.(index, err);
    }
  });

  return { ok: true, items, columns: resolution.columns, stats };
}
