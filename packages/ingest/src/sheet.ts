import { readFileSync } from "node:fs";
import * as XLSX from "xlsx";

import type { CellValue, RawRecord } from "../../schema/src/types.js";

export type SheetReadOptions = {
  sheet?: string; // defaults to the first sheet
};

function toCellValue(v: unknown): CellValue {
  if (v == null) return null;
  if (typeof v === "string" || typeof v === "number" || typeof v === "boolean") return v;
  if (v instanceof Date) return Number.isNaN(v.getTime()) ? null : v.toISOString();
  return String(v);
}

/**
 * Parse CSV/XLSX/XLS content into keyed rows (header row -> keys).
 * Cells keep their stored values: CSV fields stay text (no date or number
 * sniffing) and workbook numbers keep full precision. A string is treated as
 * CSV text.
 */
export function readSheetRecords(data: Uint8Array | string, opts: SheetReadOptions = {}): RawRecord[] {
  const workbook =
    typeof data === "string"
      ? XLSX.read(data, { type: "string", raw: true })
      : XLSX.read(data, { type: Buffer.isBuffer(data) ? "buffer" : "array" });

  const sheetName = opts.sheet ?? workbook.SheetNames[0];
  if (sheetName === undefined) return [];

  const worksheet = workbook.Sheets[sheetName];
  if (!worksheet) {
    throw new Error(`Sheet "${sheetName}" not found. Available: ${workbook.SheetNames.join(", ")}`);
  }

  const rows = XLSX.utils.sheet_to_json<Record<string, unknown>>(worksheet, { defval: null, raw: true });

  return rows.map((row) => {
    const out: RawRecord = {};
    for (const [k, v] of Object.entries(row)) out[k] = toCellValue(v);
    return out;
  });
}

export function readSheetFile(filePath: string, opts: SheetReadOptions = {}): RawRecord[] {
  const buf = readFileSync(filePath);
  if (filePath.toLowerCase().endsWith(".csv")) {
    return readSheetRecords(buf.toString("utf-8"), opts);
  }
  return readSheetRecords(buf, opts);
}
