import { readFileSync } from "node:fs";

import type { CanonicalItem } from "../../schema/src/types.js";
import { parseRawRecords } from "../../schema/src/validate.js";
import { standardizeInventoryRecords } from "./standardize.js";

const SAMPLE_URL = new URL("../data/sample-inventory.json", import.meta.url);

/**
 * Built-in demonstration dataset, used when no upload is supplied or an upload
 * yields nothing usable. Stored as raw rows so it goes through the same
 * resolver/coercion path as uploaded files.
 */
export function loadSampleInventory(): CanonicalItem[] {
  const raw: unknown = JSON.parse(readFileSync(SAMPLE_URL, "utf-8"));
  const result = standardizeInventoryRecords(parseRawRecords(raw));
  if (!result.ok) {
    throw new Error(`Sample inventory is missing columns: ${result.missing.join(", ")}`);
  }
  return result.items;
}
