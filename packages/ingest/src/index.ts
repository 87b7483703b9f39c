export {
  FIELD_SYNONYMS,
  REQUIRED_FIELDS,
  normalizeHeader,
  collectHeaders,
  resolveColumns,
} from "./field-resolver.js";

export type {
  CanonicalField,
  RequiredField,
  ColumnMapping,
  ResolvedColumns,
  ColumnResolution,
} from "./field-resolver.js";

export { safeFloat, safeInt } from "./coerce.js";

export { standardizeInventoryRecords } from "./standardize.js";

export type { StandardizeOptions, StandardizeResult, StandardizeStats } from "./standardize.js";

export { readSheetRecords, readSheetFile } from "./sheet.js";
export type { SheetReadOptions } from "./sheet.js";

export { loadSampleInventory } from "./sample.js";
