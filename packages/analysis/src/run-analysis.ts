import type {
  CanonicalItem,
  ProcessedItem,
  RawRecord,
  SummaryTotals,
  VendorSummary,
  VendorSummaryMap,
} from "../../schema/src/types.js";
import { parseTolerance } from "../../schema/src/validate.js";
import type { RequiredField } from "../../ingest/src/field-resolver.js";
import { standardizeInventoryRecords, type StandardizeStats } from "../../ingest/src/standardize.js";
import { loadSampleInventory } from "../../ingest/src/sample.js";
import { processInventory } from "../../compute/src/variance.js";
import { summarizeByVendor } from "../../compute/src/vendors.js";
import { DEFAULT_ANALYSIS_CONFIG, type AnalysisConfig } from "./config.js";
import { createLogger, errorMessage, type Logger } from "./logger.js";

export type AnalysisNoticeCode = "SAMPLE_DATA_DEFAULT" | "MISSING_REQUIRED_COLUMN" | "NO_VALID_RECORDS";

export type AnalysisNotice = {
  code: AnalysisNoticeCode;
  message: string;
};

export type AnalysisInput = {
  records?: readonly RawRecord[];
  tolerance?: number;
};

export type AnalysisOptions = {
  config?: AnalysisConfig;
  logger?: Logger;
  loadSample?: () => CanonicalItem[];
};

export type InventoryAnalysis = {
  source: "upload" | "sample";
  tolerance: number;
  processed: ProcessedItem[];
  summary: SummaryTotals;
  vendors: VendorSummaryMap;
  ingest: StandardizeStats | null; // null when no records were supplied
  notices: AnalysisNotice[];
};

const REQUIRED_FIELD_LABELS: Record<RequiredField, string> = {
  qty: "QTY/Quantity",
  norm_qty: "RM/Norm QTY",
  material: "Material/Part Number",
};

/**
 * Full pass over one dataset: standardize -> classify -> vendor rollup.
 *
 * Data problems never throw. Missing records, missing required columns or an
 * upload with no usable rows all fall back to the sample dataset and are
 * reported in `notices`. An invalid tolerance is a caller error and throws.
 */
export function runInventoryAnalysis(input: AnalysisInput = {}, options: AnalysisOptions = {}): InventoryAnalysis {
  const config = options.config ?? DEFAULT_ANALYSIS_CONFIG;
  const log = options.logger ?? createLogger("inventory/analysis", config.logLevel);
  const loadSample = options.loadSample ?? loadSampleInventory;

  const tolerance = parseTolerance(input.tolerance ?? config.tolerance);
  const notices: AnalysisNotice[] = [];

  let items: CanonicalItem[] | null = null;
  let ingest: StandardizeStats | null = null;

  if (input.records === undefined) {
    notices.push({ code: "SAMPLE_DATA_DEFAULT", message: "No inventory records supplied; using sample data." });
  } else {
    const result = standardizeInventoryRecords(input.records, {
      onRecordError: (index, err) => log.debug(`skipped row ${index}: ${errorMessage(err)}`),
    });
    ingest = result.stats;

    if (!result.ok) {
      const labels = result.missing.map((f) => REQUIRED_FIELD_LABELS[f]);
      notices.push({
        code: "MISSING_REQUIRED_COLUMN",
        message: `Required column(s) not found: ${labels.join(", ")}; using sample data.`,
      });
      log.warn(`missing required columns: ${result.missing.join(",")}`);
    } else if (result.items.length === 0) {
      notices.push({ code: "NO_VALID_RECORDS", message: "No valid inventory rows found; using sample data." });
      log.warn(`no valid rows out of ${result.stats.total}`);
    } else {
      items = result.items;
    }
  }

  const source = items ? "upload" : "sample";
  const { processed, summary } = processInventory(items ?? loadSample(), tolerance);
  const vendors = summarizeByVendor(processed);

  log.info(
    `source=${source} items=${processed.length} tolerance=${tolerance} within=${summary.WITHIN_NORMS.count} excess=${summary.EXCESS.count} short=${summary.SHORT.count} vendors=${vendors.size}`
  );

  return { source, tolerance, processed, summary, vendors, ingest, notices };
}

export type InventoryAnalysisJson = Omit<InventoryAnalysis, "vendors"> & {
  vendors: Record<string, VendorSummary>;
};

/** Map-free shape for JSON output; vendor keys keep first-seen order. */
export function analysisToJson(a: InventoryAnalysis): InventoryAnalysisJson {
  return { ...a, vendors: Object.fromEntries(a.vendors) };
}
