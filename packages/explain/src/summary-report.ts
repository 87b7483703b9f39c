import type {
  ProcessedItem,
  SummaryTotals,
  VendorSummaryMap,
} from "../../schema/src/types.js";
import { INVENTORY_STATUSES, STATUS_LABELS } from "../../schema/src/types.js";

export type SummaryReportInput = {
  processed: readonly ProcessedItem[];
  summary: SummaryTotals;
  vendors: VendorSummaryMap;
  tolerance: number;
  generatedAt: string; // ISO-8601, supplied by the caller for deterministic output
};

/**
 * Plain-text summary for download/export. Values are emitted as raw numbers;
 * currency and locale formatting belong to whoever renders the file.
 */
export function buildSummaryReport(input: SummaryReportInput): string {
  const { processed, summary, vendors, tolerance, generatedAt } = input;
  const totalValue = INVENTORY_STATUSES.reduce((s, k) => s + summary[k].value, 0);

  const lines: string[] = [
    "INVENTORY ANALYSIS SUMMARY REPORT",
    `Generated on: ${generatedAt}`,
    `Tolerance Zone: ±${tolerance}%`,
    "",
    "OVERALL SUMMARY:",
    `- Total Items: ${processed.length}`,
    `- Total Stock Value: ${totalValue}`,
    "",
    "STATUS BREAKDOWN:",
  ];

  for (const status of INVENTORY_STATUSES) {
    lines.push(`- ${STATUS_LABELS[status]}: ${summary[status].count} items (value ${summary[status].value})`);
  }

  lines.push("", "VENDOR SUMMARY:");

  for (const [vendor, s] of vendors.entries()) {
    lines.push(
      "",
      `${vendor}:`,
      `  - Total Parts: ${s.total_parts}`,
      `  - Total Value: ${s.total_value}`,
      `  - Short: ${s.short_parts} items`,
      `  - Excess: ${s.excess_parts} items`,
      `  - Normal: ${s.normal_parts} items`
    );
  }

  return lines.join("\n") + "\n";
}
