import { runInventoryAnalysis } from "../packages/analysis/src/run-analysis.js";
import { buildSummaryReport } from "../packages/explain/src/summary-report.js";

const a = runInventoryAnalysis();

process.stdout.write(
  buildSummaryReport({
    processed: a.processed,
    summary: a.summary,
    vendors: a.vendors,
    tolerance: a.tolerance,
    generatedAt: new Date().toISOString(),
  })
);
