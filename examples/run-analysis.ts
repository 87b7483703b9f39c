import { readFileSync } from "node:fs";
import { parseRawRecords, checkAnalysisInvariants } from "../packages/schema/src/index.js";
import { runInventoryAnalysis, analysisToJson } from "../packages/analysis/src/index.js";

// Optional path to a JSON array of rows; the sample dataset is used otherwise.
const file = process.argv[2];
const records = file ? parseRawRecords(JSON.parse(readFileSync(file, "utf-8"))) : undefined;

const analysis = runInventoryAnalysis({ records, tolerance: 30 });
const violations = checkAnalysisInvariants(analysis);

if (violations.length) {
  console.error("Invariant violations:");
  for (const v of violations) console.error(`- ${v.code} ${v.path}: ${v.message}`);
  process.exitCode = 1;
} else {
  console.log(JSON.stringify(analysisToJson(analysis), null, 2));
}
