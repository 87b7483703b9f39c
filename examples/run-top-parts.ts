import { loadSampleInventory } from "../packages/ingest/src/index.js";
import {
  processInventory,
  summarizeByVendor,
  rankVendorsBy,
  topPartsByStatus,
  topPartsByVendor,
} from "../packages/compute/src/index.js";

const { processed } = processInventory(loadSampleInventory(), 30);

console.log("Top short parts:");
for (const p of topPartsByStatus(processed, "SHORT", 5)) {
  console.log(`- ${p.material} (${p.vendor}): ${p.variance_value}`);
}

console.log("Top excess parts per vendor:");
for (const g of topPartsByVendor(processed, "EXCESS")) {
  console.log(`- ${g.vendor}: ${g.parts.map((p) => p.material).join(", ")}`);
}

console.log("Vendors by short value:");
for (const r of rankVendorsBy(summarizeByVendor(processed), "short_value", 3)) {
  console.log(`- ${r.vendor}: ${r.summary.short_value}`);
}
