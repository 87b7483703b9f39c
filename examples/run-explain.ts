import { loadSampleInventory } from "../packages/ingest/src/sample.js";
import { processInventory } from "../packages/compute/src/variance.js";
import { explainStatuses, statusCriteria } from "../packages/explain/src/index.js";

const tolerance = 30;
const { processed } = processInventory(loadSampleInventory(), tolerance);

console.log(statusCriteria(tolerance).join("\n"));
console.log(JSON.stringify(explainStatuses(processed.slice(0, 3), tolerance), null, 2));
