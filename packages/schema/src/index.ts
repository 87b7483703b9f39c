export * from "./types.js";

export {
  ToleranceSchema,
  RawRecordSchema,
  RawRecordListSchema,
  parseTolerance,
  parseRawRecords,
} from "./validate.js";

export { checkAnalysisInvariants } from "./invariants.js";

export type {
  AnalysisSnapshot,
  InvariantViolation,
  InvariantViolationCode,
} from "./invariants.js";
