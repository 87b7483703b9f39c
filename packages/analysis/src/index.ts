export {
  runInventoryAnalysis,
  analysisToJson,
} from "./run-analysis.js";

export type {
  AnalysisInput,
  AnalysisOptions,
  AnalysisNotice,
  AnalysisNoticeCode,
  InventoryAnalysis,
  InventoryAnalysisJson,
} from "./run-analysis.js";

export {
  TOLERANCE_OPTIONS,
  DEFAULT_ANALYSIS_CONFIG,
  ConfigError,
  getAnalysisConfig,
} from "./config.js";

export type { AnalysisConfig } from "./config.js";

export { LOG_LEVELS, createLogger } from "./logger.js";
export type { LogLevel, LogSink, Logger } from "./logger.js";

export { run as runCli } from "./cli/inventory-check.js";
export type { CliIo } from "./cli/inventory-check.js";
