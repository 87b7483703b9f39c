export * from "./explain-status.js";
export * from "./summary-report.js";
