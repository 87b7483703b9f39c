#!/usr/bin/env node
// packages/analysis/src/cli/inventory-check.ts

import * as fs from "node:fs";
import * as path from "node:path";

import type { InventoryStatus, ProcessedItem, RawRecord } from "../../../schema/src/types.js";
import { STATUS_LABELS, INVENTORY_STATUSES } from "../../../schema/src/types.js";
import { parseRawRecords, ToleranceSchema } from "../../../schema/src/validate.js";
import { readSheetFile } from "../../../ingest/src/sheet.js";
import { topPartsByStatus, topPartsByVendor } from "../../../compute/src/ranking.js";
import { totalStockValue } from "../../../compute/src/stats.js";
import { buildSummaryReport } from "../../../explain/src/summary-report.js";
import { statusCriteria } from "../../../explain/src/explain-status.js";
import { getAnalysisConfig, type AnalysisConfig } from "../config.js";
import { createLogger, errorMessage } from "../logger.js";
import { analysisToJson, runInventoryAnalysis, type InventoryAnalysis } from "../run-analysis.js";

export type CliIo = {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  env: NodeJS.ProcessEnv;
  now: () => string;
};

const defaultIo: CliIo = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
  env: process.env,
  now: () => new Date().toISOString(),
};

class UsageError extends Error {}

function usage(): string {
  return `
Usage:
  inventory-check analyze [file] [--tolerance <pct>] [--sheet <name>] [--json]
  inventory-check top [file] --status <short|excess|normal> [--by-vendor] [--k <n>] [--tolerance <pct>] [--json]
  inventory-check report [file] [--tolerance <pct>] [--sheet <name>]
  inventory-check criteria [--tolerance <pct>]
  inventory-check version

Files may be .csv, .xlsx, .xls or a .json array of row objects.
Without a file the built-in sample dataset is analyzed.

Environment:
  INVENTORY_TOLERANCE, INVENTORY_TOP_K, INVENTORY_TOP_K_PER_VENDOR, INVENTORY_LOG_LEVEL

Examples:
  inventory-check analyze stock.xlsx --tolerance 20
  inventory-check top stock.csv --status short --by-vendor
  inventory-check report stock.csv > summary.txt
`;
}

// -------------------- argv parsing --------------------

const VALUE_FLAGS = new Set(["--tolerance", "--sheet", "--status", "--k"]);

function getFlagValue(args: string[], flag: string): string | null {
  const i = args.indexOf(flag);
  if (i < 0) return null;
  const v = args[i + 1];
  if (!v || v.startsWith("--")) throw new UsageError(`Missing value for ${flag}`);
  return v;
}

// first argument after the command that is neither a flag nor a flag's value
function getFileArg(args: string[]): string | null {
  for (let i = 1; i < args.length; i++) {
    const a = args[i];
    if (a.startsWith("--")) {
      if (VALUE_FLAGS.has(a)) i++;
      continue;
    }
    return a;
  }
  return null;
}

function parseToleranceFlag(args: string[], config: AnalysisConfig): number {
  const raw = getFlagValue(args, "--tolerance");
  if (raw === null) return config.tolerance;
  const parsed = ToleranceSchema.safeParse(Number(raw));
  if (!parsed.success) throw new UsageError(`Invalid --tolerance "${raw}": expected a positive number`);
  return parsed.data;
}

function parseKFlag(args: string[], fallback: number): number {
  const raw = getFlagValue(args, "--k");
  if (raw === null) return fallback;
  const k = Number(raw);
  if (!Number.isInteger(k) || k <= 0) throw new UsageError(`Invalid --k "${raw}": expected a positive integer`);
  return k;
}

const STATUS_ALIASES: Record<string, InventoryStatus> = {
  short: "SHORT",
  excess: "EXCESS",
  normal: "WITHIN_NORMS",
  within: "WITHIN_NORMS",
};

function parseStatusFlag(args: string[]): InventoryStatus {
  const raw = getFlagValue(args, "--status");
  const status = raw === null ? undefined : STATUS_ALIASES[raw.toLowerCase()];
  if (!status) throw new UsageError("Missing or invalid --status <short|excess|normal>");
  return status;
}

// -------------------- file helpers --------------------

function readRecords(filePath: string, sheet: string | null): RawRecord[] {
  const abs = path.resolve(process.cwd(), filePath);
  if (!fs.existsSync(abs)) throw new Error(`file not found: ${filePath}`);

  if (abs.toLowerCase().endsWith(".json")) {
    return parseRawRecords(JSON.parse(fs.readFileSync(abs, "utf8")));
  }
  return readSheetFile(abs, sheet === null ? {} : { sheet });
}

function analyzeFromArgs(args: string[], config: AnalysisConfig, io: CliIo): InventoryAnalysis {
  const tolerance = parseToleranceFlag(args, config);
  const file = getFileArg(args);
  const records = file === null ? undefined : readRecords(file, getFlagValue(args, "--sheet"));

  const toStderr = (...parts: unknown[]) => io.stderr(parts.map(String).join(" ") + "\n");
  const logger = createLogger("inventory-check", config.logLevel, {
    error: toStderr,
    warn: toStderr,
    info: toStderr,
    debug: toStderr,
  });

  const analysis = runInventoryAnalysis({ records, tolerance }, { config, logger });

  for (const n of analysis.notices) io.stderr(`[inventory-check] notice ${n.code}: ${n.message}\n`);
  return analysis;
}

// -------------------- commands --------------------

function cmdAnalyze(args: string[], config: AnalysisConfig, io: CliIo): void {
  const a = analyzeFromArgs(args, config, io);

  if (args.includes("--json")) {
    io.stdout(JSON.stringify(analysisToJson(a), null, 2) + "\n");
    return;
  }

  const lines: string[] = [
    `Source: ${a.source} (${a.processed.length} items)`,
    `Tolerance: ±${a.tolerance}%`,
    "",
  ];
  for (const status of INVENTORY_STATUSES) {
    lines.push(`${STATUS_LABELS[status]}: ${a.summary[status].count} parts (value ${a.summary[status].value})`);
  }
  lines.push(`Total Value: ${totalStockValue(a.summary)} (${a.processed.length} parts)`, "");

  lines.push(["Vendor", "Parts", "QTY", "RM", "Short", "Excess", "Normal", "Value"].join("\t"));
  for (const [vendor, s] of a.vendors.entries()) {
    lines.push(
      [
        vendor,
        s.total_parts,
        round2(s.total_qty),
        round2(s.total_rm),
        s.short_parts,
        s.excess_parts,
        s.normal_parts,
        s.total_value,
      ].join("\t")
    );
  }

  io.stdout(lines.join("\n") + "\n");
}

function cmdTop(args: string[], config: AnalysisConfig, io: CliIo): void {
  const status = parseStatusFlag(args);
  const byVendor = args.includes("--by-vendor");
  const k = parseKFlag(args, byVendor ? config.topKPerVendor : config.topK);
  const a = analyzeFromArgs(args, config, io);

  const row = (p: ProcessedItem) => [p.material, p.vendor, round2(p.variance_value), round2(p.variance_percent)].join("\t");

  if (byVendor) {
    const groups = topPartsByVendor(a.processed, status, k);
    if (args.includes("--json")) {
      io.stdout(JSON.stringify(groups, null, 2) + "\n");
      return;
    }
    const lines: string[] = [];
    for (const g of groups) {
      lines.push(`${g.vendor}:`);
      for (const p of g.parts) lines.push(`  ${row(p)}`);
    }
    io.stdout(lines.length ? lines.join("\n") + "\n" : `No ${STATUS_LABELS[status].toLowerCase()} parts found.\n`);
    return;
  }

  const parts = topPartsByStatus(a.processed, status, k);
  if (args.includes("--json")) {
    io.stdout(JSON.stringify(parts, null, 2) + "\n");
    return;
  }
  io.stdout(parts.length ? parts.map(row).join("\n") + "\n" : `No ${STATUS_LABELS[status].toLowerCase()} parts found.\n`);
}

function cmdReport(args: string[], config: AnalysisConfig, io: CliIo): void {
  const a = analyzeFromArgs(args, config, io);
  io.stdout(
    buildSummaryReport({
      processed: a.processed,
      summary: a.summary,
      vendors: a.vendors,
      tolerance: a.tolerance,
      generatedAt: io.now(),
    })
  );
}

function cmdCriteria(args: string[], config: AnalysisConfig, io: CliIo): void {
  const tolerance = parseToleranceFlag(args, config);
  io.stdout(`Status Criteria (Tolerance: ±${tolerance}%)\n`);
  for (const line of statusCriteria(tolerance)) io.stdout(`- ${line}\n`);
}

function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

// -------------------- entry --------------------

/** Returns the process exit code. */
export function run(argv: string[] = process.argv, io: CliIo = defaultIo): number {
  const args = argv.slice(2);

  if (args.length === 0 || args.includes("--help") || args.includes("-h")) {
    io.stdout(usage());
    return 0;
  }

  const cmd = args[0];

  if (cmd === "version") {
    io.stdout("inventory-check cli v1\n");
    return 0;
  }

  try {
    const config = getAnalysisConfig(io.env);

    if (cmd === "analyze") cmdAnalyze(args, config, io);
    else if (cmd === "top") cmdTop(args, config, io);
    else if (cmd === "report") cmdReport(args, config, io);
    else if (cmd === "criteria") cmdCriteria(args, config, io);
    else throw new UsageError(`Unknown command: ${cmd}`);

    return 0;
  } catch (err) {
    io.stderr(`[inventory-check] ${errorMessage(err)}\n`);
    if (err instanceof UsageError) io.stderr(usage());
    return 1;
  }
}

// ESM entrypoint: execute when this file is the invoked script
const argv1 = process.argv[1] ?? "";
const invoked = path.basename(argv1);
if (invoked === "inventory-check" || invoked === "inventory-check.ts" || invoked === "inventory-check.js") {
  process.exitCode = run(process.argv);
}
