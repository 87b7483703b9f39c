import type { InventoryStatus, ProcessedItem } from "../../schema/src/types.js";
import { STATUS_LABELS } from "../../schema/src/types.js";

export type ExplanationLine = {
  kind: "INPUT" | "COMPUTE" | "RESULT" | "NOTE";
  text: string;
};

export type StatusExplanation = {
  material: string;
  status: InventoryStatus;
  lines: ExplanationLine[];
};

export function statusCriteria(tolerance: number): string[] {
  const t = fmt(tolerance);
  return [
    `${STATUS_LABELS.WITHIN_NORMS}: QTY = NORM QTY ± ${t}%`,
    `${STATUS_LABELS.EXCESS}: QTY > NORM QTY + ${t}%`,
    `${STATUS_LABELS.SHORT}: QTY < NORM QTY - ${t}%`,
  ];
}

export function explainItemStatus(item: ProcessedItem, tolerance: number): StatusExplanation {
  const lines: ExplanationLine[] = [];
  const t = fmt(tolerance);

  // ---- Inputs
  lines.push({ kind: "INPUT", text: `QTY = ${fmt(item.qty)} (material ${item.material}, vendor ${item.vendor})` });
  lines.push({ kind: "INPUT", text: `NORM QTY = ${fmt(item.norm_qty)}` });

  // ---- Computation
  lines.push({
    kind: "COMPUTE",
    text: `Variance value = qty - norm = ${fmt(item.qty)} - ${fmt(item.norm_qty)} = ${fmt(item.variance_value)}`,
  });

  if (item.norm_qty === 0) {
    lines.push({ kind: "COMPUTE", text: "Variance % = 0 (norm quantity is zero)" });
  } else {
    lines.push({
      kind: "COMPUTE",
      text: `Variance % = (qty - norm) / norm * 100 = ${fmt(item.variance_value)} / ${fmt(item.norm_qty)} * 100 = ${fmt(item.variance_percent)}`,
    });
  }

  // ---- Result
  const pct = fmt(item.variance_percent);
  const reason =
    item.status === "WITHIN_NORMS"
      ? `|${pct}| <= ${t}`
      : item.status === "EXCESS"
        ? `${pct} > ${t}`
        : `${pct} < -${t}`;
  lines.push({ kind: "RESULT", text: `Status = ${STATUS_LABELS[item.status]} (${reason})` });

  if (item.norm_qty === 0 && item.variance_value !== 0) {
    lines.push({
      kind: "NOTE",
      text: `Norm quantity is zero: the absolute variance of ${fmt(item.variance_value)} is not reflected in the status.`,
    });
  }

  return { material: item.material, status: item.status, lines };
}

export function explainStatuses(processed: readonly ProcessedItem[], tolerance: number): StatusExplanation[] {
  return processed.map((p) => explainItemStatus(p, tolerance));
}

// two decimals, no trailing zeros
function fmt(n: number): string {
  if (!Number.isFinite(n)) return "NaN";
  const r = Math.round(n * 100) / 100;
  return String(r === 0 ? 0 : r);
}
