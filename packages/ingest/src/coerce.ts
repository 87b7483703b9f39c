// Plain decimal literal after separators are stripped. Rejects hex, "Infinity"
// and partial parses such as "12abc".
const DECIMAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Best-effort numeric parse of a spreadsheet cell.
 * Returns 0 whenever the value cannot be read as a number; callers treat 0 as
 * "could not determine", not as proof the cell held a zero.
 */
export function safeFloat(value: unknown): number {
  if (value == null) return 0;

  if (typeof value === "number") return Number.isFinite(value) ? value : 0;
  if (typeof value !== "string") return 0;

  // thousands separators and spaces only; other whitespace inside the value fails the parse
  let text = value.trim().replace(/[, \u00a0]/g, "");
  if (text.endsWith("%")) text = text.slice(0, -1);
  if (!DECIMAL.test(text)) return 0;

  const n = Number(text);
  return Number.isFinite(n) ? n : 0;
}

/** Same normalization as safeFloat, truncated toward zero. */
export function safeInt(value: unknown): number {
  const n = Math.trunc(safeFloat(value));
  // avoid handing -0 to callers
  return n === 0 ? 0 : n;
}
