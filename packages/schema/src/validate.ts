import { z } from "zod";

import type { RawRecord } from "./types.js";

/* ------------------------------------------------------------------ */
/*                              Primitives                            */
/* ------------------------------------------------------------------ */

const FiniteNumber = z
  .number()
  .refine(Number.isFinite, "Must be a finite number");

export const ToleranceSchema = FiniteNumber.refine((v) => v > 0, "Tolerance must be a positive percentage");

const CellValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

/* ------------------------------------------------------------------ */
/*                               Records                              */
/* ------------------------------------------------------------------ */

export const RawRecordSchema = z.record(z.string(), CellValueSchema);

export const RawRecordListSchema = z.array(RawRecordSchema);

export function parseTolerance(input: unknown): number {
  return ToleranceSchema.parse(input);
}

export function parseRawRecords(input: unknown): RawRecord[] {
  return RawRecordListSchema.parse(input);
}
