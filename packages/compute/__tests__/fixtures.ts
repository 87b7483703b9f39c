import type { CanonicalItem } from "../../schema/src/types.js";

export function item(
  material: string,
  qty: number,
  norm_qty: number,
  stock_value = 0,
  vendor = "Acme"
): CanonicalItem {
  return { material, description: `${material} part`, qty, norm_qty, stock_value, vendor };
}
