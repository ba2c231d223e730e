import { ParsedQuantity, QuantityUnit } from "./types";

type UnitBase = "PALLET" | "CARTON" | "BOX";

const PLURALS: Record<UnitBase, QuantityUnit> = {
  PALLET: "PALLETS",
  CARTON: "CARTONS",
  BOX: "BOXES",
};

export function pluralUnit(base: UnitBase, quantity: number): QuantityUnit {
  return quantity === 1 ? base : PLURALS[base];
}

/**
 * "1pallet" → 1 PALLET, "4" → 4 CARTONS, "2 boxes" → 2 BOXES.
 * Keyword precedence is pallet, carton, box; plain numbers are cartons.
 */
export function parseQuantity(text: string): ParsedQuantity {
  const t = (text ?? "").toString().trim().toLowerCase();
  const m = t.match(/\d+/);
  const quantity = m ? parseInt(m[0], 10) : 1;

  let base: UnitBase = "CARTON";
  if (t.includes("pallet")) base = "PALLET";
  else if (t.includes("carton")) base = "CARTON";
  else if (t.includes("box")) base = "BOX";

  return { quantity, unit: pluralUnit(base, quantity) };
}

export function mentionsPallet(text: string): boolean {
  return /pallet/i.test(text ?? "");
}

export function formatQuantity(q: ParsedQuantity): string {
  return `${q.quantity} ${q.unit}`;
}
