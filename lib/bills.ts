// lib/bills.ts
import { BillingParams, BillingResult, RawRow } from "./types";
import { DEFAULT_LOCATION, rowsToNormalized } from "./rows-to-normalized";
import { groupRows } from "./identity";
import { aggregateGroups } from "./aggregate";

export const DEFAULT_PARAMS: BillingParams = {
  rate_usd_per_cbm: 240,
  other_cost_usd: 0,
  default_location: DEFAULT_LOCATION,
  minimum_charge: "floor",
  blank_quantity: "zero",
};

/**
 * Raw sheet rows → one priced bill per customer.
 * 1) normalize rows (layout detected from the sheet)
 * 2) group by phone → name → customer id
 * 3) aggregate each group and sort the bills
 * Pure and synchronous: the same rows and params always give the same bills.
 */
export function buildBills(rows: RawRow[], params?: Partial<BillingParams>): BillingResult {
  const p: BillingParams = { ...DEFAULT_PARAMS, ...params };
  const default_location = p.default_location.trim() || DEFAULT_LOCATION;

  const { layout, rows: normalized } = rowsToNormalized(rows, { defaultLocation: default_location });
  const groups = groupRows(normalized);
  const bills = aggregateGroups(groups, layout.kind, { ...p, default_location });

  return { layout, rows: normalized, bills };
}
