import { Bill, BillPricing, MinimumChargePolicy } from "./types";

export const MIN_CHARGE_THRESHOLD_CBM = 0.05;
export const MIN_CHARGE_USD = 10;

export const MINIMUM_CHARGE_POLICIES: readonly MinimumChargePolicy[] = ["floor", "none"];

export function minimumChargeApplies(totalCbm: number, policy: MinimumChargePolicy): boolean {
  return policy === "floor" && totalCbm < MIN_CHARGE_THRESHOLD_CBM;
}

/**
 * Subtotal, minimum charge and total for a bill. Never stored on the bill:
 * callers recompute whenever they need the figures.
 */
export function priceBill(
  bill: Pick<Bill, "total_cbm" | "rate_usd_per_cbm" | "other_cost_usd" | "minimum_charge">
): BillPricing {
  const floored = minimumChargeApplies(bill.total_cbm, bill.minimum_charge);
  const subtotal_usd = floored ? MIN_CHARGE_USD : bill.rate_usd_per_cbm * bill.total_cbm;
  return {
    subtotal_usd,
    min_charge_usd: floored ? MIN_CHARGE_USD : 0,
    total_usd: subtotal_usd + bill.other_cost_usd,
  };
}
