// lib/config.ts
import { BillingParams, BlankQuantityPolicy, MinimumChargePolicy } from "./types";
import { DEFAULT_PARAMS } from "./bills";
import { MINIMUM_CHARGE_POLICIES } from "./pricing";
import { parseDecimal } from "./normalize";

export const BLANK_QUANTITY_POLICIES: readonly BlankQuantityPolicy[] = ["zero", "one"];

/** Caller-side values, as typed on the command line or read from the environment. */
export type RawRunParams = Partial<{
  rate: string;
  otherCost: string;
  location: string;
  minCharge: string;
  blankQuantity: string;
}>;

export type BillsConfig = {
  params: BillingParams;
  outDir?: string;
};

// "1,000.50"; a lone comma such as "2,5" is not a thousands separator
const THOUSANDS_GROUPED = /^[+-]?\d{1,3}(,\d{3})+(\.\d+)?$/;

function parseNumber(label: string, raw: string | undefined, fallback: number): number {
  const s = (raw ?? "").trim();
  if (!s) return fallback;
  const n = parseDecimal(THOUSANDS_GROUPED.test(s) ? s.replace(/,/g, "") : s);
  if (n === null) throw new Error(`${label} must be a number (got "${s}")`);
  return n;
}

function parseChoice<T extends string>(label: string, raw: string | undefined, choices: readonly T[], fallback: T): T {
  const s = (raw ?? "").trim().toLowerCase();
  if (!s) return fallback;
  const hit = choices.find((c) => c === s);
  if (!hit) throw new Error(`${label} must be one of ${choices.join(", ")} (got "${s}")`);
  return hit;
}

/**
 * Validate caller parameters before anything is read or written.
 * - rate must be a number > 0
 * - other cost must be a number >= 0
 * - policy names must be known
 */
export function parseRunParams(raw: RawRunParams, base: BillingParams = DEFAULT_PARAMS): BillingParams {
  const rate_usd_per_cbm = parseNumber("Rate (USD per CBM)", raw.rate, base.rate_usd_per_cbm);
  if (rate_usd_per_cbm <= 0) throw new Error(`Rate (USD per CBM) must be greater than 0 (got ${rate_usd_per_cbm})`);

  const other_cost_usd = parseNumber("Other cost (USD)", raw.otherCost, base.other_cost_usd);
  if (other_cost_usd < 0) throw new Error(`Other cost (USD) cannot be negative (got ${other_cost_usd})`);

  const minimum_charge: MinimumChargePolicy = parseChoice("Minimum charge policy", raw.minCharge, MINIMUM_CHARGE_POLICIES, base.minimum_charge);
  const blank_quantity: BlankQuantityPolicy = parseChoice("Blank quantity policy", raw.blankQuantity, BLANK_QUANTITY_POLICIES, base.blank_quantity);

  return {
    rate_usd_per_cbm,
    other_cost_usd,
    default_location: (raw.location ?? "").trim() || base.default_location,
    minimum_charge,
    blank_quantity,
  };
}

/** Defaults from BILLS_* environment variables; command-line flags are applied on top. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): BillsConfig {
  const params = parseRunParams({
    rate: env.BILLS_RATE_USD_PER_CBM,
    otherCost: env.BILLS_OTHER_COST_USD,
    location: env.BILLS_DEFAULT_LOCATION,
    minCharge: env.BILLS_MIN_CHARGE,
    blankQuantity: env.BILLS_BLANK_QUANTITY,
  });
  const outDir = (env.BILLS_OUT_DIR ?? "").trim() || undefined;
  return { params, outDir };
}
