import {
  Bill,
  BillingParams,
  BlankQuantityPolicy,
  BreakdownItem,
  CustomerGroup,
  LayoutKind,
  NormalizedRow,
} from "./types";
import { mentionsPallet, parseQuantity, pluralUnit } from "./quantity";
import { round2, round3 } from "./normalize";

export const PERSONAL_USE = "PERSONAL USE";

type Sentinels = { mark: string; phone: string; name: string };

const SENTINELS: Record<LayoutKind, Sentinels> = {
  legacy: { mark: "NO_SHIPPING_MARK", phone: "NO_PHONE", name: "UNKNOWN" },
  labelled: { mark: "NO_TRACKING", phone: "UNKNOWN", name: "UNKNOWN" },
};

export function sentinelsFor(kind: LayoutKind): Sentinels {
  return SENTINELS[kind];
}

export type AggregateOptions = Pick<
  BillingParams,
  "rate_usd_per_cbm" | "other_cost_usd" | "default_location" | "minimum_charge" | "blank_quantity"
>;

function rowQuantity(row: NormalizedRow, blank: BlankQuantityPolicy): number {
  if (!row.quantity_text) return blank === "one" ? 1 : 0;
  return parseQuantity(row.quantity_text).quantity;
}

function firstMeaningful(values: Array<string | null>, fallback: string): string {
  for (const v of values) {
    const s = (v ?? "").trim();
    if (s && s !== fallback) return s;
  }
  return fallback;
}

/** Legacy marks are listed sorted, labelled tracking numbers in sheet order. */
export function distinctMarks(rows: readonly NormalizedRow[], kind: LayoutKind): string[] {
  const seen: string[] = [];
  for (const r of rows) {
    const m = r.shipping_mark_or_tracking.trim();
    if (m && !seen.includes(m)) seen.push(m);
  }
  return kind === "legacy" ? seen.sort() : seen;
}

export function buildBreakdown(
  rows: readonly NormalizedRow[],
  marks: string[],
  blank: BlankQuantityPolicy
): BreakdownItem[] {
  return marks.map((mark) => {
    const mine = rows.filter((r) => r.shipping_mark_or_tracking.trim() === mark);
    return Object.freeze({
      tracking_number: mark,
      quantity: mine.reduce((s, r) => s + rowQuantity(r, blank), 0),
      volume_cbm: round2(mine.reduce((s, r) => s + r.volume_cbm, 0)),
    });
  });
}

/**
 * "<qty> PALLET(S)|CARTON(S) OF <object>" when the sheet has quantity text;
 * otherwise the item column itself, upper-cased.
 */
export function describeItems(
  rows: readonly NormalizedRow[],
  breakdown: readonly BreakdownItem[],
  kind: LayoutKind
): string {
  const withQty = rows.filter((r) => r.quantity_text);
  if (!withQty.length) {
    const items = rows.map((r) => r.item_text).filter(Boolean);
    return items.length ? items.join(", ").toUpperCase() : PERSONAL_USE;
  }

  const total = breakdown.reduce((s, b) => s + b.quantity, 0);
  const unit = pluralUnit(withQty.some((r) => mentionsPallet(r.quantity_text)) ? "PALLET" : "CARTON", total);

  let object = PERSONAL_USE;
  if (kind === "labelled") {
    const texts = Array.from(new Set(rows.map((r) => r.item_text).filter(Boolean)));
    if (texts.length === 1) object = texts[0];
  }
  return `${total} ${unit} OF ${object}`;
}

export function aggregateGroup(group: CustomerGroup, kind: LayoutKind, opts: AggregateOptions): Bill {
  const { rows } = group;
  const sentinel = SENTINELS[kind];

  const marks = distinctMarks(rows, kind);
  const breakdown_items = Object.freeze(buildBreakdown(rows, marks, opts.blank_quantity));

  const bill: Bill = {
    shipping_mark: marks.length ? marks.join(", ") : sentinel.mark,
    customer_id: rows.map((r) => r.raw_customer_id).find((v): v is string => !!v) ?? null,
    customer_name: firstMeaningful(rows.map((r) => r.customer_name), sentinel.name),
    phone: firstMeaningful(rows.map((r) => r.phone), sentinel.phone),
    location: firstMeaningful(rows.map((r) => r.location), opts.default_location),
    total_cbm: round3(rows.reduce((s, r) => s + r.volume_cbm, 0)),
    rate_usd_per_cbm: opts.rate_usd_per_cbm,
    other_cost_usd: opts.other_cost_usd,
    item_description: describeItems(rows, breakdown_items, kind),
    breakdown_items,
    minimum_charge: opts.minimum_charge,
  };
  return Object.freeze(bill);
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Stable, case-sensitive ordering for the final bill list. */
export function sortBills(bills: Bill[], kind: LayoutKind): Bill[] {
  const primary = (b: Bill) => (kind === "legacy" ? b.shipping_mark : b.customer_name);
  return [...bills].sort((a, b) => compareText(primary(a), primary(b)) || compareText(a.phone, b.phone));
}

export function aggregateGroups(groups: CustomerGroup[], kind: LayoutKind, opts: AggregateOptions): Bill[] {
  return sortBills(groups.map((g) => aggregateGroup(g, kind, opts)), kind);
}
