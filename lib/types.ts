export type RawCell = string | number | boolean | Date | null;
export type RawRow = RawCell[];            // one positional sheet row, blanks as null

export type QuantityUnit = "PALLET" | "PALLETS" | "CARTON" | "CARTONS" | "BOX" | "BOXES";

export type ParsedQuantity = {
  quantity: number;                        // first digit run, 1 when none
  unit: QuantityUnit;
};

export type MinimumChargePolicy = "floor" | "none";   // floor: < 0.05 CBM billed a fixed $10
export type BlankQuantityPolicy = "zero" | "one";     // what an empty quantity cell counts as

export type LabelledColumns = {
  tracking: number;                        // -1 when the header is absent
  contact: number;
  customer_name: number;
  location: number;
  quantity: number;
  volume: number;
  description: number;
  customer_id: number;
};

export type Layout =
  | { kind: "legacy" }
  | { kind: "labelled"; headerIndex: number; columns: LabelledColumns };

export type LayoutKind = Layout["kind"];

export type NormalizedRow = {
  raw_customer_id: string | null;
  shipping_mark_or_tracking: string;
  phone: string | null;                    // digits only
  customer_name: string | null;
  quantity_text: string;                   // "" when blank
  volume_cbm: number;                      // >= 0, malformed → 0
  item_text: string;
  location: string;
};

export type GroupKey = string;

export type CustomerGroup = {
  key: GroupKey;
  rows: readonly NormalizedRow[];
};

export type BreakdownItem = {
  readonly tracking_number: string;
  readonly quantity: number;
  readonly volume_cbm: number;             // 2 decimals
};

export type Bill = {
  readonly shipping_mark: string;          // "A, B" or NO_SHIPPING_MARK / NO_TRACKING
  readonly customer_id: string | null;
  readonly customer_name: string;
  readonly phone: string;
  readonly location: string;
  readonly total_cbm: number;              // 3 decimals
  readonly rate_usd_per_cbm: number;
  readonly other_cost_usd: number;
  readonly item_description: string;
  readonly breakdown_items: readonly BreakdownItem[];
  readonly minimum_charge: MinimumChargePolicy;
};

export type BillPricing = {
  subtotal_usd: number;
  min_charge_usd: number;
  total_usd: number;
};

export type BillingParams = {
  rate_usd_per_cbm: number;
  other_cost_usd: number;
  default_location: string;
  minimum_charge: MinimumChargePolicy;
  blank_quantity: BlankQuantityPolicy;
};

export type BillingResult = {
  layout: Layout;
  rows: NormalizedRow[];
  bills: Bill[];
};
