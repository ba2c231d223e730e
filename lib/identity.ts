import { CustomerGroup, GroupKey, NormalizedRow } from "./types";

export const UNKNOWN_KEY = "UNKNOWN";

/** Phone is the best identifier; then customer name, then the sheet's customer id. */
export function groupKeyOf(row: NormalizedRow): GroupKey {
  const phone = (row.phone ?? "").trim();
  if (phone) return phone;
  const name = (row.customer_name ?? "").trim();
  if (name) return name;
  const id = (row.raw_customer_id ?? "").trim();
  return id || UNKNOWN_KEY;
}

/**
 * One group per customer, however many parcels they sent.
 * Groups come out in first-seen order, rows in input order.
 */
export function groupRows(rows: readonly NormalizedRow[]): CustomerGroup[] {
  const groups = new Map<GroupKey, NormalizedRow[]>();
  for (const r of rows) {
    const key = groupKeyOf(r);
    const members = groups.get(key);
    if (members) members.push(r);
    else groups.set(key, [r]);
  }
  return Array.from(groups.entries()).map(([key, members]) => ({ key, rows: members }));
}
