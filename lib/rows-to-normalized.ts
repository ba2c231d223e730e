// lib/rows-to-normalized.ts
import { LabelledColumns, Layout, NormalizedRow, RawCell, RawRow } from "./types";
import {
  cellText,
  cleanPhone,
  isBlankCell,
  normalizeShippingMark,
  splitPhoneName,
  toVolume,
} from "./normalize";

export const DEFAULT_LOCATION = "ACCRA GHANA";

// Column A of a container header line carries one of these tokens
export const CONTAINER_HEADER_MARKERS = ["N005=", "N006="];

// The labelled header is allowed to sit below a few lines of container metadata
const HEADER_PROBE_ROWS = 20;

// Header cells are short labels; longer text is item data
const MAX_HEADER_LABEL = 40;

const HEADER_PATTERNS: Record<keyof LabelledColumns, RegExp> = {
  tracking: /^TRACKING\b/,
  contact: /^(CONTACT|PHONE|TEL)/,
  customer_name: /^(CUSTOMER\s*NAME|NAME)\b/,
  location: /^LOCATION\b/,
  quantity: /^(QTY|QUANTITY)\b/,
  volume: /^(CBM|VOLUME)\b/,
  description: /DESCRIPTION\b/,
  customer_id: /^(INVOICE|CUSTOMER\s*ID)\b/,
};

export type NormalizeOptions = {
  defaultLocation?: string;
};

function headerLabel(v: RawCell | undefined): string {
  const label = cellText(v).toUpperCase().replace(/\s+/g, " ");
  return label.length <= MAX_HEADER_LABEL ? label : "";
}

function matchColumns(header: RawRow): LabelledColumns {
  const labels = header.map(headerLabel);
  const find = (re: RegExp) => labels.findIndex((l) => re.test(l));
  return {
    tracking: find(HEADER_PATTERNS.tracking),
    contact: find(HEADER_PATTERNS.contact),
    customer_name: find(HEADER_PATTERNS.customer_name),
    location: find(HEADER_PATTERNS.location),
    quantity: find(HEADER_PATTERNS.quantity),
    volume: find(HEADER_PATTERNS.volume),
    description: find(HEADER_PATTERNS.description),
    customer_id: find(HEADER_PATTERNS.customer_id),
  };
}

// A header names tracking and volume together, plus who the parcel belongs to or how many
function isHeaderLike(c: LabelledColumns): boolean {
  return c.tracking >= 0 && c.volume >= 0 && (c.contact >= 0 || c.customer_name >= 0 || c.quantity >= 0);
}

/** Labelled when one of the first rows is a header row, legacy otherwise. */
export function detectLayout(rows: RawRow[]): Layout {
  const limit = Math.min(HEADER_PROBE_ROWS, rows.length);
  for (let i = 0; i < limit; i++) {
    const columns = matchColumns(rows[i] ?? []);
    if (isHeaderLike(columns)) return { kind: "labelled", headerIndex: i, columns };
  }
  return { kind: "legacy" };
}

export function isContainerHeaderLine(colA: RawCell | undefined): boolean {
  const s = cellText(colA);
  return CONTAINER_HEADER_MARKERS.some((m) => s.includes(m));
}

/**
 * Legacy sheet, columns A–F:
 * customer id, shipping mark, "phone name", quantity text, CBM, item text.
 * - container header lines and rows without a shipping mark are dropped first
 * - A and C are filled down over continuation rows
 */
export function legacyRowsToNormalized(rows: RawRow[], location: string): NormalizedRow[] {
  const kept = rows.filter((r) => !isContainerHeaderLine(r[0]) && !isBlankCell(r[1]));

  let lastCustomerId: RawCell = null;
  let lastNamePhone: RawCell = null;

  return kept.map((r) => {
    if (!isBlankCell(r[0])) lastCustomerId = r[0];
    if (!isBlankCell(r[2])) lastNamePhone = r[2];

    const { phone, name } = splitPhoneName(lastNamePhone);
    return {
      raw_customer_id: cellText(lastCustomerId) || null,
      // column B is non-blank here, so a first token always exists
      shipping_mark_or_tracking: normalizeShippingMark(r[1]) ?? cellText(r[1]),
      phone,
      customer_name: name,
      quantity_text: cellText(r[3]),
      volume_cbm: toVolume(r[4]),
      item_text: cellText(r[5]),
      location,
    };
  });
}

/**
 * Labelled sheet: rows below the detected header, one per tracking number.
 * Columns the header does not name read as blank.
 */
export function labelledRowsToNormalized(
  rows: RawRow[],
  layout: Extract<Layout, { kind: "labelled" }>,
  location: string
): NormalizedRow[] {
  const { columns } = layout;
  const at = (r: RawRow, idx: number): RawCell => (idx >= 0 ? r[idx] ?? null : null);

  const out: NormalizedRow[] = [];
  for (const r of rows.slice(layout.headerIndex + 1)) {
    const tracking = cellText(at(r, columns.tracking));
    if (!tracking) continue;
    out.push({
      raw_customer_id: cellText(at(r, columns.customer_id)) || null,
      shipping_mark_or_tracking: tracking,
      phone: cleanPhone(at(r, columns.contact)),
      customer_name: cellText(at(r, columns.customer_name)) || null,
      quantity_text: cellText(at(r, columns.quantity)),
      volume_cbm: toVolume(at(r, columns.volume)),
      item_text: cellText(at(r, columns.description)),
      location: cellText(at(r, columns.location)) || location,
    });
  }
  return out;
}

/**
 * Convert raw sheet rows (either layout) into NormalizedRow[]:
 * - layout picked by probing for the labelled header row
 * - order preserved, no grouping yet
 * - malformed cells degrade to defaults, nothing throws
 */
export function rowsToNormalized(
  rows: RawRow[],
  opts?: NormalizeOptions
): { layout: Layout; rows: NormalizedRow[] } {
  const location = (opts?.defaultLocation ?? "").trim() || DEFAULT_LOCATION;
  const layout = detectLayout(rows ?? []);
  const normalized =
    layout.kind === "labelled"
      ? labelledRowsToNormalized(rows, layout, location)
      : legacyRowsToNormalized(rows ?? [], location);
  return { layout, rows: normalized };
}
