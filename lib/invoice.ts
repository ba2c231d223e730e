import { Bill, BreakdownItem } from "./types";
import { moneyUsd, safeFilename } from "./normalize";
import { MIN_CHARGE_THRESHOLD_CBM, MIN_CHARGE_USD, priceBill } from "./pricing";

export type InvoiceMeta = {
  invoice_no: string;        // caller-supplied, uniqueness is the caller's concern
  invoice_date: string;      // already formatted, e.g. "19TH OCT, 2026"
};

/** Flat record handed to the invoice renderer. */
export type InvoiceRecord = InvoiceMeta & {
  customer_name: string;
  location: string;
  phone: string;
  item_description: string;
  rate_usd_str: string;
  cbm_str: string;
  payment_details: string;   // "240*0.42"
  subtotal_usd_str: string;
  min_charge_usd_str: string;
  min_charge_applied: boolean;
  other_cost_usd_str: string;
  total_usd_str: string;
  shipping_mark: string;     // one mark per line
  breakdown_items: readonly BreakdownItem[];
  note: string | null;       // minimum-charge note, only under the floor policy
};

const MONTHS = ["JAN", "FEB", "MAR", "APR", "MAY", "JUN", "JUL", "AUG", "SEP", "OCT", "NOV", "DEC"];

function ordinal(n: number): string {
  const tens = n % 100;
  if (tens >= 11 && tens <= 13) return `${n}TH`;
  switch (n % 10) {
    case 1: return `${n}ST`;
    case 2: return `${n}ND`;
    case 3: return `${n}RD`;
    default: return `${n}TH`;
  }
}

const pad = (n: number, w = 2) => String(n).padStart(w, "0");

/** "19TH OCT, 2026" */
export function formatInvoiceDate(d: Date): string {
  return `${ordinal(d.getDate())} ${MONTHS[d.getMonth()]}, ${d.getFullYear()}`;
}

export function dateStamp(d: Date): string {
  return `${d.getFullYear()}${pad(d.getMonth() + 1)}${pad(d.getDate())}`;
}

export function runStamp(d: Date): string {
  return `${dateStamp(d)}_${pad(d.getHours())}${pad(d.getMinutes())}${pad(d.getSeconds())}`;
}

/** IC + run date + 4-digit sequence: unique within a run, stable across reruns. */
export function makeInvoiceNumber(runDate: Date, seq: number): string {
  return `IC${dateStamp(runDate)}${pad(seq, 4)}`;
}

export const MIN_CHARGE_NOTE = `Note: CBM below ${MIN_CHARGE_THRESHOLD_CBM} is charged fixed ${moneyUsd(MIN_CHARGE_USD)}.`;

export function paymentDetails(bill: Pick<Bill, "rate_usd_per_cbm" | "total_cbm">): string {
  return `${Math.trunc(bill.rate_usd_per_cbm)}*${bill.total_cbm.toFixed(2)}`;
}

export function toInvoiceRecord(bill: Bill, meta: InvoiceMeta): InvoiceRecord {
  const price = priceBill(bill);
  return {
    invoice_no: meta.invoice_no,
    invoice_date: meta.invoice_date,
    customer_name: bill.customer_name,
    location: bill.location,
    phone: bill.phone,
    item_description: bill.item_description,
    rate_usd_str: moneyUsd(bill.rate_usd_per_cbm),
    cbm_str: bill.total_cbm.toFixed(2),
    payment_details: paymentDetails(bill),
    subtotal_usd_str: moneyUsd(price.subtotal_usd),
    min_charge_usd_str: moneyUsd(price.min_charge_usd),
    min_charge_applied: price.min_charge_usd > 0,
    other_cost_usd_str: moneyUsd(bill.other_cost_usd),
    total_usd_str: moneyUsd(price.total_usd),
    shipping_mark: bill.shipping_mark.split(", ").join("\n"),
    breakdown_items: bill.breakdown_items,
    note: bill.minimum_charge === "floor" ? MIN_CHARGE_NOTE : null,
  };
}

export function invoiceFilename(bill: Pick<Bill, "customer_name" | "phone">): string {
  const name = safeFilename(bill.customer_name) || "UNKNOWN";
  const phone = safeFilename(bill.phone) || "NO_PHONE";
  return `CUSTOMER - ${name} - ${phone}.pdf`;
}
