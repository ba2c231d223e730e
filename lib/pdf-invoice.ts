// lib/pdf-invoice.ts
import jsPDF from "jspdf";
import autoTable, { RowInput } from "jspdf-autotable";
import { InvoiceRecord } from "./invoice";

export const INVOICE_TITLE = "GOODS BILL";
const MARGIN = 14;

/** Rows of the main item table: description, shipping marks, CBM, rate, payment details, amount. */
export function itemTableBody(rec: InvoiceRecord): RowInput[] {
  return [[rec.item_description, rec.shipping_mark, rec.cbm_str, rec.rate_usd_str, rec.payment_details, rec.subtotal_usd_str]];
}

export function breakdownTableBody(rec: InvoiceRecord): RowInput[] {
  return rec.breakdown_items.map((b) => [b.tracking_number, String(b.quantity), b.volume_cbm.toFixed(2)]);
}

export function totalsLines(rec: InvoiceRecord): Array<[string, string]> {
  const lines: Array<[string, string]> = [["Subtotal", rec.subtotal_usd_str]];
  if (rec.min_charge_applied) lines.push(["Minimum charge applied", rec.min_charge_usd_str]);
  lines.push(["Other cost", rec.other_cost_usd_str], ["Total", rec.total_usd_str]);
  return lines;
}

/**
 * One-page invoice for a bill: header, bill-to block, item table,
 * per-tracking breakdown, totals and the minimum-charge note when it applies.
 */
export function renderInvoicePdf(rec: InvoiceRecord): Uint8Array {
  const doc = new jsPDF({ unit: "mm", format: "a4" });
  let y = 18;

  doc.setFontSize(16);
  doc.text(INVOICE_TITLE, MARGIN, y);
  doc.setFontSize(10);
  doc.text(`Invoice No: ${rec.invoice_no}`, 196, y - 4, { align: "right" });
  doc.text(`Date: ${rec.invoice_date}`, 196, y + 1, { align: "right" });

  y += 12;
  doc.text("BILL TO", MARGIN, y);
  doc.text(rec.customer_name, MARGIN, y + 5);
  doc.text(rec.location, MARGIN, y + 10);
  doc.text(`Tel: ${rec.phone}`, MARGIN, y + 15);
  y += 22;

  const trackEnd = (cursorY: number | undefined) => {
    if (cursorY !== undefined) y = cursorY;
  };

  autoTable(doc, {
    startY: y,
    head: [["Description", "Shipping Mark", "CBM", "Rate", "Payment Details", "Amount"]],
    body: itemTableBody(rec),
    didDrawPage: (data) => trackEnd(data.cursor?.y),
  });

  if (rec.breakdown_items.length) {
    autoTable(doc, {
      startY: y + 6,
      head: [["Tracking No.", "Qty", "CBM"]],
      body: breakdownTableBody(rec),
      didDrawPage: (data) => trackEnd(data.cursor?.y),
    });
  }

  y += 10;
  for (const [label, value] of totalsLines(rec)) {
    doc.text(label, 130, y);
    doc.text(value, 196, y, { align: "right" });
    y += 6;
  }

  if (rec.note) {
    doc.setFontSize(8);
    doc.text(rec.note, MARGIN, y + 6);
  }

  return new Uint8Array(doc.output("arraybuffer"));
}
