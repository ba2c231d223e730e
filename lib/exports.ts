import * as XLSX from "xlsx";
import { Bill } from "./types";
import { moneyUsd } from "./normalize";
import { priceBill } from "./pricing";
import { MIN_CHARGE_NOTE } from "./invoice";

export const SUMMARY_SHEET = "Summary";

export const SUMMARY_COLUMNS = [
  "ShippingMark",
  "CustomerName",
  "Phone",
  "TotalCBM",
  "Rate_USD_per_CBM",
  "Subtotal_USD",
  "OtherCost_USD",
  "Total_USD",
] as const;

export const MESSAGE_COLUMNS = ["Phone", "ShippingMark", "CustomerName", "Message"] as const;

type SummaryRow = Record<(typeof SUMMARY_COLUMNS)[number], string | number>;
type MessageRow = Record<(typeof MESSAGE_COLUMNS)[number], string>;

export function summaryRows(bills: readonly Bill[]): SummaryRow[] {
  return bills.map((b) => {
    const price = priceBill(b);
    return {
      ShippingMark: b.shipping_mark,
      CustomerName: b.customer_name,
      Phone: b.phone,
      TotalCBM: b.total_cbm,
      Rate_USD_per_CBM: b.rate_usd_per_cbm,
      Subtotal_USD: price.subtotal_usd,
      OtherCost_USD: b.other_cost_usd,
      Total_USD: price.total_usd,
    };
  });
}

export function buildSummaryWorkbook(bills: readonly Bill[]): Buffer {
  const wb = XLSX.utils.book_new();
  const ws = XLSX.utils.json_to_sheet(summaryRows(bills), { header: [...SUMMARY_COLUMNS] });
  XLSX.utils.book_append_sheet(wb, ws, SUMMARY_SHEET);
  const out: Buffer = XLSX.write(wb, { bookType: "xlsx", type: "buffer" });
  return out;
}

/** Fixed-template text sent to the customer; figures match the PDF. */
export function makeBillMessage(bill: Bill): string {
  const price = priceBill(bill);
  const cbm = bill.total_cbm.toFixed(2);
  const paymentLine =
    price.min_charge_usd > 0
      ? `Min charge (CBM<0.05) = ${moneyUsd(price.min_charge_usd)}`
      : `${Math.trunc(bill.rate_usd_per_cbm)} * ${cbm} = ${moneyUsd(price.subtotal_usd)}`;

  const lines = [
    "CARGO – GOODS BILL",
    `Name: ${bill.customer_name}`,
    `Phone: ${bill.phone}`,
    `Shipping Mark: ${bill.shipping_mark}`,
    `Total CBM: ${cbm}`,
    `Rate: ${moneyUsd(bill.rate_usd_per_cbm)}/CBM → ${paymentLine}`,
    `Other Cost: ${moneyUsd(bill.other_cost_usd)}`,
    `Total: ${moneyUsd(price.total_usd)}`,
  ];
  if (bill.minimum_charge === "floor") lines.push(MIN_CHARGE_NOTE);
  return lines.join("\n");
}

export function messageRows(bills: readonly Bill[]): MessageRow[] {
  return bills.map((b) => ({
    Phone: b.phone,
    ShippingMark: b.shipping_mark,
    CustomerName: b.customer_name,
    Message: makeBillMessage(b),
  }));
}

export function buildMessagesCsv(bills: readonly Bill[]): string {
  const ws = XLSX.utils.json_to_sheet(messageRows(bills), { header: [...MESSAGE_COLUMNS] });
  return XLSX.utils.sheet_to_csv(ws);
}
