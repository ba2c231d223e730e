import * as XLSX from "xlsx";
import { RawRow } from "../types";

/** In-memory .xlsx with the rows on its first sheet. */
export function workbookBuffer(rows: RawRow[]): Buffer {
  const wb = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(wb, XLSX.utils.aoa_to_sheet(rows), "Sheet1");
  const out: Buffer = XLSX.write(wb, { bookType: "xlsx", type: "buffer" });
  return out;
}

// Legacy sheet: container header line, continuation row, a row without a shipping mark
export const LEGACY_ROWS: RawRow[] = [
  ["2th/Jan GHANA 2025--N005=TGBU9600716", null, null, null, null, null],
  ["C001", "KK100 KK101", "0202425612 BLESSING KUMASI", "1pallet", 0.3, "shoes"],
  [null, null, "999 NOBODY", null, null, null],
  [null, "KK102", null, "2", "0.2", null],
  ["C002", "S200", "540789320", "4", "bad", "bags"],
  ["N006= second container", "X1", null, "1", 1, null],
];

// Labelled sheet: metadata lines above the header, one row without a tracking number
export const LABELLED_ROWS: RawRow[] = [
  [],
  ["2th/Jan GHANA 2025--001=TGBU9600716"],
  ["2th/Jan GHANA 2025--001=TGBU9600716"],
  ["INVOICE N0.", "TRACKING N0.", "CONTACT", "CUSTOMER NAME", "LOCATION", "QTY PER TRACKING", "CBM PER TRACKING", "PRODUCT DESCRIPTION", "RECEIVING DATE"],
  [101, "KK12345678", "201698812", "Tilly", "ACCRA GHANA", "1pallet", 0.18, "LEARNING MACHINE", "2025-01-01"],
  [102, "S987654321", "540789320", "Christian", "ACCRA", "1", 0.42, "SHOES", "2025-01-01"],
  [103, "S999888777", "540789320", "Christian", "ACCRA", "4", 0.14, "SHOES", "2025-01-01"],
  [104, null, "555000111", "Nobody", "ACCRA", "1", 0.5, "BAGS", "2025-01-01"],
];
