import * as XLSX from "xlsx";
import { RawCell, RawRow } from "./types";

function toRawCell(v: unknown): RawCell {
  if (v === null || v === undefined) return null;
  if (typeof v === "string" || typeof v === "number" || typeof v === "boolean" || v instanceof Date) return v;
  return String(v);
}

export function parseXlsx(buf: Buffer): RawRow[] {
  const workbook = XLSX.read(buf, { type: "buffer", cellDates: true });
  const sheetName = workbook.SheetNames[0]; // Take the first sheet
  const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
  if (!sheet) throw new Error("Workbook has no sheets");
  // header: 1 keeps rows positional; blank rows stay so row order matches the sheet
  const rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, defval: null, raw: true, blankrows: true });
  return rows.map((r) => (Array.isArray(r) ? r.map(toRawCell) : []));
}
