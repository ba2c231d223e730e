// lib/normalize.ts
import { RawCell } from "./types";

// ---------- Utilities ----------
export function roundTo(x: number, dp: number): number {
  const f = 10 ** dp;
  return Math.round(x * f) / f;
}
export const round2 = (x: number) => roundTo(x, 2);
export const round3 = (x: number) => roundTo(x, 3);

const USD = new Intl.NumberFormat("en-US", { style: "currency", currency: "USD" });
export function moneyUsd(x: number): string { return USD.format(x); }   // "$1,234.56"

// ---------- Cell cleaners ----------
export function cellText(raw: RawCell | undefined): string {
  if (raw === null || raw === undefined) return "";
  if (raw instanceof Date) return Number.isNaN(raw.getTime()) ? "" : raw.toISOString().slice(0, 10);
  if (typeof raw === "number" && !Number.isFinite(raw)) return "";
  return String(raw).trim();
}

export function isBlankCell(raw: RawCell | undefined): boolean {
  return cellText(raw) === "";
}

// Plain decimal text: no hex, binary, separators or units
const DECIMAL_TEXT = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

export function parseDecimal(s: string): number | null {
  const t = s.trim();
  if (!DECIMAL_TEXT.test(t)) return null;
  const n = Number(t);
  return Number.isFinite(n) ? n : null;
}

export function digitsOnly(raw: string): string {
  return (raw ?? "").replace(/\D/g, "");
}

/** Digits of a contact cell, or null when nothing numeric is left. */
export function cleanPhone(raw: RawCell | undefined): string | null {
  return digitsOnly(cellText(raw)) || null;
}

/** Volume in CBM; anything non-numeric, negative or blank is 0. */
export function toVolume(raw: RawCell | undefined): number {
  if (typeof raw === "number") return Number.isFinite(raw) && raw > 0 ? raw : 0;
  const s = cellText(raw);
  if (!s || typeof raw === "boolean" || raw instanceof Date) return 0;
  const n = parseDecimal(s);
  return n !== null && n > 0 ? n : 0;
}

/** Some cells carry several parcel numbers separated by spaces; the first one names the parcel. */
export function normalizeShippingMark(raw: RawCell | undefined): string | null {
  const s = cellText(raw);
  if (!s) return null;
  return s.split(/\s+/)[0] || null;
}

/**
 * Legacy column C: "0202425612 BLESSING KUMASI" or "61466818614".
 * Leading token's digits are the phone, the remainder the name.
 */
export function splitPhoneName(raw: RawCell | undefined): { phone: string | null; name: string | null } {
  const s = cellText(raw);
  if (!s) return { phone: null, name: null };
  const space = s.indexOf(" ");
  if (space < 0) return { phone: digitsOnly(s) || null, name: null };
  const phone = digitsOnly(s.slice(0, space)) || null;
  const name = s.slice(space + 1).trim() || null;
  return { phone, name };
}

/** Keeps a customer name or phone usable inside a file name. */
export function safeFilename(raw: string): string {
  const s = (raw ?? "").trim()
    .replace(/[\\/:*?"<>|]+/g, " ")
    .replace(/\s+/g, " ")
    .trim();
  return s.length > 180 ? s.slice(0, 180) : s;
}
