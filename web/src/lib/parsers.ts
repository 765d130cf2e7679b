// Best-effort coercion of upstream values. Every parser returns null instead
// of throwing when the input is absent or cannot be read.

import type { CalendarDate } from "@/types/contrato";

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})(?:T\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/;
const BR_DATE = /^(\d{2})\/(\d{2})\/(\d{4})$/;
const PLAIN_DECIMAL = /^-?\d+(?:\.\d+)?$/;
const BR_DECIMAL = /^-?\d{1,3}(?:\.\d{3})*(?:,\d+)?$|^-?\d+(?:,\d+)?$/;
const GROUPED_THOUSANDS = /^-?\d{1,3}(?:\.\d{3})+$/;

function pad(n: number, width = 2): string {
  return String(n).padStart(width, "0");
}

function toCalendarDate(year: number, month: number, day: number): CalendarDate | null {
  if (month < 1 || month > 12 || day < 1) return null;
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  if (day > daysInMonth) return null;
  return `${pad(year, 4)}-${pad(month)}-${pad(day)}`;
}

export function parseCalendarDate(value: unknown): CalendarDate | null {
  if (typeof value !== "string") return null;
  const trimmed = value.trim();

  const iso = ISO_DATE.exec(trimmed);
  if (iso) return toCalendarDate(Number(iso[1]), Number(iso[2]), Number(iso[3]));

  const br = BR_DATE.exec(trimmed);
  if (br) return toCalendarDate(Number(br[3]), Number(br[2]), Number(br[1]));

  return null;
}

function fromBrazilian(text: string): number | null {
  return BR_DECIMAL.test(text) ? Number(text.replace(/\./g, "").replace(",", ".")) : null;
}

/**
 * Accepts numbers, `1234.56`, `1.234,56` and an optional `R$` prefix. A
 * comma, an `R$` prefix or dot-grouped thousands (`1.500`) mean pt-BR
 * notation, where dots only separate thousands.
 */
export function parseDecimal(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value !== "string") return null;

  const trimmed = value.trim();
  const cleaned = trimmed.replace(/^R\$\s*/, "");
  const currency = cleaned !== trimmed;

  if (currency || cleaned.includes(",") || GROUPED_THOUSANDS.test(cleaned)) {
    return fromBrazilian(cleaned);
  }
  return PLAIN_DECIMAL.test(cleaned) ? Number(cleaned) : null;
}

export function parseText(value: unknown): string | null {
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed === "" ? null : trimmed;
  }
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return null;
}

/** Local calendar date, not UTC: "today" is the user's today. */
export function localCalendarDate(date: Date): CalendarDate {
  return `${pad(date.getFullYear(), 4)}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}
