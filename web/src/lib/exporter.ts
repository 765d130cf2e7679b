// CSV export of the result table. `;` is the separator spreadsheet software
// expects under pt-BR locales, so numbers use a decimal comma; the BOM makes
// it read the file as UTF-8.

import Papa from "papaparse";
import { CONTRACT_COLUMNS } from "@/lib/constants";
import { localCalendarDate } from "@/lib/parsers";
import type { ContractField, ContractRecord } from "@/types/contrato";

const UTF8_BOM = "\uFEFF";

// Text cells that would start a formula get a leading quote; negative numbers do not.
const FORMULA_START = /^[=+@\t\r]|^-(?!\d)/;

function toCell(value: ContractRecord[ContractField]): string {
  if (value === null) return "";
  if (typeof value === "number") return String(value).replace(".", ",");
  return value;
}

export function toCsv(records: readonly ContractRecord[]): string {
  const header = CONTRACT_COLUMNS.map((c) => c.label);
  const rows = records.map((record) =>
    CONTRACT_COLUMNS.map(({ field }) => toCell(record[field])),
  );
  return Papa.unparse([header, ...rows], {
    delimiter: ";",
    newline: "\r\n",
    escapeFormulae: FORMULA_START,
  });
}

export function toCsvBlob(records: readonly ContractRecord[]): Blob {
  return new Blob([UTF8_BOM + toCsv(records)], { type: "text/csv;charset=utf-8" });
}

export function exportFilename(agencyCode: string, now: Date = new Date()): string {
  const safeCode = agencyCode.trim().replace(/[^\w-]/g, "") || "orgao";
  return `contratos-${safeCode}-${localCalendarDate(now)}.csv`;
}
