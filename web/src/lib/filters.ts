import { localCalendarDate } from "@/lib/parsers";
import type { ContractRecord } from "@/types/contrato";

export function filterByExecutingUnit(
  records: readonly ContractRecord[],
  executingUnitCode: string,
): ContractRecord[] {
  return records.filter((r) => r.executingUnitCode === executingUnitCode);
}

/**
 * Keeps contracts whose validity ends on or after `today`. Depends on the
 * clock: the same input can give different results on different days.
 */
export function filterCurrentlyValid(
  records: readonly ContractRecord[],
  today: Date = new Date(),
): ContractRecord[] {
  const cutoff = localCalendarDate(today);
  return records.filter((r) => r.validityEnd !== null && r.validityEnd >= cutoff);
}
