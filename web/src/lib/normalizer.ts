import { CONTRACT_FIELDS, applyField, emptyContractRecord } from "@/lib/contractFields";
import { createLogger } from "@/lib/logger";
import type {
  ContractField,
  ContractRecord,
  PartialDataWarning,
  RawContractRecord,
} from "@/types/contrato";

const log = createLogger("normalizer");

export interface NormalizeOptions {
  onWarning?: (warning: PartialDataWarning) => void;
}

function normalizeRecord(raw: RawContractRecord): {
  record: ContractRecord;
  missingFields: ContractField[];
  invalidFields: ContractField[];
} {
  const record = emptyContractRecord();
  const missingFields: ContractField[] = [];
  const invalidFields: ContractField[] = [];

  for (const mapping of CONTRACT_FIELDS) {
    const state = applyField(record, raw, mapping);
    if (state === "missing") missingFields.push(mapping.field);
    else if (state === "invalid") invalidFields.push(mapping.field);
  }

  return { record, missingFields, invalidFields };
}

/**
 * Maps raw portal records onto the fixed ContractRecord shape, in input
 * order. Gaps become null and are reported through `onWarning`; nothing
 * here throws on bad data.
 */
export function normalize(
  records: readonly RawContractRecord[],
  options: NormalizeOptions = {},
): ContractRecord[] {
  let partial = 0;

  const normalized = records.map((raw, index) => {
    const { record, missingFields, invalidFields } = normalizeRecord(raw);
    if (missingFields.length > 0 || invalidFields.length > 0) {
      partial += 1;
      options.onWarning?.({
        index,
        contractNumber: record.contractNumber,
        missingFields,
        invalidFields,
      });
    }
    return record;
  });

  if (partial > 0) {
    log.debug(`${partial} de ${records.length} registros com campos ausentes`);
  }

  return normalized;
}
