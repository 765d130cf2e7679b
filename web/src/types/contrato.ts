/** Contract object exactly as the portal returns it. Shape varies by API version. */
export type RawContractRecord = Record<string, unknown>;

/** ISO `YYYY-MM-DD` of a real calendar day. */
export type CalendarDate = string;

export interface ContractRecord {
  id: string | null;
  contractNumber: string | null;
  objectDescription: string | null;
  status: string | null;
  processNumber: string | null;
  procurementModality: string | null;
  initialValue: number | null;
  finalValue: number | null;
  signatureDate: CalendarDate | null;
  publicationDate: CalendarDate | null;
  validityStart: CalendarDate | null;
  validityEnd: CalendarDate | null;
  supplierName: string | null;
  supplierTaxId: string | null;
  executingUnitCode: string | null;
  executingUnitName: string | null;
  responsibleUnitCode: string | null;
  responsibleUnitName: string | null;
  agencyCode: string | null;
  agencyName: string | null;
  superiorAgencyCode: string | null;
  superiorAgencyName: string | null;
}

export type ContractField = keyof ContractRecord;

/** Filters sent upstream as query parameters. */
export interface ContractFilters {
  supplierTaxId?: string;
  /** ISO or DD/MM/YYYY. */
  validityStartFrom?: string;
  /** ISO or DD/MM/YYYY. */
  validityEndTo?: string;
  minValue?: number;
}

export interface FetchProgress {
  page: number;
  pageLimit: number;
  records: number;
}

/**
 * Non-fatal: a record was normalized with some fields set to null.
 * `missingFields` had no value at any source path; `invalidFields` had a
 * value that could not be coerced.
 */
export interface PartialDataWarning {
  index: number;
  contractNumber: string | null;
  missingFields: ContractField[];
  invalidFields: ContractField[];
}
