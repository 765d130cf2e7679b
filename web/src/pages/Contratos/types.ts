import type { ContractFilters } from "@/types/contrato";

/** One submitted query, as the page hands it to the pipeline. */
export interface Consulta {
  agencyCode: string;
  filters: ContractFilters;
  pageLimit: number;
  executingUnitCode: string;
  onlyCurrentlyValid: boolean;
}

/** Raw form state; every input is kept as typed. */
export interface ConsultaFormValues {
  agencyCode: string;
  supplierTaxId: string;
  validityStartFrom: string;
  validityEndTo: string;
  minValue: string;
  pageLimit: string;
  executingUnitCode: string;
  onlyCurrentlyValid: boolean;
}
