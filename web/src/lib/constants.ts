import type { ContractField } from "@/types/contrato";

/** Column order and headers of the result table and the CSV export. */
export const CONTRACT_COLUMNS: ReadonlyArray<{ field: ContractField; label: string }> = [
  { field: "contractNumber", label: "Número do contrato" },
  { field: "objectDescription", label: "Objeto" },
  { field: "status", label: "Situação" },
  { field: "initialValue", label: "Valor inicial" },
  { field: "finalValue", label: "Valor final" },
  { field: "validityStart", label: "Início da vigência" },
  { field: "validityEnd", label: "Fim da vigência" },
  { field: "supplierName", label: "Fornecedor" },
  { field: "supplierTaxId", label: "CNPJ do fornecedor" },
  { field: "executingUnitCode", label: "Código da unidade executora" },
  { field: "executingUnitName", label: "Unidade executora" },
  { field: "responsibleUnitCode", label: "Código da unidade gestora" },
  { field: "responsibleUnitName", label: "Unidade gestora" },
  { field: "agencyCode", label: "Código do órgão" },
  { field: "agencyName", label: "Órgão" },
  { field: "superiorAgencyCode", label: "Código do órgão superior" },
  { field: "superiorAgencyName", label: "Órgão superior" },
  { field: "processNumber", label: "Número do processo" },
  { field: "procurementModality", label: "Modalidade da compra" },
  { field: "signatureDate", label: "Data de assinatura" },
  { field: "publicationDate", label: "Publicação no DOU" },
  { field: "id", label: "ID" },
];

export const RESULT_PAGE_SIZE = 20;
