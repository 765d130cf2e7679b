// Declarative mapping from upstream JSON to ContractRecord.
//
// Each output field lists its source paths in precedence order; the first
// path holding a non-null value wins; if that value does not parse the field
// is invalid, later paths are not consulted. The trailing flat paths
// (situacao, valorInicial, nomeFornecedor, cnpjFornecedor, orgaoSuperior,
// orgao) are the legacy column names of the flat export and only apply when
// the nested ones are absent.

import { parseCalendarDate, parseDecimal, parseText } from "@/lib/parsers";
import type { ContractField, ContractRecord } from "@/types/contrato";

type FieldsOfType<T> = {
  [K in ContractField]: ContractRecord[K] extends T | null ? K : never;
}[ContractField];

type TextField = FieldsOfType<string>;
type DecimalField = FieldsOfType<number>;

export type FieldMapping =
  | { field: TextField; kind: "text" | "date"; paths: readonly string[] }
  | { field: DecimalField; kind: "decimal"; paths: readonly string[] };

export const CONTRACT_FIELDS: readonly FieldMapping[] = [
  { field: "id", kind: "text", paths: ["id"] },
  { field: "contractNumber", kind: "text", paths: ["numero", "numeroContrato"] },
  { field: "objectDescription", kind: "text", paths: ["objeto", "compra.objeto"] },
  { field: "status", kind: "text", paths: ["situacaoContrato", "situacao"] },
  { field: "processNumber", kind: "text", paths: ["numeroProcesso", "compra.numeroProcesso"] },
  { field: "procurementModality", kind: "text", paths: ["modalidadeCompra"] },
  { field: "initialValue", kind: "decimal", paths: ["valorInicialCompra", "valorInicial"] },
  { field: "finalValue", kind: "decimal", paths: ["valorFinalCompra"] },
  { field: "signatureDate", kind: "date", paths: ["dataAssinatura"] },
  { field: "publicationDate", kind: "date", paths: ["dataPublicacaoDOU"] },
  { field: "validityStart", kind: "date", paths: ["dataInicioVigencia"] },
  { field: "validityEnd", kind: "date", paths: ["dataFimVigencia"] },
  {
    field: "supplierName",
    kind: "text",
    paths: ["fornecedor.nome", "fornecedor.razaoSocialReceita", "nomeFornecedor"],
  },
  {
    field: "supplierTaxId",
    kind: "text",
    paths: ["fornecedor.cnpjFormatado", "fornecedor.cnpj", "cnpjFornecedor"],
  },
  { field: "executingUnitCode", kind: "text", paths: ["unidadeGestoraCompras.codigo"] },
  { field: "executingUnitName", kind: "text", paths: ["unidadeGestoraCompras.nome"] },
  { field: "responsibleUnitCode", kind: "text", paths: ["unidadeGestora.codigo"] },
  { field: "responsibleUnitName", kind: "text", paths: ["unidadeGestora.nome"] },
  { field: "agencyCode", kind: "text", paths: ["unidadeGestora.orgaoVinculado.codigoSIAFI"] },
  { field: "agencyName", kind: "text", paths: ["unidadeGestora.orgaoVinculado.nome", "orgao"] },
  {
    field: "superiorAgencyCode",
    kind: "text",
    paths: ["unidadeGestora.orgaoMaximo.codigo"],
  },
  {
    field: "superiorAgencyName",
    kind: "text",
    paths: ["unidadeGestora.orgaoMaximo.nome", "orgaoSuperior"],
  },
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Walks a dotted path; any missing or non-object hop yields undefined. */
function readPath(source: unknown, path: string): unknown {
  let current: unknown = source;
  for (const key of path.split(".")) {
    if (!isRecord(current)) return undefined;
    current = current[key];
  }
  return current;
}

type FieldResolution<T> =
  | { state: "ok"; value: T }
  | { state: "missing" }
  | { state: "invalid" };

export type ResolutionState = FieldResolution<unknown>["state"];

function resolvePaths<T>(
  raw: unknown,
  paths: readonly string[],
  parse: (value: unknown) => T | null,
): FieldResolution<T> {
  for (const path of paths) {
    const value = readPath(raw, path);
    if (value === undefined || value === null) continue;
    const parsed = parse(value);
    return parsed === null ? { state: "invalid" } : { state: "ok", value: parsed };
  }
  return { state: "missing" };
}

/** Resolves one mapping into `record`, leaving null when nothing parses. */
export function applyField(
  record: ContractRecord,
  raw: unknown,
  mapping: FieldMapping,
): ResolutionState {
  if (mapping.kind === "decimal") {
    const resolved = resolvePaths(raw, mapping.paths, parseDecimal);
    record[mapping.field] = resolved.state === "ok" ? resolved.value : null;
    return resolved.state;
  }

  const parse = mapping.kind === "date" ? parseCalendarDate : parseText;
  const resolved = resolvePaths(raw, mapping.paths, parse);
  record[mapping.field] = resolved.state === "ok" ? resolved.value : null;
  return resolved.state;
}

export function emptyContractRecord(): ContractRecord {
  return {
    id: null,
    contractNumber: null,
    objectDescription: null,
    status: null,
    processNumber: null,
    procurementModality: null,
    initialValue: null,
    finalValue: null,
    signatureDate: null,
    publicationDate: null,
    validityStart: null,
    validityEnd: null,
    supplierName: null,
    supplierTaxId: null,
    executingUnitCode: null,
    executingUnitName: null,
    responsibleUnitCode: null,
    responsibleUnitName: null,
    agencyCode: null,
    agencyName: null,
    superiorAgencyCode: null,
    superiorAgencyName: null,
  };
}
