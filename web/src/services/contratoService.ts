// Fetcher for /contratos on the Portal da Transparência.
//
// Pages are requested one at a time, starting at 1, until a page comes back
// as an empty array or the page cap is passed. An empty page is the normal
// end of data, not an error. Any failed request aborts the whole run: the
// caller gets the error and none of the pages already read.

import { portalGet, fetchTransport, type HttpTransport } from "./api";
import type { PortalConfig } from "@/lib/config";
import { cnpjToParam, formatDate } from "@/lib/formatters";
import { createLogger } from "@/lib/logger";
import { parseCalendarDate } from "@/lib/parsers";
import { UpstreamError, ValidationError } from "@/types/api";
import type {
  ContractFilters,
  FetchProgress,
  RawContractRecord,
} from "@/types/contrato";

const log = createLogger("contratos");

const CONTRATOS_PATH = "/contratos";

export interface ContratosFetcher {
  iterate: (
    agencyCode: string,
    filters?: ContractFilters,
    pageLimit?: number,
    onProgress?: (progress: FetchProgress) => void,
  ) => AsyncGenerator<RawContractRecord, void, undefined>;
  fetchAll: (
    agencyCode: string,
    filters?: ContractFilters,
    pageLimit?: number,
    onProgress?: (progress: FetchProgress) => void,
  ) => Promise<RawContractRecord[]>;
}

function isRecord(value: unknown): value is RawContractRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function toPortalDate(value: string, field: string): string {
  const date = parseCalendarDate(value);
  if (!date) throw new ValidationError(field, `Data inválida em ${field}: "${value}".`);
  return formatDate(date);
}

/**
 * Validates the caller input and turns it into the query parameters shared
 * by every page request. Throws ValidationError before anything is sent.
 */
function buildBaseParams(
  agencyCode: string,
  filters: ContractFilters,
): [string, string][] {
  const codigoOrgao = agencyCode.trim();
  if (!codigoOrgao) {
    throw new ValidationError("agencyCode", "O código do órgão é obrigatório.");
  }

  const params: [string, string][] = [["codigoOrgao", codigoOrgao]];

  const taxId = filters.supplierTaxId ? cnpjToParam(filters.supplierTaxId) : "";
  if (taxId) params.push(["cpfCnpjFornecedor", taxId]);

  if (filters.validityStartFrom?.trim()) {
    params.push([
      "dataInicioVigencia",
      toPortalDate(filters.validityStartFrom, "validityStartFrom"),
    ]);
  }
  if (filters.validityEndTo?.trim()) {
    params.push(["dataFimVigencia", toPortalDate(filters.validityEndTo, "validityEndTo")]);
  }

  if (filters.minValue !== undefined) {
    if (!Number.isFinite(filters.minValue) || filters.minValue < 0) {
      throw new ValidationError("minValue", "O valor mínimo deve ser um número não negativo.");
    }
    if (filters.minValue > 0) params.push(["valorMinimo", String(filters.minValue)]);
  }

  return params;
}

function assertPageLimit(pageLimit: number): void {
  if (!Number.isInteger(pageLimit) || pageLimit < 1) {
    throw new ValidationError("pageLimit", "O máximo de páginas deve ser um inteiro positivo.");
  }
}

export function createContratosFetcher(
  config: PortalConfig,
  transport: HttpTransport = fetchTransport,
): ContratosFetcher {
  async function* iterate(
    agencyCode: string,
    filters: ContractFilters = {},
    pageLimit: number = config.pageLimit,
    onProgress?: (progress: FetchProgress) => void,
  ): AsyncGenerator<RawContractRecord, void, undefined> {
    assertPageLimit(pageLimit);
    const baseParams = buildBaseParams(agencyCode, filters);

    let records = 0;
    for (let page = 1; page <= pageLimit; page++) {
      if (page > 1 && config.pageDelayMs > 0) await sleep(config.pageDelayMs);

      const params = new URLSearchParams([["pagina", String(page)], ...baseParams]);
      const { status, body } = await portalGet(config, CONTRATOS_PATH, params, transport);

      if (!Array.isArray(body)) {
        throw new UpstreamError(status, `página ${page} não é uma lista: ${JSON.stringify(body).slice(0, 200)}`);
      }
      if (body.length === 0) {
        log.debug(`página ${page} vazia, fim dos dados`);
        return;
      }

      for (const item of body) {
        if (!isRecord(item)) {
          log.warn(`item ignorado na página ${page}: não é um objeto`);
          continue;
        }
        records += 1;
        yield item;
      }

      onProgress?.({ page, pageLimit, records });
    }

    log.info(`limite de ${pageLimit} páginas atingido para o órgão ${agencyCode.trim()}`);
  }

  async function fetchAll(
    agencyCode: string,
    filters: ContractFilters = {},
    pageLimit: number = config.pageLimit,
    onProgress?: (progress: FetchProgress) => void,
  ): Promise<RawContractRecord[]> {
    const all: RawContractRecord[] = [];
    for await (const record of iterate(agencyCode, filters, pageLimit, onProgress)) {
      all.push(record);
    }
    return all;
  }

  return { iterate, fetchAll };
}
