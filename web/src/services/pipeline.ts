import { fetchTransport, type HttpTransport } from "./api";
import { createContratosFetcher } from "./contratoService";
import type { QueryCache } from "./queryCache";
import type { PortalConfig } from "@/lib/config";
import { filterByExecutingUnit, filterCurrentlyValid } from "@/lib/filters";
import { createLogger } from "@/lib/logger";
import { normalize } from "@/lib/normalizer";
import type {
  ContractFilters,
  ContractRecord,
  FetchProgress,
  PartialDataWarning,
} from "@/types/contrato";

const log = createLogger("pipeline");

export interface PipelineOptions {
  /** Exact match on executingUnitCode, applied client-side after the full fetch. */
  executingUnitCode?: string;
  onlyCurrentlyValid?: boolean;
  /** Evaluation date for `onlyCurrentlyValid`; defaults to now. */
  today?: Date;
  onProgress?: (progress: FetchProgress) => void;
  onWarning?: (warning: PartialDataWarning) => void;
}

export interface ContratosPipeline {
  fetchAndNormalize: (
    agencyCode: string,
    filters?: ContractFilters,
    pageLimit?: number,
    options?: PipelineOptions,
  ) => Promise<ContractRecord[]>;
}

export function createContratosPipeline(
  config: PortalConfig,
  transport: HttpTransport = fetchTransport,
  { cache }: { cache?: QueryCache } = {},
): ContratosPipeline {
  const fetcher = createContratosFetcher(config, transport);

  async function load(
    agencyCode: string,
    filters: ContractFilters,
    pageLimit: number,
    options: PipelineOptions,
  ): Promise<ContractRecord[]> {
    const raw = await fetcher.fetchAll(agencyCode, filters, pageLimit, options.onProgress);
    const records = normalize(raw, { onWarning: options.onWarning });
    log.info(`${records.length} contratos carregados para o órgão ${agencyCode.trim()}`);
    return records;
  }

  async function fetchAndNormalize(
    agencyCode: string,
    filters: ContractFilters = {},
    pageLimit: number = config.pageLimit,
    options: PipelineOptions = {},
  ): Promise<ContractRecord[]> {
    const loaded = cache
      ? await cache.get({ agencyCode, filters, pageLimit }, () =>
          load(agencyCode, filters, pageLimit, options),
        )
      : await load(agencyCode, filters, pageLimit, options);

    // Cached records are shared between calls; each caller gets its own copies.
    let records = loaded.map((record) => ({ ...record }));

    const unit = options.executingUnitCode?.trim();
    if (unit) records = filterByExecutingUnit(records, unit);
    if (options.onlyCurrentlyValid) records = filterCurrentlyValid(records, options.today);

    return records;
  }

  return { fetchAndNormalize };
}
