import { useMemo } from "react";
import { useApi, type ApiState } from "@/hooks/useApi";
import type { ContratosPipeline } from "@/services/pipeline";
import type { ContractRecord, FetchProgress } from "@/types/contrato";
import type { Consulta } from "../types";

type UseContratosResult = ApiState<ContractRecord[], FetchProgress> & {
  refetch: () => void;
};

export function useContratos(
  pipeline: ContratosPipeline,
  consulta: Consulta | null,
): UseContratosResult {
  const fetcher = useMemo(() => {
    if (!consulta) return null;
    return (report: (progress: FetchProgress) => void) =>
      pipeline.fetchAndNormalize(consulta.agencyCode, consulta.filters, consulta.pageLimit, {
        executingUnitCode: consulta.executingUnitCode,
        onlyCurrentlyValid: consulta.onlyCurrentlyValid,
        onProgress: report,
      });
  }, [pipeline, consulta]);

  return useApi<ContractRecord[], FetchProgress>(fetcher);
}
