import { useState } from "react";
import { PageContainer } from "@/components/layout/PageContainer";
import { Card } from "@/components/ui/Card";
import { EmptyState } from "@/components/ui/EmptyState";
import { ErrorState } from "@/components/ui/ErrorState";
import { Loading, ProgressBar } from "@/components/ui/Loading";
import type { ContratosPipeline } from "@/services/pipeline";
import type { FetchProgress } from "@/types/contrato";
import { ConsultaForm } from "./components/ConsultaForm";
import { ContratosTabela } from "./components/ContratosTabela";
import { ExportButton } from "./components/ExportButton";
import { ResumoConsulta } from "./components/ResumoConsulta";
import { useContratos } from "./hooks/useContratos";
import type { Consulta } from "./types";

function progressLabel(progress: FetchProgress | undefined): string {
  if (!progress) return "Consultando o Portal da Transparência…";
  return `Página ${progress.page} de até ${progress.pageLimit} · ${progress.records} contratos`;
}

interface ContratosProps {
  pipeline: ContratosPipeline;
  defaultPageLimit: number;
}

export function Contratos({ pipeline, defaultPageLimit }: ContratosProps) {
  const [consulta, setConsulta] = useState<Consulta | null>(null);
  const state = useContratos(pipeline, consulta);

  return (
    <PageContainer title="Contratos do Governo Federal">
      <Card>
        <ConsultaForm
          defaultPageLimit={defaultPageLimit}
          loading={state.status === "loading"}
          onSubmit={setConsulta}
        />
      </Card>

      {state.status === "idle" && (
        <EmptyState
          message="Informe o código do órgão e clique em Consultar."
          hint="A consulta percorre todas as páginas do portal até o limite informado."
        />
      )}

      {state.status === "loading" && (
        <div className="flex flex-col items-center">
          <Loading label={progressLabel(state.progress)} />
          {state.progress && (
            <ProgressBar value={state.progress.page} max={state.progress.pageLimit} />
          )}
        </div>
      )}

      {state.status === "error" && (
        <ErrorState message={state.error.detail} onRetry={state.refetch} />
      )}

      {state.status === "success" && consulta && (
        state.data.length === 0 ? (
          <EmptyState message="Nenhum contrato encontrado para os filtros informados." />
        ) : (
          <>
            <ResumoConsulta contratos={state.data} />
            <ContratosTabela
              contratos={state.data}
              action={<ExportButton contratos={state.data} agencyCode={consulta.agencyCode} />}
            />
          </>
        )
      )}
    </PageContainer>
  );
}
