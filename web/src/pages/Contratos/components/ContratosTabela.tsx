// ContratosTabela — paginated result table.
//
// Pagination is client-side: the whole result is already in memory. objeto
// is truncated to keep rows scannable; the full text stays in the title.

import { Card, CardHeader } from "@/components/ui/Card";
import { Pagination } from "@/components/ui/Pagination";
import { Table, type Column } from "@/components/ui/Table";
import { CNPJFormatado } from "@/components/CNPJFormatado";
import { ValorMonetario } from "@/components/ValorMonetario";
import { usePagination } from "@/hooks/usePagination";
import { RESULT_PAGE_SIZE } from "@/lib/constants";
import { formatDate } from "@/lib/formatters";
import type { ContractRecord } from "@/types/contrato";

function truncate(text: string, max: number): string {
  return text.length > max ? text.slice(0, max) + "…" : text;
}

function Missing() {
  return <span className="text-gray-400">—</span>;
}

const COLUMNS: Column<ContractRecord>[] = [
  {
    key: "numero",
    header: "Contrato",
    render: (c) => (c.contractNumber ? <span className="font-mono text-xs">{c.contractNumber}</span> : <Missing />),
  },
  {
    key: "objeto",
    header: "Objeto",
    render: (c) =>
      c.objectDescription ? (
        <span title={c.objectDescription}>{truncate(c.objectDescription, 60)}</span>
      ) : (
        <Missing />
      ),
    className: "max-w-xs",
  },
  {
    key: "fornecedor",
    header: "Fornecedor",
    render: (c) => (
      <div className="flex flex-col">
        <span>{c.supplierName ?? "—"}</span>
        <CNPJFormatado cnpj={c.supplierTaxId} />
      </div>
    ),
  },
  {
    key: "unidade",
    header: "Unidade executora",
    render: (c) =>
      c.executingUnitCode ? (
        <span title={c.executingUnitName ?? undefined}>{c.executingUnitCode}</span>
      ) : (
        <Missing />
      ),
  },
  {
    key: "vigencia",
    header: "Vigência",
    render: (c) => (
      <span className="whitespace-nowrap">
        {formatDate(c.validityStart)} a {formatDate(c.validityEnd)}
      </span>
    ),
  },
  {
    key: "valor",
    header: "Valor final",
    render: (c) => <ValorMonetario valor={c.finalValue ?? c.initialValue} />,
    className: "text-right",
  },
  {
    key: "situacao",
    header: "Situação",
    render: (c) => c.status ?? <Missing />,
  },
];

interface ContratosTabelaProps {
  contratos: ContractRecord[];
  action?: React.ReactNode;
}

export function ContratosTabela({ contratos, action }: ContratosTabelaProps) {
  const { page, totalPages, pageItems, nextPage, prevPage } = usePagination(
    contratos,
    RESULT_PAGE_SIZE,
  );

  return (
    <Card>
      <CardHeader title="Contratos" action={action} />
      <Table<ContractRecord>
        columns={COLUMNS}
        data={pageItems}
        keyExtractor={(c, i) => c.id ?? `${c.contractNumber ?? "sem-numero"}-${page}-${i}`}
      />
      {totalPages > 1 && (
        <div className="mt-3">
          <Pagination page={page} totalPages={totalPages} onPrev={prevPage} onNext={nextPage} />
        </div>
      )}
    </Card>
  );
}
