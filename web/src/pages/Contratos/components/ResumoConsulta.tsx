import { Card } from "@/components/ui/Card";
import { ValorMonetario } from "@/components/ValorMonetario";
import { formatNumber } from "@/lib/formatters";
import type { ContractRecord } from "@/types/contrato";

interface ResumoConsultaProps {
  contratos: ContractRecord[];
}

export function ResumoConsulta({ contratos }: ResumoConsultaProps) {
  const total = contratos.reduce((sum, c) => sum + (c.finalValue ?? 0), 0);
  const vigentes = contratos.filter((c) => c.status?.toLowerCase().includes("vigente")).length;

  return (
    <div className="grid gap-4 sm:grid-cols-3">
      <Card>
        <p className="text-xs text-gray-500">Contratos</p>
        <p className="text-2xl font-semibold text-gray-900" data-testid="resumo-quantidade">
          {formatNumber(contratos.length)}
        </p>
      </Card>
      <Card>
        <p className="text-xs text-gray-500">Valor final somado</p>
        <p className="text-2xl font-semibold text-gray-900" data-testid="resumo-total">
          <ValorMonetario valor={total} />
        </p>
      </Card>
      <Card>
        <p className="text-xs text-gray-500">Situação "vigente" no portal</p>
        <p className="text-2xl font-semibold text-gray-900">{formatNumber(vigentes)}</p>
      </Card>
    </div>
  );
}
