// ExportButton — downloads the current result as CSV.
//
// The file is built in the browser from the records already on screen; no
// request is made. Blob → object URL → anchor click, then the URL is revoked.

import { useState } from "react";
import { Button } from "@/components/ui/Button";
import { exportFilename, toCsvBlob } from "@/lib/exporter";
import type { ContractRecord } from "@/types/contrato";

interface ExportButtonProps {
  contratos: ContractRecord[];
  agencyCode: string;
}

export function ExportButton({ contratos, agencyCode }: ExportButtonProps) {
  const [error, setError] = useState<string | null>(null);

  function handleExport() {
    setError(null);
    try {
      const url = URL.createObjectURL(toCsvBlob(contratos));
      const anchor = document.createElement("a");
      anchor.href = url;
      anchor.download = exportFilename(agencyCode);
      document.body.appendChild(anchor);
      anchor.click();
      document.body.removeChild(anchor);
      URL.revokeObjectURL(url);
    } catch (err: unknown) {
      setError(err instanceof Error ? err.message : "Erro ao exportar");
    }
  }

  return (
    <div className="flex flex-col items-end gap-1">
      <Button
        variant="secondary"
        size="sm"
        disabled={contratos.length === 0}
        onClick={handleExport}
      >
        Exportar CSV
      </Button>
      {error && <p className="text-xs text-red-600">{error}</p>}
    </div>
  );
}
