import { formatCNPJ } from "@/lib/formatters";

interface CNPJFormatadoProps {
  cnpj: string | null;
}

/** Already formatted values (cnpjFormatado) pass through unchanged. */
export function CNPJFormatado({ cnpj }: CNPJFormatadoProps) {
  if (!cnpj) return <span className="text-gray-400">—</span>;
  return <span className="whitespace-nowrap font-mono text-xs">{formatCNPJ(cnpj)}</span>;
}
