import { formatCurrency } from "@/lib/formatters";

interface ValorMonetarioProps {
  valor: number | null;
  className?: string;
}

export function ValorMonetario({ valor, className = "" }: ValorMonetarioProps) {
  return (
    <span className={`tabular-nums ${valor === null ? "text-gray-400" : ""} ${className}`}>
      {formatCurrency(valor)}
    </span>
  );
}
