interface EmptyStateProps {
  message?: string;
  hint?: string;
}

export function EmptyState({
  message = "Nenhum contrato encontrado.",
  hint,
}: EmptyStateProps) {
  return (
    <div className="flex flex-col items-center justify-center py-12 text-center">
      <p className="text-sm text-gray-500">{message}</p>
      {hint && <p className="mt-1 text-xs text-gray-400">{hint}</p>}
    </div>
  );
}
