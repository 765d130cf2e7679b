interface LoadingProps {
  label?: string;
  className?: string;
}

export function Loading({ label, className = "" }: LoadingProps) {
  return (
    <div
      role="status"
      className={`flex flex-col items-center justify-center gap-3 py-12 ${className}`}
    >
      <div className="h-8 w-8 animate-spin rounded-full border-4 border-gray-200 border-t-blue-600" />
      {label && <p className="text-sm text-gray-500">{label}</p>}
    </div>
  );
}

export function ProgressBar({ value, max }: { value: number; max: number }) {
  const pct = max > 0 ? Math.min(100, Math.round((value / max) * 100)) : 0;
  return (
    <div
      role="progressbar"
      aria-valuemin={0}
      aria-valuemax={max}
      aria-valuenow={value}
      className="h-2 w-full max-w-md overflow-hidden rounded bg-gray-200"
    >
      <div className="h-full bg-blue-600 transition-all" style={{ width: `${pct}%` }} />
    </div>
  );
}
