interface MetricTileProps {
  label: string;
  value: string;
  hint?: string;
}

export function MetricTile({ label, value, hint }: MetricTileProps) {
  return (
    <div className="rounded-xl bg-white/70 border border-stone-200 px-4 py-3">
      <p className="text-caption text-text-muted">{label}</p>
      <p className="text-lg font-semibold text-text-primary mt-1">{value}</p>
      {hint && <p className="text-caption text-text-muted mt-1">{hint}</p>}
    </div>
  );
}
