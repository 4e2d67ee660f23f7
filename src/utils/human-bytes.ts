/**
 * Byte counts for humans: `42 B`, `1 KB`, `9.5 MB`, `93.13 GB`.
 * KB are whole numbers, MB keep one decimal, GB two; ties round to even.
 */
export function humanBytes(n: number): string {
  if (n < 1024) return `${Math.trunc(n)} B`;
  const k = n / 1024;
  if (k < 1024) return `${roundHalfEven(k)} KB`;
  const m = k / 1024;
  if (m < 1024) return `${(roundHalfEven(m * 10) / 10).toFixed(1)} MB`;
  const g = m / 1024;
  return `${(roundHalfEven(g * 100) / 100).toFixed(2)} GB`;
}

function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const diff = value - floor;
  if (diff > 0.5) return floor + 1;
  if (diff < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}
