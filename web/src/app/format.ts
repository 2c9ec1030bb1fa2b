const BINARY_UNITS = ["KiB", "MiB", "GiB", "TiB", "PiB", "EiB"] as const;

/** `512 B`, `1.5 KiB`, `3.2 GiB`. */
export function formatSize(bytes: number): string {
  if (!Number.isFinite(bytes) || bytes < 0) return "-";
  if (bytes < 1024) return `${Math.trunc(bytes)} B`;
  let value = bytes;
  let unit = -1;
  while (value >= 1024 && unit < BINARY_UNITS.length - 1) {
    value /= 1024;
    unit += 1;
  }
  return `${value.toFixed(1)} ${BINARY_UNITS[unit] ?? "EiB"}`;
}

export interface RankedEntry {
  readonly name: string;
  readonly size: number;
}

export const TOP_ENTRIES = 10;

/** Largest first; equal sizes by name. */
export function rankEntries(totals: ReadonlyMap<string, number>, limit = TOP_ENTRIES): RankedEntry[] {
  return [...totals]
    .map(([name, size]) => ({ name, size }))
    .sort((a, b) => b.size - a.size || (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
    .slice(0, limit);
}

export function totalSize(entries: readonly RankedEntry[]): number {
  return entries.reduce((sum, entry) => sum + entry.size, 0);
}

/** Share of `total`, in [0, 1]. */
export function shareOf(size: number, total: number): number {
  if (total <= 0) return 0;
  return Math.min(1, Math.max(0, size / total));
}

/** Whole percent, rounded down. */
export function formatPercent(fraction: number): string {
  return `${Math.floor(fraction * 100)}%`;
}

/** Tab-separated copy of the result table. */
export function resultTableText(entries: readonly RankedEntry[]): string {
  const lines = entries.map((entry) => `${entry.name}\t${formatSize(entry.size)}`);
  lines.push(`Total: ${formatSize(totalSize(entries))}`);
  return lines.join("\n");
}
