/** Format a throughput figure with two decimals. */
export function formatTps(tps: number): string {
  return tps.toFixed(2);
}

/** Milliseconds below one second, seconds with two decimals above. */
export function formatMs(ms: number | null | undefined): string {
  if (ms == null) return 'n/a';
  if (ms < 1000) return `${Math.round(ms)} ms`;
  return `${(ms / 1000).toFixed(2)} s`;
}

/** Format a byte size with binary suffixes. */
export function formatBytes(bytes: number): string {
  if (bytes >= 1024 ** 3) return `${(bytes / 1024 ** 3).toFixed(1)} GB`;
  if (bytes >= 1024 ** 2) return `${(bytes / 1024 ** 2).toFixed(1)} MB`;
  if (bytes >= 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${bytes} B`;
}

export function formatRuns(completed: number, requested: number): string {
  return `${completed}/${requested} runs`;
}
