/**
 * Format a byte count as megabytes with one decimal, e.g. `12.5 MB`
 */
export function formatMegabytes(bytes: number): string {
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}
