export const BYTES_PER_MIB = 1024 * 1024;

export function toMiB(bytes: number): number {
  return bytes / BYTES_PER_MIB;
}

/**
 * Format a byte count the way the report shows it
 *
 * @example
 * formatMiB(52428800) // '50.00 MB'
 */
export function formatMiB(bytes: number, fractionDigits = 2): string {
  return `${toMiB(bytes).toFixed(fractionDigits)} MB`;
}
