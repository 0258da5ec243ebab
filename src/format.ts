/**
 * Display helpers shared by the summary output and the image labels.
 */

const COUNT_SUFFIXES = ['k', 'M', 'B', 'T'] as const;

/**
 * Shorten large stack counts: 9999 stays as is, 120000 becomes "120k",
 * 1500000 becomes "1.5M".
 */
export function formatCount(count: number): string {
  if (count < 10000) return String(count);

  let n = count;
  for (const suffix of COUNT_SUFFIXES) {
    n /= 1000;
    if (n < 1000) {
      return n >= 10 ? `${Math.trunc(n)}${suffix}` : `${n.toFixed(1).replace('.0', '')}${suffix}`;
    }
  }
  return 'INF';
}

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

/**
 * Format a millisecond timestamp as "yy-mm-dd HH:MM".
 */
export function formatShortDate(timestampMs: bigint | number | undefined, options: { utc?: boolean } = {}): string {
  if (timestampMs === undefined || timestampMs === 0 || timestampMs === 0n) return 'Never';

  const date = new Date(Number(timestampMs));
  if (Number.isNaN(date.getTime())) return 'Invalid';

  const parts = options.utc
    ? [date.getUTCFullYear(), date.getUTCMonth() + 1, date.getUTCDate(), date.getUTCHours(), date.getUTCMinutes()]
    : [date.getFullYear(), date.getMonth() + 1, date.getDate(), date.getHours(), date.getMinutes()];
  const [year, month, day, hours, minutes] = parts;

  return `${pad2(year % 100)}-${pad2(month)}-${pad2(day)} ${pad2(hours)}:${pad2(minutes)}`;
}

/**
 * "x, y, z" with "?" for unknown coordinates.
 */
export function formatPosition(position: { x?: number; y?: number; z?: number }): string {
  return [position.x, position.y, position.z].map((c) => (c === undefined ? '?' : String(c))).join(', ');
}
