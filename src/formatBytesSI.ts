const UNIT = 1000;
const PREFIXES = 'kMGTPE';

/**
 * Format a byte count with SI prefixes for progress output, e.g. `999 B`, `1.5 MB`.
 *
 * Quantities past the exa range are not handled.
 */
export default function formatBytesSI(bytes: number): string {
  if (bytes < 0) return `-${formatBytesSI(-bytes)}`;
  if (bytes < UNIT) return `${bytes} B`;

  let div = UNIT;
  let exp = 0;
  for (let n = Math.floor(bytes / UNIT); n >= UNIT; n = Math.floor(n / UNIT)) {
    div *= UNIT;
    exp++;
  }
  return `${(bytes / div).toFixed(1)} ${PREFIXES[exp]}B`;
}
