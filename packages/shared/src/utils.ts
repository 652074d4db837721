export function isNonNegativeFinite(value: number): boolean {
  return Number.isFinite(value) && value >= 0;
}

export function clamp(value: number, min: number, max: number): number {
  if (min > max) {
    throw new Error(`Invalid range: ${min} > ${max}`);
  }
  return Math.min(Math.max(value, min), max);
}

const DURATION_UNITS: Array<{ suffix: string; scale: number }> = [
  { suffix: 's', scale: 1e9 },
  { suffix: 'ms', scale: 1e6 },
  { suffix: 'us', scale: 1e3 },
];

/**
 * Formats a simulation duration given in nanoseconds.
 */
export function formatDuration(nanoseconds: number): string {
  if (!Number.isFinite(nanoseconds)) {
    return String(nanoseconds);
  }
  const magnitude = Math.abs(nanoseconds);
  for (const unit of DURATION_UNITS) {
    if (magnitude >= unit.scale) {
      return `${(nanoseconds / unit.scale).toFixed(3)}${unit.suffix}`;
    }
  }
  return `${nanoseconds}ns`;
}
