import type {
  SpectrumBand,
  Time,
  BandOccupancyEntry,
  BusyUpdate,
} from './types.js';
import { PhyStateError } from './errors.js';

/**
 * Converts a CCA threshold to an integer count of resolution steps so that
 * it can take part in an exact map key.
 */
export function quantizeThreshold(
  thresholdDbm: number,
  resolutionDbm: number
): number {
  if (!Number.isFinite(thresholdDbm)) {
    throw new PhyStateError(
      `CCA threshold must be finite, got ${thresholdDbm}`,
      'INVALID_ARGUMENT',
      'quantizeThreshold'
    );
  }
  if (!Number.isFinite(resolutionDbm) || resolutionDbm <= 0) {
    throw new PhyStateError(
      `Threshold resolution must be positive, got ${resolutionDbm}`,
      'INVALID_ARGUMENT',
      'quantizeThreshold'
    );
  }
  // Adding 0 folds -0 into 0.
  return Math.round(thresholdDbm / resolutionDbm) + 0;
}

export function validateBand(band: SpectrumBand, operation: string): void {
  if (
    !Number.isInteger(band.start) ||
    !Number.isInteger(band.stop) ||
    band.start < 0 ||
    band.stop < band.start
  ) {
    throw new PhyStateError(
      `Invalid spectrum band [${band.start}, ${band.stop}]`,
      'INVALID_ARGUMENT',
      operation
    );
  }
}

function makeKey(band: SpectrumBand, thresholdStep: number): string {
  return `${band.start}:${band.stop}@${thresholdStep}`;
}

/**
 * Busy intervals per (band, CCA threshold).
 *
 * Entries are created on first detection and overwritten in place. Busy ends
 * only move forward, so detections arriving out of order for overlapping
 * bands accumulate the longest observed occupancy.
 */
export class BandOccupancyTable {
  private entriesByKey: Map<string, BandOccupancyEntry> = new Map();

  constructor(private readonly resolutionDbm: number) {
    quantizeThreshold(0, resolutionDbm);
  }

  get size(): number {
    return this.entriesByKey.size;
  }

  get(
    band: SpectrumBand,
    thresholdDbm: number
  ): BandOccupancyEntry | undefined {
    const step = quantizeThreshold(thresholdDbm, this.resolutionDbm);
    const entry = this.entriesByKey.get(makeKey(band, step));
    return entry ? { ...entry, band: { ...entry.band } } : undefined;
  }

  isBusy(band: SpectrumBand, thresholdDbm: number, now: Time): boolean {
    const entry = this.get(band, thresholdDbm);
    return entry !== undefined && now < entry.busyEnd;
  }

  /**
   * Records energy above the threshold on a band for `duration` from `now`.
   * The stored end is only replaced if the new one is later.
   */
  markBusy(
    band: SpectrumBand,
    thresholdDbm: number,
    now: Time,
    duration: Time
  ): BusyUpdate {
    const thresholdStep = quantizeThreshold(thresholdDbm, this.resolutionDbm);
    const key = makeKey(band, thresholdStep);
    const end = now + duration;
    const existing = this.entriesByKey.get(key);
    const wasBusy = existing !== undefined && now < existing.busyEnd;

    if (existing && end <= existing.busyEnd) {
      return { extended: false, wasBusy, entry: { ...existing } };
    }

    const entry: BandOccupancyEntry = {
      band: { start: band.start, stop: band.stop },
      thresholdStep,
      busyStart: existing && wasBusy ? existing.busyStart : now,
      busyEnd: end,
    };
    this.entriesByKey.set(key, entry);
    return { extended: true, wasBusy, entry: { ...entry } };
  }

  entries(): BandOccupancyEntry[] {
    return Array.from(this.entriesByKey.values()).map(entry => ({
      ...entry,
      band: { ...entry.band },
    }));
  }
}
