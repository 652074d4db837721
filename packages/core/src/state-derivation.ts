import {
  RadioState,
  type OccupancyRecord,
  type SpectrumBand,
  type Time,
} from './types.js';
import type { BandOccupancyTable } from './band-occupancy.js';
import { PhyStateError } from './errors.js';

/**
 * Derives the radio state on one band at `now`. The first matching rule wins:
 * power and sleep mask everything, the device's own Tx/Rx/switching intervals
 * mask energy detection, and CCA busy only applies to the queried band.
 */
export function deriveState(
  record: Readonly<OccupancyRecord>,
  table: BandOccupancyTable,
  band: SpectrumBand,
  thresholdDbm: number,
  now: Time
): RadioState {
  if (record.poweredOff) {
    return RadioState.OFF;
  }
  if (record.sleeping) {
    return RadioState.SLEEP;
  }
  if (now < record.switchingInterval.end) {
    return RadioState.SWITCHING;
  }
  if (now < record.txInterval.end) {
    return RadioState.TX;
  }
  if (now < record.rxInterval.end) {
    return RadioState.RX;
  }
  if (table.isBusy(band, thresholdDbm, now)) {
    return RadioState.CCA_BUSY;
  }
  return RadioState.IDLE;
}

/**
 * Time left until the band is idle, taking the latest end among the intervals
 * still running. Sleep and off have no end, so asking is a usage error.
 */
export function delayUntilIdle(
  record: Readonly<OccupancyRecord>,
  table: BandOccupancyTable,
  band: SpectrumBand,
  thresholdDbm: number,
  now: Time
): Time {
  const state = deriveState(record, table, band, thresholdDbm, now);
  if (state === RadioState.OFF || state === RadioState.SLEEP) {
    throw new PhyStateError(
      `Delay until idle is undefined while ${state}`,
      'UNDEFINED_STATE_QUERY',
      'getDelayUntilIdle',
      state
    );
  }

  const ends = [
    record.switchingInterval.end,
    record.txInterval.end,
    record.rxInterval.end,
  ];
  const entry = table.get(band, thresholdDbm);
  if (entry) {
    ends.push(entry.busyEnd);
  }

  return Math.max(0, ...ends.map(end => end - now));
}

/**
 * Time the band has been clear. Zero while it is still sensed busy.
 */
export function delaySinceIdle(
  record: Readonly<OccupancyRecord>,
  table: BandOccupancyTable,
  band: SpectrumBand,
  thresholdDbm: number,
  now: Time
): Time {
  const entry = table.get(band, thresholdDbm);
  const idleSince = entry ? entry.busyEnd : record.previousStateChangeTime;
  return Math.max(0, now - idleSince);
}
