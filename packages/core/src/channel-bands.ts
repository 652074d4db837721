import type { ChannelWidthMhz, SpectrumBand } from './types.js';
import { PhyStateError } from './errors.js';

/**
 * Sub-band layout of wide channels
 *
 * A channel is split into sub-bands of one subcarrier spacing each. Busy
 * tracking keys on the index range of a segment, so the primary 20 MHz and
 * the wider channel it belongs to are independent entries.
 */

export const CHANNEL_WIDTHS_MHZ: readonly ChannelWidthMhz[] = [20, 40, 80, 160];

// OFDM subcarrier spacing of 802.11a/n/ac
export const DEFAULT_SUBCARRIER_SPACING_HZ = 312_500;

export function isChannelWidth(width: number): width is ChannelWidthMhz {
  return CHANNEL_WIDTHS_MHZ.some(allowed => allowed === width);
}

/**
 * Band covering the `bandIndex`-th segment of `bandWidthMhz` inside a channel
 * of `channelWidthMhz`.
 */
export function getBand(
  channelWidthMhz: number,
  bandWidthMhz: number,
  bandIndex: number,
  subcarrierSpacingHz: number = DEFAULT_SUBCARRIER_SPACING_HZ
): SpectrumBand {
  if (!isChannelWidth(channelWidthMhz) || !isChannelWidth(bandWidthMhz)) {
    throw new PhyStateError(
      `Unsupported width: channel ${channelWidthMhz} MHz, band ${bandWidthMhz} MHz`,
      'INVALID_ARGUMENT',
      'getBand'
    );
  }
  if (!Number.isInteger(bandIndex) || bandIndex < 0) {
    throw new PhyStateError(
      `Invalid band index ${bandIndex}`,
      'INVALID_ARGUMENT',
      'getBand'
    );
  }
  if ((bandIndex + 1) * bandWidthMhz > channelWidthMhz) {
    throw new PhyStateError(
      `Band ${bandIndex} of ${bandWidthMhz} MHz does not fit a ${channelWidthMhz} MHz channel`,
      'INVALID_ARGUMENT',
      'getBand'
    );
  }

  const bandsPerSegment = (bandWidthMhz * 1e6) / subcarrierSpacingHz;
  if (!Number.isInteger(bandsPerSegment) || bandsPerSegment < 1) {
    throw new PhyStateError(
      `Subcarrier spacing ${subcarrierSpacingHz} Hz does not divide ${bandWidthMhz} MHz`,
      'INVALID_ARGUMENT',
      'getBand'
    );
  }

  const start = bandIndex * bandsPerSegment;
  return { start, stop: start + bandsPerSegment - 1 };
}

export function getPrimaryBand(
  channelWidthMhz: number,
  primaryIndex: number = 0,
  subcarrierSpacingHz: number = DEFAULT_SUBCARRIER_SPACING_HZ
): SpectrumBand {
  return getBand(channelWidthMhz, 20, primaryIndex, subcarrierSpacingHz);
}

/**
 * All segments of `bandWidthMhz` in the channel, lowest frequency first.
 */
export function getBandsOfWidth(
  channelWidthMhz: number,
  bandWidthMhz: number,
  subcarrierSpacingHz: number = DEFAULT_SUBCARRIER_SPACING_HZ
): SpectrumBand[] {
  const count = Math.floor(channelWidthMhz / bandWidthMhz);
  return Array.from({ length: count }, (_, index) =>
    getBand(channelWidthMhz, bandWidthMhz, index, subcarrierSpacingHz)
  );
}

export function bandsEqual(a: SpectrumBand, b: SpectrumBand): boolean {
  return a.start === b.start && a.stop === b.stop;
}
