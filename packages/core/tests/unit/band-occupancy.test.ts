import { describe, it, expect, beforeEach } from 'vitest';
import {
  BandOccupancyTable,
  quantizeThreshold,
  validateBand,
} from '../../src/band-occupancy.js';
import { PhyStateError } from '../../src/errors.js';
import {
  PRIMARY_20,
  SECONDARY_20,
  CHANNEL_40,
} from '../shared/fixtures/test-frames.js';

describe('quantizeThreshold', () => {
  it('should convert thresholds to resolution steps', () => {
    expect(quantizeThreshold(-82, 0.01)).toBe(-8200);
    expect(quantizeThreshold(-62.5, 0.5)).toBe(-125);
  });

  it('should map thresholds within half a step to the same key', () => {
    expect(quantizeThreshold(-82.001, 0.01)).toBe(quantizeThreshold(-82, 0.01));
    expect(quantizeThreshold(-82.3, 1)).toBe(-82);
  });

  it('should keep thresholds a full step apart distinct', () => {
    expect(quantizeThreshold(-82.01, 0.01)).not.toBe(
      quantizeThreshold(-82, 0.01)
    );
  });

  it('should fold negative zero into zero', () => {
    expect(Object.is(quantizeThreshold(-0.001, 0.01), 0)).toBe(true);
  });

  it('should reject non-finite thresholds', () => {
    expect(() => quantizeThreshold(NaN, 0.01)).toThrow(PhyStateError);
    expect(() => quantizeThreshold(-Infinity, 0.01)).toThrow(
      'CCA threshold must be finite'
    );
  });

  it('should reject a non-positive resolution', () => {
    expect(() => quantizeThreshold(-82, 0)).toThrow(
      'Threshold resolution must be positive, got 0'
    );
  });
});

describe('validateBand', () => {
  it('should accept well-formed bands', () => {
    expect(() => validateBand(PRIMARY_20, 'test')).not.toThrow();
    expect(() => validateBand({ start: 5, stop: 5 }, 'test')).not.toThrow();
  });

  it('should reject inverted, negative and fractional bands', () => {
    expect(() => validateBand({ start: 10, stop: 2 }, 'test')).toThrow(
      'Invalid spectrum band [10, 2]'
    );
    expect(() => validateBand({ start: -1, stop: 2 }, 'test')).toThrow(
      PhyStateError
    );
    expect(() => validateBand({ start: 0.5, stop: 2 }, 'test')).toThrow(
      PhyStateError
    );
  });
});

describe('BandOccupancyTable', () => {
  let table: BandOccupancyTable;

  beforeEach(() => {
    table = new BandOccupancyTable(0.01);
  });

  it('should start empty', () => {
    expect(table.size).toBe(0);
    expect(table.get(PRIMARY_20, -82)).toBeUndefined();
    expect(table.isBusy(PRIMARY_20, -82, 0)).toBe(false);
  });

  it('should reject an invalid resolution at construction', () => {
    expect(() => new BandOccupancyTable(-1)).toThrow(PhyStateError);
  });

  it('should create entries lazily on first detection', () => {
    const update = table.markBusy(PRIMARY_20, -82, 100, 50);

    expect(update).toEqual({
      extended: true,
      wasBusy: false,
      entry: {
        band: { start: 0, stop: 63 },
        thresholdStep: -8200,
        busyStart: 100,
        busyEnd: 150,
      },
    });
    expect(table.size).toBe(1);
  });

  it('should report busy only before the busy end', () => {
    table.markBusy(PRIMARY_20, -82, 0, 10);

    expect(table.isBusy(PRIMARY_20, -82, 9)).toBe(true);
    expect(table.isBusy(PRIMARY_20, -82, 10)).toBe(false);
  });

  it('should never shrink a recorded busy end', () => {
    table.markBusy(PRIMARY_20, -82, 0, 5);
    const update = table.markBusy(PRIMARY_20, -82, 1, 3);

    expect(update.extended).toBe(false);
    expect(update.wasBusy).toBe(true);
    expect(table.get(PRIMARY_20, -82)?.busyEnd).toBe(5);
  });

  it('should keep the start when extending an active interval', () => {
    table.markBusy(PRIMARY_20, -82, 0, 5);
    const update = table.markBusy(PRIMARY_20, -82, 3, 10);

    expect(update.extended).toBe(true);
    expect(update.wasBusy).toBe(true);
    expect(table.get(PRIMARY_20, -82)).toMatchObject({
      busyStart: 0,
      busyEnd: 13,
    });
  });

  it('should restart the interval once the previous one expired', () => {
    table.markBusy(PRIMARY_20, -82, 0, 5);
    const update = table.markBusy(PRIMARY_20, -82, 20, 5);

    expect(update.wasBusy).toBe(false);
    expect(table.get(PRIMARY_20, -82)).toMatchObject({
      busyStart: 20,
      busyEnd: 25,
    });
    expect(table.size).toBe(1);
  });

  it('should track bands independently', () => {
    table.markBusy(SECONDARY_20, -62, 0, 100);

    expect(table.isBusy(SECONDARY_20, -62, 50)).toBe(true);
    expect(table.isBusy(PRIMARY_20, -62, 50)).toBe(false);
    expect(table.isBusy(CHANNEL_40, -62, 50)).toBe(false);
  });

  it('should track thresholds independently on the same band', () => {
    table.markBusy(PRIMARY_20, -62, 0, 100);

    expect(table.isBusy(PRIMARY_20, -62, 10)).toBe(true);
    expect(table.isBusy(PRIMARY_20, -82, 10)).toBe(false);
  });

  it('should share an entry between thresholds in the same step', () => {
    const coarse = new BandOccupancyTable(1);
    coarse.markBusy(PRIMARY_20, -82.2, 0, 10);

    expect(coarse.isBusy(PRIMARY_20, -81.9, 5)).toBe(true);
    expect(coarse.size).toBe(1);
  });

  it('should hand out copies of entries', () => {
    table.markBusy(PRIMARY_20, -82, 0, 10);
    const entry = table.get(PRIMARY_20, -82);
    if (entry) {
      entry.busyEnd = 1000;
      entry.band.stop = 999;
    }

    expect(table.get(PRIMARY_20, -82)).toMatchObject({
      busyEnd: 10,
      band: { start: 0, stop: 63 },
    });
    expect(table.entries()).toHaveLength(1);
  });
});
