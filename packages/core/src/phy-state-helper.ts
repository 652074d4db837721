import { EventEmitter } from 'events';
import { Logger, formatDuration, isNonNegativeFinite } from '@phystate/shared';
import {
  RadioState,
  type Time,
  type SpectrumBand,
  type OccupancyRecord,
  type TimeInterval,
  type Psdu,
  type PsduMap,
  type TxVector,
  type RxSignalInfo,
  type PhyListener,
  type RxOkCallback,
  type RxErrorCallback,
  type PhyStateConfig,
  type PhyStateTraceEvents,
  type PhyStateTraceName,
  type BandOccupancyEntry,
} from './types.js';
import { BandOccupancyTable, validateBand } from './band-occupancy.js';
import {
  deriveState,
  delayUntilIdle,
  delaySinceIdle,
} from './state-derivation.js';
import { PhyListenerRegistry } from './phy-listeners.js';
import { PhyStateError, type PhyStateErrorCode } from './errors.js';
import { PhyStateConfigFactory } from './phy-state-config.js';

export interface PhyStateHelper {
  on<E extends PhyStateTraceName>(
    event: E,
    listener: PhyStateTraceEvents[E]
  ): this;
  once<E extends PhyStateTraceName>(
    event: E,
    listener: PhyStateTraceEvents[E]
  ): this;
  off<E extends PhyStateTraceName>(
    event: E,
    listener: PhyStateTraceEvents[E]
  ): this;
  emit<E extends PhyStateTraceName>(
    event: E,
    ...args: Parameters<PhyStateTraceEvents[E]>
  ): boolean;
}

type ActiveIntervalKey = 'switchingInterval' | 'txInterval' | 'rxInterval';

const ACTIVE_INTERVALS: Array<{ key: ActiveIntervalKey; state: RadioState }> = [
  { key: 'switchingInterval', state: RadioState.SWITCHING },
  { key: 'txInterval', state: RadioState.TX },
  { key: 'rxInterval', state: RadioState.RX },
];

function emptyInterval(): TimeInterval {
  return { start: 0, end: 0 };
}

/**
 * PhyStateHelper - Radio occupancy tracker of a simulated wireless PHY
 *
 * Keeps the timestamps and mode flags the radio state is derived from, applies
 * transitions requested by the PHY as events happen, and fans them out to:
 * - registered PhyListeners (start durations, end of reception, power modes)
 * - trace subscribers (`stateChange`, `tx`, `rxOk`, `rxError` events)
 * - the two reception delivery callbacks
 *
 * Time is never read from a global clock: every query and transition gets the
 * current simulation time from the caller. Transitions must arrive in
 * nondecreasing time order and must not be issued from inside a notification.
 */
export class PhyStateHelper extends EventEmitter {
  private config: PhyStateConfig;
  private logger = Logger.getInstance();
  private record: OccupancyRecord = {
    sleeping: false,
    poweredOff: false,
    receiving: false,
    txInterval: emptyInterval(),
    rxInterval: emptyInterval(),
    switchingInterval: emptyInterval(),
    sleepStart: 0,
    previousStateChangeTime: 0,
  };
  private occupancy: BandOccupancyTable;
  private phyListeners = new PhyListenerRegistry();
  private rxOkCallback?: RxOkCallback;
  private rxErrorCallback?: RxErrorCallback;

  // Time up to which state durations have been reported on `stateChange`
  private traceCursor: Time = 0;
  private rxMpduCount = 0;
  private dispatchDepth = 0;
  private disposed = false;

  constructor(config: Partial<PhyStateConfig> = {}) {
    super();
    this.config = PhyStateConfigFactory.create(config);
    this.occupancy = new BandOccupancyTable(this.config.thresholdResolutionDbm);

    this.logger.info('PhyStateHelper initialized', {
      thresholdResolutionDbm: this.config.thresholdResolutionDbm,
      defaultCcaThresholdDbm: this.config.defaultCcaThresholdDbm,
    });
  }

  // ==========================================
  // Registration
  // ==========================================

  registerListener(listener: PhyListener): PhyListener {
    return this.phyListeners.register(listener);
  }

  unregisterListener(listener: PhyListener): void {
    this.phyListeners.unregister(listener);
  }

  getListenerCount(): number {
    return this.phyListeners.size;
  }

  setReceiveOkCallback(callback: RxOkCallback | undefined): void {
    this.rxOkCallback = callback;
  }

  setReceiveErrorCallback(callback: RxErrorCallback | undefined): void {
    this.rxErrorCallback = callback;
  }

  // ==========================================
  // Queries
  // ==========================================

  getState(
    now: Time,
    band: SpectrumBand,
    thresholdDbm: number = this.config.defaultCcaThresholdDbm
  ): RadioState {
    this.validateTime(now, 'getState');
    validateBand(band, 'getState');
    return deriveState(this.record, this.occupancy, band, thresholdDbm, now);
  }

  isStateIdle(now: Time, band: SpectrumBand, thresholdDbm?: number): boolean {
    return this.getState(now, band, thresholdDbm) === RadioState.IDLE;
  }

  isStateCcaBusy(now: Time, band: SpectrumBand, thresholdDbm?: number): boolean {
    return this.getState(now, band, thresholdDbm) === RadioState.CCA_BUSY;
  }

  isStateTx(now: Time, band: SpectrumBand, thresholdDbm?: number): boolean {
    return this.getState(now, band, thresholdDbm) === RadioState.TX;
  }

  isStateRx(now: Time, band: SpectrumBand, thresholdDbm?: number): boolean {
    return this.getState(now, band, thresholdDbm) === RadioState.RX;
  }

  isStateSwitching(
    now: Time,
    band: SpectrumBand,
    thresholdDbm?: number
  ): boolean {
    return this.getState(now, band, thresholdDbm) === RadioState.SWITCHING;
  }

  isStateSleep(now: Time, band: SpectrumBand, thresholdDbm?: number): boolean {
    return this.getState(now, band, thresholdDbm) === RadioState.SLEEP;
  }

  isStateOff(now: Time, band: SpectrumBand, thresholdDbm?: number): boolean {
    return this.getState(now, band, thresholdDbm) === RadioState.OFF;
  }

  /**
   * Time left before the band is idle. Throws while asleep or off, since
   * neither has a scheduled end.
   */
  getDelayUntilIdle(
    now: Time,
    band: SpectrumBand,
    thresholdDbm: number = this.config.defaultCcaThresholdDbm
  ): Time {
    this.validateTime(now, 'getDelayUntilIdle');
    validateBand(band, 'getDelayUntilIdle');
    try {
      return delayUntilIdle(
        this.record,
        this.occupancy,
        band,
        thresholdDbm,
        now
      );
    } catch (error) {
      if (error instanceof PhyStateError) {
        this.logger.error(error.message, { operation: error.operation });
      }
      throw error;
    }
  }

  /**
   * How long the band has been clear, for backoff-style callers.
   */
  getDelaySinceIdle(
    now: Time,
    band: SpectrumBand,
    thresholdDbm: number = this.config.defaultCcaThresholdDbm
  ): Time {
    this.validateTime(now, 'getDelaySinceIdle');
    validateBand(band, 'getDelaySinceIdle');
    return delaySinceIdle(this.record, this.occupancy, band, thresholdDbm, now);
  }

  /**
   * Start of the latest reception, kept after the reception ends.
   */
  getLastRxStartTime(): Time {
    return this.record.rxInterval.start;
  }

  /**
   * Number of aggregate sub-frames continued during the current (or last)
   * reception.
   */
  getRxMpduCount(): number {
    return this.rxMpduCount;
  }

  isReceiving(): boolean {
    return this.record.receiving;
  }

  getOccupancySnapshot(): OccupancyRecord {
    return {
      ...this.record,
      txInterval: { ...this.record.txInterval },
      rxInterval: { ...this.record.rxInterval },
      switchingInterval: { ...this.record.switchingInterval },
    };
  }

  getBusyEntries(): BandOccupancyEntry[] {
    return this.occupancy.entries();
  }

  // ==========================================
  // Transitions
  // ==========================================

  switchToTx(
    now: Time,
    txDuration: Time,
    psdus: PsduMap,
    txPowerDbm: number,
    txVector: TxVector,
    primaryBand: SpectrumBand,
    primaryThresholdDbm: number = this.config.defaultCcaThresholdDbm
  ): void {
    const operation = 'switchToTx';
    this.beginTransition(operation, now, primaryBand);
    this.validateDuration(txDuration, operation);
    if (psdus.size === 0) {
      this.fail('At least one PSDU is required', 'INVALID_ARGUMENT', operation);
    }
    if (!Number.isFinite(txPowerDbm)) {
      this.fail(
        `Transmit power must be finite, got ${txPowerDbm}`,
        'INVALID_ARGUMENT',
        operation
      );
    }
    this.rejectStates(operation, now, primaryBand, primaryThresholdDbm, [
      RadioState.OFF,
      RadioState.SLEEP,
      RadioState.RX,
      RadioState.SWITCHING,
    ]);

    this.reportStatesUntil(now, primaryBand, primaryThresholdDbm);
    this.record.txInterval = { start: now, end: now + txDuration };
    // Any earlier reception has run out by now and can no longer be ended
    this.record.receiving = false;
    this.record.previousStateChangeTime = now;
    this.logTransition(operation, now, txDuration);

    this.dispatch(() => {
      for (const psdu of psdus.values()) {
        for (const packet of psdu.packets) {
          this.emit(
            'tx',
            packet,
            txVector.mode,
            txVector.preamble,
            txVector.txPowerLevel
          );
        }
      }
      this.phyListeners.notify(listener =>
        listener.onTxStart(txDuration, txPowerDbm)
      );
    });
  }

  switchToRx(
    now: Time,
    rxDuration: Time,
    primaryBand: SpectrumBand,
    primaryThresholdDbm: number = this.config.defaultCcaThresholdDbm
  ): void {
    const operation = 'switchToRx';
    this.beginTransition(operation, now, primaryBand);
    this.validateDuration(rxDuration, operation);
    this.requireState(operation, now, primaryBand, primaryThresholdDbm, [
      RadioState.IDLE,
      RadioState.CCA_BUSY,
    ]);

    this.reportStatesUntil(now, primaryBand, primaryThresholdDbm);
    this.record.rxInterval = { start: now, end: now + rxDuration };
    this.record.receiving = true;
    this.record.previousStateChangeTime = now;
    this.rxMpduCount = 0;
    this.logTransition(operation, now, rxDuration);

    this.dispatch(() => {
      this.phyListeners.notify(listener => listener.onRxStart(rxDuration));
    });
  }

  switchToChannelSwitching(
    now: Time,
    switchingDuration: Time,
    primaryBand: SpectrumBand,
    primaryThresholdDbm: number = this.config.defaultCcaThresholdDbm
  ): void {
    const operation = 'switchToChannelSwitching';
    this.beginTransition(operation, now, primaryBand);
    this.validateDuration(switchingDuration, operation);
    this.rejectStates(operation, now, primaryBand, primaryThresholdDbm, [
      RadioState.OFF,
      RadioState.SLEEP,
    ]);

    this.reportStatesUntil(now, primaryBand, primaryThresholdDbm);
    this.record.switchingInterval = {
      start: now,
      end: now + switchingDuration,
    };
    this.record.previousStateChangeTime = now;
    this.logTransition(operation, now, switchingDuration);

    this.dispatch(() => {
      this.phyListeners.notify(listener =>
        listener.onSwitchingStart(switchingDuration)
      );
    });
  }

  /**
   * Records that one sub-frame of an aggregate was decoded while the
   * reception goes on. Nothing is delivered until the reception ends.
   */
  continueRxNextMpdu(
    now: Time,
    psdu: Psdu,
    rxSignalInfo: RxSignalInfo,
    txVector: TxVector
  ): void {
    const operation = 'continueRxNextMpdu';
    this.beginTransition(operation, now);
    if (!this.isReceptionOpen(now) || now >= this.record.rxInterval.end) {
      this.fail(
        'No reception in progress to continue',
        'PRECONDITION_VIOLATION',
        operation,
        this.stateAtRecord(now)
      );
    }

    this.rxMpduCount++;
    if (this.config.logTransitions) {
      this.logger.debug('Continuing aggregate reception', {
        now,
        mpdu: this.rxMpduCount,
        packets: psdu.packets.length,
        snr: rxSignalInfo.snr,
        mode: txVector.mode,
      });
    }
  }

  switchFromRxEndOk(
    now: Time,
    psdu: Psdu,
    rxSignalInfo: RxSignalInfo,
    txVector: TxVector,
    staId: number,
    statusPerMpdu: boolean[]
  ): void {
    const operation = 'switchFromRxEndOk';
    this.beginTransition(operation, now);
    if (statusPerMpdu.length !== psdu.packets.length) {
      this.fail(
        `Expected ${psdu.packets.length} MPDU statuses, got ${statusPerMpdu.length}`,
        'INVALID_ARGUMENT',
        operation
      );
    }
    this.requireReceiving(operation, now);

    this.closeReception(now);
    this.logTransition(operation, now, undefined, { staId });

    const okCallback = this.rxOkCallback;
    this.dispatch(() => {
      this.phyListeners.notify(listener => listener.onRxEndOk());
      psdu.packets.forEach((packet, index) => {
        if (statusPerMpdu[index]) {
          this.emit(
            'rxOk',
            packet,
            rxSignalInfo.snr,
            txVector.mode,
            txVector.preamble
          );
        }
      });
      okCallback?.(psdu, rxSignalInfo, txVector, [...statusPerMpdu]);
    });
  }

  switchFromRxEndError(now: Time, psdu: Psdu, snr: number): void {
    const operation = 'switchFromRxEndError';
    this.beginTransition(operation, now);
    this.requireReceiving(operation, now);

    this.closeReception(now);
    this.logTransition(operation, now, undefined, { snr });

    const errorCallback = this.rxErrorCallback;
    this.dispatch(() => {
      this.phyListeners.notify(listener => listener.onRxEndError());
      for (const packet of psdu.packets) {
        this.emit('rxError', packet, snr);
      }
      errorCallback?.(psdu);
    });
  }

  /**
   * Drops the current reception without delivering anything.
   */
  switchFromRxAbort(now: Time, failure: boolean): void {
    const operation = 'switchFromRxAbort';
    this.beginTransition(operation, now);
    this.requireReceiving(operation, now);

    this.closeReception(now);
    this.logTransition(operation, now, undefined, { failure });

    if (failure) {
      this.dispatch(() => {
        this.phyListeners.notify(listener => listener.onRxEndError());
      });
    }
  }

  /**
   * Records energy detected on `band`. The busy end of that band only ever
   * moves forward, and listeners hear about it only when the primary band
   * goes from clear to busy.
   */
  switchMaybeToCcaBusy(
    now: Time,
    duration: Time,
    band: SpectrumBand,
    isPrimaryChannel: boolean,
    thresholdDbm: number = this.config.defaultCcaThresholdDbm
  ): void {
    const operation = 'switchMaybeToCcaBusy';
    this.beginTransition(operation, now, band);
    this.validateDuration(duration, operation);
    this.rejectStates(operation, now, band, thresholdDbm, [RadioState.OFF]);

    if (isPrimaryChannel) {
      this.reportStatesUntil(now, band, thresholdDbm);
    }
    this.markBusyAndNotify(now, duration, band, isPrimaryChannel, thresholdDbm);
    this.record.previousStateChangeTime = now;
  }

  switchToSleep(
    now: Time,
    primaryBand: SpectrumBand,
    primaryThresholdDbm: number = this.config.defaultCcaThresholdDbm
  ): void {
    const operation = 'switchToSleep';
    this.beginTransition(operation, now, primaryBand);
    this.rejectStates(operation, now, primaryBand, primaryThresholdDbm, [
      RadioState.OFF,
    ]);

    this.reportStatesUntil(now, primaryBand, primaryThresholdDbm);
    if (!this.record.sleeping) {
      this.record.sleepStart = now;
    }
    this.record.sleeping = true;
    this.record.previousStateChangeTime = now;
    this.logTransition(operation, now);

    this.dispatch(() => {
      this.phyListeners.notify(listener => listener.onSleep());
    });
  }

  switchFromSleep(
    now: Time,
    duration: Time,
    band: SpectrumBand,
    isPrimaryChannel: boolean,
    thresholdDbm: number = this.config.defaultCcaThresholdDbm
  ): void {
    const operation = 'switchFromSleep';
    this.beginTransition(operation, now, band);
    this.validateDuration(duration, operation);
    this.requireState(operation, now, band, thresholdDbm, [RadioState.SLEEP]);

    this.reportStatesUntil(now, band, thresholdDbm);
    this.record.sleeping = false;
    this.record.previousStateChangeTime = now;
    this.logTransition(operation, now, duration, {
      slept: now - this.record.sleepStart,
    });

    this.dispatch(() => {
      this.phyListeners.notify(listener => listener.onWakeup());
    });
    if (duration > 0) {
      this.markBusyAndNotify(now, duration, band, isPrimaryChannel, thresholdDbm);
    }
  }

  switchToOff(
    now: Time,
    primaryBand: SpectrumBand,
    primaryThresholdDbm: number = this.config.defaultCcaThresholdDbm
  ): void {
    const operation = 'switchToOff';
    this.beginTransition(operation, now, primaryBand);

    this.reportStatesUntil(now, primaryBand, primaryThresholdDbm);
    if (!this.record.poweredOff) {
      this.record.sleepStart = now;
    }
    this.record.sleeping = false;
    this.record.poweredOff = true;
    this.record.previousStateChangeTime = now;
    this.logTransition(operation, now);

    this.dispatch(() => {
      this.phyListeners.notify(listener => listener.onOff());
    });
  }

  switchFromOff(
    now: Time,
    duration: Time,
    band: SpectrumBand,
    isPrimaryChannel: boolean,
    thresholdDbm: number = this.config.defaultCcaThresholdDbm
  ): void {
    const operation = 'switchFromOff';
    this.beginTransition(operation, now, band);
    this.validateDuration(duration, operation);
    this.requireState(operation, now, band, thresholdDbm, [RadioState.OFF]);

    this.reportStatesUntil(now, band, thresholdDbm);
    this.record.poweredOff = false;
    this.record.previousStateChangeTime = now;
    this.logTransition(operation, now, duration, {
      off: now - this.record.sleepStart,
    });

    this.dispatch(() => {
      this.phyListeners.notify(listener => listener.onOn());
    });
    if (duration > 0) {
      this.markBusyAndNotify(now, duration, band, isPrimaryChannel, thresholdDbm);
    }
  }

  /**
   * Reports the states elapsed since the last transition without changing
   * anything, e.g. at the end of a run so trace consumers see the tail.
   */
  flushStateTrace(
    now: Time,
    primaryBand: SpectrumBand,
    primaryThresholdDbm: number = this.config.defaultCcaThresholdDbm
  ): void {
    this.beginTransition('flushStateTrace', now, primaryBand);
    this.reportStatesUntil(now, primaryBand, primaryThresholdDbm);
  }

  dispose(): void {
    if (this.disposed) return;

    this.phyListeners.clear();
    this.rxOkCallback = undefined;
    this.rxErrorCallback = undefined;
    this.removeAllListeners();
    this.disposed = true;

    this.logger.info('PhyStateHelper disposed');
  }

  // ==========================================
  // Private helpers
  // ==========================================

  private beginTransition(
    operation: string,
    now: Time,
    band?: SpectrumBand
  ): void {
    if (this.disposed) {
      this.fail(
        'Tracker has been disposed',
        'PRECONDITION_VIOLATION',
        operation
      );
    }
    if (this.dispatchDepth > 0) {
      this.fail(
        'Transition requested while notifying observers',
        'REENTRANT_TRANSITION',
        operation
      );
    }
    this.validateTime(now, operation);
    const lastRecorded = Math.max(
      this.record.previousStateChangeTime,
      this.traceCursor
    );
    if (now < lastRecorded) {
      this.fail(
        `Time went backwards: ${now} < ${lastRecorded}`,
        'NON_MONOTONIC_TIME',
        operation
      );
    }
    if (band) {
      validateBand(band, operation);
    }
  }

  private validateTime(now: Time, operation: string): void {
    if (!isNonNegativeFinite(now)) {
      this.fail(
        `Invalid simulation time: ${now}`,
        'INVALID_ARGUMENT',
        operation
      );
    }
  }

  private validateDuration(duration: Time, operation: string): void {
    if (!isNonNegativeFinite(duration)) {
      this.fail(`Invalid duration: ${duration}`, 'INVALID_ARGUMENT', operation);
    }
  }

  private requireState(
    operation: string,
    now: Time,
    band: SpectrumBand,
    thresholdDbm: number,
    allowed: RadioState[]
  ): void {
    const state = deriveState(
      this.record,
      this.occupancy,
      band,
      thresholdDbm,
      now
    );
    if (!allowed.includes(state)) {
      this.fail(
        `Cannot ${operation} while ${state} (expected ${allowed.join(' or ')})`,
        'PRECONDITION_VIOLATION',
        operation,
        state
      );
    }
  }

  private rejectStates(
    operation: string,
    now: Time,
    band: SpectrumBand,
    thresholdDbm: number,
    rejected: RadioState[]
  ): void {
    const state = deriveState(
      this.record,
      this.occupancy,
      band,
      thresholdDbm,
      now
    );
    if (rejected.includes(state)) {
      this.fail(
        `Cannot ${operation} while ${state}`,
        'PRECONDITION_VIOLATION',
        operation,
        state
      );
    }
  }

  private requireReceiving(operation: string, now: Time): void {
    if (!this.isReceptionOpen(now)) {
      this.fail(
        `Cannot ${operation} without a reception in progress`,
        'PRECONDITION_VIOLATION',
        operation,
        this.stateAtRecord(now)
      );
    }
  }

  /**
   * A reception can be continued or ended only while it is the radio's own
   * state, up to and including its scheduled end. Switching, sleep or off
   * mask it without closing it.
   */
  private isReceptionOpen(now: Time): boolean {
    if (!this.record.receiving || now > this.record.rxInterval.end) {
      return false;
    }
    const state = this.stateAtRecord(now);
    return state === RadioState.RX || state === RadioState.IDLE;
  }

  /**
   * State ignoring band occupancy, for diagnostics of band-less operations.
   */
  private stateAtRecord(now: Time): RadioState {
    const { poweredOff, sleeping } = this.record;
    if (poweredOff) return RadioState.OFF;
    if (sleeping) return RadioState.SLEEP;
    for (const { key, state } of ACTIVE_INTERVALS) {
      if (now < this.record[key].end) return state;
    }
    return RadioState.IDLE;
  }

  private closeReception(now: Time): void {
    this.reportOwnInterval(now);
    this.record.rxInterval.end = now;
    this.record.receiving = false;
    this.record.previousStateChangeTime = now;
  }

  private markBusyAndNotify(
    now: Time,
    duration: Time,
    band: SpectrumBand,
    isPrimaryChannel: boolean,
    thresholdDbm: number
  ): void {
    const update = this.occupancy.markBusy(band, thresholdDbm, now, duration);
    if (this.config.logTransitions) {
      this.logger.debug('CCA busy recorded', {
        now,
        band: `${band.start}-${band.stop}`,
        thresholdDbm,
        busyEnd: update.entry.busyEnd,
        extended: update.extended,
      });
    }

    const remaining = update.entry.busyEnd - now;
    if (isPrimaryChannel && update.extended && !update.wasBusy && remaining > 0) {
      this.dispatch(() => {
        this.phyListeners.notify(listener => listener.onCcaBusyStart(remaining));
      });
    }
  }

  /**
   * Reports, on `stateChange`, every state the radio went through between the
   * trace cursor and `now` on the given band, then moves the cursor to `now`.
   * Own intervals are reported as they ran, then CCA busy, then idle.
   */
  private reportStatesUntil(
    now: Time,
    band: SpectrumBand,
    thresholdDbm: number
  ): void {
    if (this.traceCursor >= now) return;

    if (this.record.poweredOff || this.record.sleeping) {
      const state = this.record.poweredOff ? RadioState.OFF : RadioState.SLEEP;
      this.reportState(this.traceCursor, now, state);
      this.traceCursor = now;
      return;
    }

    let t = this.reportOwnInterval(now);

    const entry = this.occupancy.get(band, thresholdDbm);
    if (entry && entry.busyEnd > t && entry.busyStart < now) {
      const busyStart = Math.max(t, entry.busyStart);
      const busyEnd = Math.min(entry.busyEnd, now);
      this.reportState(t, busyStart, RadioState.IDLE);
      this.reportState(busyStart, busyEnd, RadioState.CCA_BUSY);
      t = busyEnd;
    }

    this.reportState(t, now, RadioState.IDLE);
    this.traceCursor = now;
  }

  /**
   * Reports the running Tx/Rx/switching intervals up to `now`, highest
   * precedence first, and returns the time reporting has reached. A masked
   * interval that outlives the one masking it is reported from there on.
   */
  private reportOwnInterval(now: Time): Time {
    let t = this.traceCursor;
    let advanced = true;
    while (advanced && t < now) {
      advanced = false;
      for (const { key, state } of ACTIVE_INTERVALS) {
        const interval = this.record[key];
        if (interval.end > t && interval.start <= t) {
          const end = Math.min(interval.end, now);
          this.reportState(t, end, state);
          this.traceCursor = end;
          t = end;
          advanced = true;
          break;
        }
      }
    }
    return t;
  }

  private reportState(start: Time, end: Time, state: RadioState): void {
    if (end <= start) return;
    this.dispatch(() => {
      this.emit('stateChange', start, end - start, state);
    });
  }

  private dispatch(fn: () => void): void {
    this.dispatchDepth++;
    try {
      fn();
    } finally {
      this.dispatchDepth--;
    }
  }

  private logTransition(
    operation: string,
    now: Time,
    duration?: Time,
    context: Record<string, unknown> = {}
  ): void {
    if (!this.config.logTransitions) return;
    const suffix =
      duration === undefined ? '' : ` for ${formatDuration(duration)}`;
    this.logger.debug(`PHY ${operation} at ${now}${suffix}`, context);
  }

  private fail(
    message: string,
    code: PhyStateErrorCode,
    operation: string,
    currentState?: RadioState
  ): never {
    this.logger.error(`PHY state error in ${operation}: ${message}`, {
      code,
      currentState,
    });
    throw new PhyStateError(message, code, operation, currentState);
  }
}
