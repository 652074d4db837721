import { Logger, clamp } from '@phystate/shared';
import {
  RadioState,
  type Time,
  type PhyStateStats,
  type PhyStateTraceEvents,
} from './types.js';
import type { PhyStateHelper } from './phy-state-helper.js';

function emptyPerState(): Record<RadioState, number> {
  return {
    [RadioState.IDLE]: 0,
    [RadioState.CCA_BUSY]: 0,
    [RadioState.TX]: 0,
    [RadioState.RX]: 0,
    [RadioState.SWITCHING]: 0,
    [RadioState.SLEEP]: 0,
    [RadioState.OFF]: 0,
  };
}

/**
 * PhyStateStatsCollector - Accumulates radio time per state from the
 * tracker's trace sources.
 */
export class PhyStateStatsCollector {
  private logger = Logger.getInstance();
  private tracker?: PhyStateHelper;
  private stats: PhyStateStats = PhyStateStatsCollector.emptyStats();

  private readonly onStateChange: PhyStateTraceEvents['stateChange'] = (
    _start: Time,
    duration: Time,
    state: RadioState
  ) => {
    this.stats.timeInState[state] += duration;
    this.stats.entriesPerState[state]++;
    this.stats.totalReportedTime += duration;
  };

  private readonly onTx: PhyStateTraceEvents['tx'] = () => {
    this.stats.packetsTransmitted++;
  };

  private readonly onRxOk: PhyStateTraceEvents['rxOk'] = () => {
    this.stats.packetsReceivedOk++;
  };

  private readonly onRxError: PhyStateTraceEvents['rxError'] = () => {
    this.stats.packetsReceivedError++;
  };

  attach(tracker: PhyStateHelper): void {
    if (this.tracker) {
      this.detach();
    }
    this.tracker = tracker;
    tracker.on('stateChange', this.onStateChange);
    tracker.on('tx', this.onTx);
    tracker.on('rxOk', this.onRxOk);
    tracker.on('rxError', this.onRxError);
    this.logger.debug('PHY statistics collector attached');
  }

  detach(): void {
    if (!this.tracker) return;

    this.tracker.off('stateChange', this.onStateChange);
    this.tracker.off('tx', this.onTx);
    this.tracker.off('rxOk', this.onRxOk);
    this.tracker.off('rxError', this.onRxError);
    this.tracker = undefined;
  }

  isAttached(): boolean {
    return this.tracker !== undefined;
  }

  getStats(): PhyStateStats {
    return {
      ...this.stats,
      timeInState: { ...this.stats.timeInState },
      entriesPerState: { ...this.stats.entriesPerState },
    };
  }

  /**
   * Share of reported time the radio was not idle, in [0, 1].
   */
  getOccupancyRatio(): number {
    if (this.stats.totalReportedTime === 0) return 0;
    const idle = this.stats.timeInState[RadioState.IDLE];
    return clamp(
      (this.stats.totalReportedTime - idle) / this.stats.totalReportedTime,
      0,
      1
    );
  }

  reset(): void {
    this.stats = PhyStateStatsCollector.emptyStats();
  }

  private static emptyStats(): PhyStateStats {
    return {
      timeInState: emptyPerState(),
      entriesPerState: emptyPerState(),
      totalReportedTime: 0,
      packetsTransmitted: 0,
      packetsReceivedOk: 0,
      packetsReceivedError: 0,
    };
  }
}
