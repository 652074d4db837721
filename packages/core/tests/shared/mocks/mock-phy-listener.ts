import type { PhyListener, Time } from '../../../src/types.js';

export type ListenerCall =
  | { event: 'rxStart'; duration: Time }
  | { event: 'rxEndOk' }
  | { event: 'rxEndError' }
  | { event: 'txStart'; duration: Time; txPowerDbm: number }
  | { event: 'ccaBusyStart'; duration: Time }
  | { event: 'switchingStart'; duration: Time }
  | { event: 'sleep' }
  | { event: 'off' }
  | { event: 'wakeup' }
  | { event: 'on' };

/**
 * Mock listener for unit testing
 * Records every notification in arrival order
 */
export class MockPhyListener implements PhyListener {
  private calls: ListenerCall[] = [];

  onRxStart(duration: Time): void {
    this.calls.push({ event: 'rxStart', duration });
  }

  onRxEndOk(): void {
    this.calls.push({ event: 'rxEndOk' });
  }

  onRxEndError(): void {
    this.calls.push({ event: 'rxEndError' });
  }

  onTxStart(duration: Time, txPowerDbm: number): void {
    this.calls.push({ event: 'txStart', duration, txPowerDbm });
  }

  onCcaBusyStart(duration: Time): void {
    this.calls.push({ event: 'ccaBusyStart', duration });
  }

  onSwitchingStart(duration: Time): void {
    this.calls.push({ event: 'switchingStart', duration });
  }

  onSleep(): void {
    this.calls.push({ event: 'sleep' });
  }

  onOff(): void {
    this.calls.push({ event: 'off' });
  }

  onWakeup(): void {
    this.calls.push({ event: 'wakeup' });
  }

  onOn(): void {
    this.calls.push({ event: 'on' });
  }

  // Helper methods for testing
  getCalls(): ListenerCall[] {
    return [...this.calls];
  }

  getEvents(): Array<ListenerCall['event']> {
    return this.calls.map(call => call.event);
  }

  countOf(event: ListenerCall['event']): number {
    return this.calls.filter(call => call.event === event).length;
  }

  clear(): void {
    this.calls = [];
  }
}
