// ==========================================
// TIME AND SPECTRUM
// ==========================================

/**
 * Simulation time in nanoseconds. Supplied by the caller's scheduler.
 */
export type Time = number;

/**
 * Inclusive range of sub-band indices that make up a frequency band
 */
export interface SpectrumBand {
  start: number;
  stop: number;
}

export type ChannelWidthMhz = 20 | 40 | 80 | 160;

// ==========================================
// RADIO STATE
// ==========================================

/**
 * Operating state of the radio. Always derived, never stored.
 */
export enum RadioState {
  IDLE = 'IDLE',
  CCA_BUSY = 'CCA_BUSY',
  TX = 'TX',
  RX = 'RX',
  SWITCHING = 'SWITCHING',
  SLEEP = 'SLEEP',
  OFF = 'OFF',
}

export interface TimeInterval {
  start: Time;
  end: Time;
}

/**
 * Raw timestamps and mode flags the state is derived from
 */
export interface OccupancyRecord {
  sleeping: boolean;
  poweredOff: boolean;
  receiving: boolean;
  txInterval: TimeInterval;
  rxInterval: TimeInterval;
  switchingInterval: TimeInterval;
  sleepStart: Time;
  previousStateChangeTime: Time;
}

export interface BusyInterval {
  busyStart: Time;
  busyEnd: Time;
}

export interface BandOccupancyEntry extends BusyInterval {
  band: SpectrumBand;
  thresholdStep: number;
}

/**
 * Result of recording a busy detection against the occupancy table
 */
export interface BusyUpdate {
  extended: boolean;
  wasBusy: boolean;
  entry: BandOccupancyEntry;
}

// ==========================================
// FRAMES AND SIGNALS
// ==========================================

export interface Packet {
  uid: number;
  size: number;
}

/**
 * Frame bundle carried by one PPDU. Aggregates hold several packets.
 */
export interface Psdu {
  packets: Packet[];
  isAggregate: boolean;
}

/**
 * PSDUs of a (possibly multi-user) PPDU keyed by station id
 */
export type PsduMap = Map<number, Psdu>;

export enum WifiPreamble {
  LONG = 'LONG',
  SHORT = 'SHORT',
  HT_MF = 'HT_MF',
  VHT_SU = 'VHT_SU',
  VHT_MU = 'VHT_MU',
  HE_SU = 'HE_SU',
  HE_MU = 'HE_MU',
}

export interface TxVector {
  mode: string;
  preamble: WifiPreamble;
  txPowerLevel: number;
  channelWidthMhz: ChannelWidthMhz;
}

export interface RxSignalInfo {
  snr: number;
  rssiDbm: number;
}

// ==========================================
// OBSERVERS
// ==========================================

/**
 * Receives a synchronous call for every transition of the radio.
 * Start notifications carry the remaining duration, not absolute times.
 */
export interface PhyListener {
  onRxStart(duration: Time): void;
  onRxEndOk(): void;
  onRxEndError(): void;
  onTxStart(duration: Time, txPowerDbm: number): void;
  onCcaBusyStart(duration: Time): void;
  onSwitchingStart(duration: Time): void;
  onSleep(): void;
  onOff(): void;
  onWakeup(): void;
  onOn(): void;
}

export type RxOkCallback = (
  psdu: Psdu,
  rxSignalInfo: RxSignalInfo,
  txVector: TxVector,
  statusPerMpdu: boolean[]
) => void;

export type RxErrorCallback = (psdu: Psdu) => void;

/**
 * Trace sources fired by the tracker. Subscribing is optional.
 */
export interface PhyStateTraceEvents {
  stateChange: (start: Time, duration: Time, state: RadioState) => void;
  rxOk: (
    packet: Packet,
    snr: number,
    mode: string,
    preamble: WifiPreamble
  ) => void;
  rxError: (packet: Packet, snr: number) => void;
  tx: (
    packet: Packet,
    mode: string,
    preamble: WifiPreamble,
    powerLevel: number
  ) => void;
}

export type PhyStateTraceName = keyof PhyStateTraceEvents;

// ==========================================
// CONFIGURATION AND STATISTICS
// ==========================================

export interface PhyStateConfig {
  thresholdResolutionDbm: number;
  logTransitions: boolean;
  defaultCcaThresholdDbm: number;
}

export interface PhyStateStats {
  timeInState: Record<RadioState, Time>;
  entriesPerState: Record<RadioState, number>;
  totalReportedTime: Time;
  packetsTransmitted: number;
  packetsReceivedOk: number;
  packetsReceivedError: number;
}
