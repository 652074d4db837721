export * from './types.js';
export * from './errors.js';

// Band occupancy and state derivation
export * from './band-occupancy.js';
export * from './state-derivation.js';
export { BandOccupancyTable, quantizeThreshold } from './band-occupancy.js';
export { deriveState, delayUntilIdle, delaySinceIdle } from './state-derivation.js';

// Tracker and observers
export * from './phy-listeners.js';
export * from './phy-state-helper.js';
export { PhyStateHelper } from './phy-state-helper.js';
export { PhyListenerRegistry } from './phy-listeners.js';

// Configuration
export * from './phy-state-config.js';
export { PhyStateConfigFactory, PHY_STATE_PRESETS } from './phy-state-config.js';

// Channel layout and statistics
export * from './channel-bands.js';
export * from './phy-state-stats.js';
export { PhyStateStatsCollector } from './phy-state-stats.js';
