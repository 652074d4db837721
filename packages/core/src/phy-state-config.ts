import { type PhyStateConfig } from './types.js';

/**
 * Configuration presets for the PHY state tracker
 *
 * - default: 0.01 dB threshold resolution, quiet logging
 * - debug: logs every transition at DEBUG level
 * - coarse: 1 dB resolution, so thresholds differing by less share a busy entry
 */

const DEFAULT_CONFIG: PhyStateConfig = {
  thresholdResolutionDbm: 0.01,
  logTransitions: false,
  // Preamble detection sensitivity for a 20 MHz primary channel
  defaultCcaThresholdDbm: -82,
};

export const PHY_STATE_PRESETS: Record<string, Partial<PhyStateConfig>> = {
  default: {},
  debug: {
    logTransitions: true,
  },
  coarse: {
    thresholdResolutionDbm: 1,
  },
};

export class PhyStateConfigFactory {
  static create(overrides: Partial<PhyStateConfig> = {}): PhyStateConfig {
    const config: PhyStateConfig = { ...DEFAULT_CONFIG, ...overrides };
    PhyStateConfigFactory.validate(config);
    return config;
  }

  static createFromPreset(
    preset: string,
    overrides: Partial<PhyStateConfig> = {}
  ): PhyStateConfig {
    const presetConfig = PHY_STATE_PRESETS[preset];
    if (!presetConfig) {
      throw new Error(`Unknown PHY state preset: ${preset}`);
    }
    return PhyStateConfigFactory.create({ ...presetConfig, ...overrides });
  }

  static getAvailablePresets(): string[] {
    return Object.keys(PHY_STATE_PRESETS);
  }

  static validate(config: PhyStateConfig): void {
    const errors: string[] = [];

    if (
      !Number.isFinite(config.thresholdResolutionDbm) ||
      config.thresholdResolutionDbm <= 0
    ) {
      errors.push('thresholdResolutionDbm must be a positive number');
    }
    if (!Number.isFinite(config.defaultCcaThresholdDbm)) {
      errors.push('defaultCcaThresholdDbm must be finite');
    }

    if (errors.length > 0) {
      throw new Error(`Invalid PHY state configuration: ${errors.join(', ')}`);
    }
  }
}
