import { CHIP_VARIANTS, isChipVariant, type ChipVariant } from './dac.js';
import { ConfigError } from './errors.js';
import { DECIMATE_FACTOR } from './decimator.js';

// The generators advance once per 8 master clocks; a tone period unit is two of those ticks.
export const CLOCK_DIVIDER = 8;

export const DEFAULT_VARIANT: ChipVariant = 'YM2149';

// Common master clocks, in Hz.
export const CLOCK_PRESETS = {
  amstradCpc: 1_000_000,
  atariSt: 2_000_000,
  msx: 1_789_772.5,
  oric: 1_000_000,
  zxSpectrum: 1_773_400,
} as const;

export interface PSGConfig {
  clockRate: number;
  sampleRate: number;
  variant?: ChipVariant | undefined;
}

export interface ResolvedConfig {
  readonly clockRate: number;
  readonly sampleRate: number;
  readonly variant: ChipVariant;
  // Chip ticks per oversampled frame; always in (0, 1).
  readonly step: number;
}

/** Highest master clock the resampler can follow at the given output rate (exclusive). */
export const maxClockRate = (sampleRate: number): number => sampleRate * CLOCK_DIVIDER * DECIMATE_FACTOR;

export const resolveConfig = (cfg: PSGConfig): ResolvedConfig => {
  const { clockRate, sampleRate } = cfg;
  if (typeof clockRate !== 'number' || !Number.isFinite(clockRate) || clockRate <= 0) {
    throw new ConfigError('INVALID_CLOCK_RATE', `clock rate must be a positive finite number, got ${String(clockRate)}`);
  }
  if (typeof sampleRate !== 'number' || !Number.isInteger(sampleRate) || sampleRate <= 0) {
    throw new ConfigError('INVALID_SAMPLE_RATE', `sample rate must be a positive integer, got ${String(sampleRate)}`);
  }
  const variant = cfg.variant ?? DEFAULT_VARIANT;
  if (!isChipVariant(variant)) {
    throw new ConfigError(
      'UNSUPPORTED_VARIANT',
      `unsupported chip variant ${String(variant)}, expected one of ${CHIP_VARIANTS.join(', ')}`,
    );
  }
  const step = clockRate / (sampleRate * CLOCK_DIVIDER * DECIMATE_FACTOR);
  if (!Number.isFinite(step) || step <= 0) {
    throw new ConfigError('INVALID_CLOCK_RATE', `clock rate ${clockRate} Hz is too low for ${sampleRate} Hz`);
  }
  if (step >= 1) {
    throw new ConfigError(
      'CLOCK_RATE_TOO_HIGH',
      `clock rate ${clockRate} Hz is too high for ${sampleRate} Hz (limit ${maxClockRate(sampleRate)} Hz)`,
    );
  }
  return { clockRate, sampleRate, variant, step };
};
