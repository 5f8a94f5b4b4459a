import { describe, it, expect } from 'vitest';
import { CLOCK_DIVIDER, DEFAULT_VARIANT, maxClockRate, resolveConfig } from '../../src/psg/config.js';
import { ConfigError } from '../../src/psg/errors.js';

describe('resolveConfig', (): void => {
  it('fills in the default variant', (): void => {
    expect(DEFAULT_VARIANT).toBe('YM2149');
    expect(resolveConfig({ clockRate: 2_000_000, sampleRate: 50_000 })).toEqual({
      clockRate: 2_000_000,
      sampleRate: 50_000,
      variant: 'YM2149',
      step: 0.625,
    });
  });

  it('keeps an explicit variant', (): void => {
    expect(resolveConfig({ clockRate: 1_000_000, sampleRate: 44100, variant: 'AY-3-8910' }).variant).toBe('AY-3-8910');
  });

  it('bounds the clock by the oversampled output rate', (): void => {
    expect(CLOCK_DIVIDER).toBe(8);
    expect(maxClockRate(44100)).toBe(2_822_400);
    expect(() => resolveConfig({ clockRate: 2_822_400, sampleRate: 44100 })).toThrow(ConfigError);
    expect(resolveConfig({ clockRate: 2_822_399, sampleRate: 44100 }).step).toBeLessThan(1);
  });

  it('checks the clock before the sample rate', (): void => {
    expect(() => resolveConfig({ clockRate: 0, sampleRate: 0 })).toThrow('clock rate must be a positive finite number');
  });
});
