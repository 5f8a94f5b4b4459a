import { u5 } from '../util/bit.js';

export const NOISE_LFSR_MASK = 0x1ffff;
// Aligns the Galois register with the Fibonacci sequence that starts from 1.
export const NOISE_SEED = 0x4001;
// Feedback taps at bits 16 and 13.
const NOISE_TAPS = 0x12000;

export interface NoiseState {
  period: number;
  counter: number;
  lfsr: number;
}

export interface INoiseGenerator {
  setPeriod: (period: number) => void;
  getPeriod: () => number;
  tick: () => number;
  readBit: () => number;
  getShiftRegister: () => number;
  getState: () => NoiseState;
  reset: () => void;
}

const sanitizeSeed = (seed: number): number => {
  const v = seed & NOISE_LFSR_MASK;
  return v === 0 ? NOISE_SEED : v;
};

/**
 * 17-bit LFSR shared by all voices. The register shifts once every two periods of ticks, the same
 * rate at which a tone divider with the same period would complete a full cycle.
 */
export const createNoiseGenerator = (seed: number = NOISE_SEED): INoiseGenerator => {
  const initial = sanitizeSeed(seed);
  let period = 1;
  let counter = 0;
  let lfsr = initial;

  const setPeriod = (value: number): void => {
    period = Math.max(1, u5(value));
  };

  const tick = (): number => {
    counter++;
    if (counter >= period << 1) {
      counter = 0;
      const lsb = lfsr & 1;
      lfsr = (lfsr >>> 1) ^ (lsb !== 0 ? NOISE_TAPS : 0);
    }
    return lfsr & 1;
  };

  const reset = (): void => {
    period = 1;
    counter = 0;
    lfsr = initial;
  };

  return {
    setPeriod,
    getPeriod: (): number => period,
    tick,
    readBit: (): number => lfsr & 1,
    getShiftRegister: (): number => lfsr,
    getState: (): NoiseState => ({ period, counter, lfsr }),
    reset,
  };
};
