import { lo, u12 } from '../util/bit.js';

export interface ToneState {
  period: number;
  counter: number;
  output: number;
}

export interface IToneGenerator {
  setPeriod: (period: number) => void;
  getPeriod: () => number;
  setPeriodFine: (value: number) => void;
  setPeriodCoarse: (value: number) => void;
  tick: () => number;
  readBit: () => number;
  getState: () => ToneState;
  reset: () => void;
}

/**
 * Square wave divider. Each tick advances the counter and the output flips whenever the counter
 * reaches the period. A period of 0 is stored as 1, so it also reads back as 1.
 */
export const createToneGenerator = (): IToneGenerator => {
  let period = 1;
  let counter = 0;
  let output = 0;

  const setPeriod = (value: number): void => {
    period = Math.max(1, u12(value));
  };

  // Fine is R0/R2/R4, coarse is the low nibble of R1/R3/R5. Each combines with the stored period,
  // so a fine 0 written while coarse is 0 leaves a 1 behind.
  const setPeriodFine = (value: number): void => setPeriod((period & 0x0f00) | lo(value));
  const setPeriodCoarse = (value: number): void => setPeriod((period & 0x00ff) | ((value & 0x0f) << 8));

  const tick = (): number => {
    counter++;
    if (counter >= period) {
      counter = 0;
      output ^= 1;
    }
    return output;
  };

  const reset = (): void => {
    period = 1;
    counter = 0;
    output = 0;
  };

  return {
    setPeriod,
    getPeriod: (): number => period,
    setPeriodFine,
    setPeriodCoarse,
    tick,
    readBit: (): number => output,
    getState: (): ToneState => ({ period, counter, output }),
    reset,
  };
};

