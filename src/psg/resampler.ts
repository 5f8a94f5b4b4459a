import {
  createDecimator,
  decimationKernel,
  designDecimationKernel,
  DECIMATE_FACTOR,
  DECIMATION_CUTOFF,
  FIR_SIZE,
  type IDecimator,
} from './decimator.js';
import { createInterpolator, type IInterpolator } from './interpolator.js';
import type { StereoFrame } from './mixer.js';

// Windows per buffer pass before the write position wraps.
const BLOCKS = FIR_SIZE / DECIMATE_FACTOR - 1;

/** Per-channel filter history: interpolator taps plus the decimator window. */
export interface ChannelResampler {
  readonly interpolator: IInterpolator;
  readonly decimator: IDecimator;
}

export interface ResamplerState {
  phase: number;
  block: number;
}

export interface IResampler {
  readonly step: number;
  readonly kernel: Float64Array;
  render: (tick: (out: StereoFrame) => void) => [number, number];
  getState: () => ResamplerState;
  reset: () => void;
}

/**
 * Low-pass cutoff in cycles per oversampled frame: the output Nyquist, or the tick-rate Nyquist
 * when the chip ticks slower than the oversampled rate can resolve.
 */
export const resamplerCutoff = (step: number): number => Math.min(DECIMATION_CUTOFF, step / 2);

/** The stored kernel at the output Nyquist; a designed one for slower clocks. */
export const resamplerKernel = (step: number): Float64Array => {
  const cutoff = resamplerCutoff(step);
  return cutoff < DECIMATION_CUTOFF ? designDecimationKernel(cutoff) : decimationKernel();
};

const createChannel = (kernel: Float64Array): ChannelResampler => ({
  interpolator: createInterpolator(),
  decimator: createDecimator(kernel),
});

/**
 * Runs the chip at its own rate against an output clock oversampled DECIMATE_FACTOR times.
 * `phase` keeps the fractional position of the oversampled clock between chip ticks across calls,
 * so the long-run tick count never drifts from clockRate / sampleRate.
 */
export const createResampler = (step: number): IResampler => {
  const kernel = resamplerKernel(step);
  const left = createChannel(kernel);
  const right = createChannel(kernel);
  const frame: StereoFrame = { left: 0, right: 0 };
  let phase = 0;
  let block = 0;

  const render = (tick: (out: StereoFrame) => void): [number, number] => {
    const start = FIR_SIZE - block * DECIMATE_FACTOR;
    block = (block + 1) % BLOCKS;

    // Newest sample goes lowest in the window.
    for (let offset = DECIMATE_FACTOR - 1; offset >= 0; offset--) {
      phase += step;
      if (phase >= 1) {
        phase -= 1;
        tick(frame);
        left.interpolator.feed(frame.left);
        right.interpolator.feed(frame.right);
      }
      left.decimator.buffer[start + offset] = left.interpolator.interpolate(phase);
      right.decimator.buffer[start + offset] = right.interpolator.interpolate(phase);
    }

    return [left.decimator.render(start), right.decimator.render(start)];
  };

  const reset = (): void => {
    phase = 0;
    block = 0;
    frame.left = 0;
    frame.right = 0;
    for (const ch of [left, right]) {
      ch.interpolator.reset();
      ch.decimator.reset();
    }
  };

  return {
    step,
    kernel,
    render,
    getState: (): ResamplerState => ({ phase, block }),
    reset,
  };
};
