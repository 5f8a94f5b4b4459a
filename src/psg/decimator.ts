import decimationTable from './decimation_kernel.json' with { type: 'json' };

export const DECIMATE_FACTOR = 8;
export const FIR_SIZE = 192;
export const KAISER_BETA = 8;

// Cutoff of the stored kernel: the output Nyquist, in cycles per oversampled frame.
export const DECIMATION_CUTOFF = decimationTable.cutoff;

/**
 * The stored 192-tap kernel, expanded from its first half (taps 1-96) by symmetry about tap 96.
 * Every call returns a fresh copy.
 */
export const decimationKernel = (): Float64Array => {
  const { taps } = decimationTable;
  const center = FIR_SIZE / 2;
  if (taps.length !== center) throw new Error(`decimation kernel needs ${center} taps, got ${taps.length}`);
  const kernel = new Float64Array(FIR_SIZE);
  taps.forEach((tap: number, i: number): void => {
    kernel[i + 1] = tap;
    kernel[FIR_SIZE - 1 - i] = tap;
  });
  return kernel;
};

// Zeroth-order modified Bessel function of the first kind, by power series.
export const besselI0 = (x: number): number => {
  const half = x / 2;
  let sum = 1;
  let term = 1;
  for (let k = 1; k < 64; k++) {
    const f = half / k;
    term *= f * f;
    sum += term;
    if (term < sum * 1e-16) break;
  }
  return sum;
};

/**
 * Kaiser-windowed sinc low-pass, symmetric about `size / 2`, normalised to unity gain at DC. Used
 * below DECIMATION_CUTOFF, where the stored kernel would pass images of the tick rate.
 * `cutoff` is in cycles per input sample (0.5 is Nyquist). Tap 0 is always zero so the remaining
 * odd number of taps is centred.
 */
export const designDecimationKernel = (
  cutoff: number,
  size: number = FIR_SIZE,
  beta: number = KAISER_BETA,
): Float64Array => {
  const kernel = new Float64Array(size);
  const center = size / 2;
  const norm = besselI0(beta);
  let sum = 0;
  for (let i = 1; i < size; i++) {
    const d = i - center;
    const t = Math.PI * 2 * cutoff * d;
    const sinc = d === 0 ? 1 : Math.sin(t) / t;
    const r = d / center;
    const w = besselI0(beta * Math.sqrt(1 - r * r)) / norm;
    const h = 2 * cutoff * sinc * w;
    kernel[i] = h;
    sum += h;
  }
  for (let i = 1; i < size; i++) kernel[i] = kernel[i]! / sum;
  return kernel;
};

export interface IDecimator {
  readonly buffer: Float64Array;
  render: (start: number) => number;
  reset: () => void;
}

/**
 * FIR filter over a sliding window of `buffer`. Callers write DECIMATE_FACTOR new samples just
 * below the previous window start and pass the new start. The newest block is mirrored to the top
 * of the window, so when the start wraps back to FIR_SIZE the history is already in place.
 */
export const createDecimator = (kernel: Float64Array): IDecimator => {
  const size = kernel.length;
  const center = size >> 1;
  const buffer = new Float64Array(size * 2);

  const render = (start: number): number => {
    // Outer pairs first, centre tap last.
    let acc = 0;
    for (let i = 1; i < center; i++) {
      acc += kernel[i]! * (buffer[start + i]! + buffer[start + size - i]!);
    }
    acc += kernel[center]! * buffer[start + center]!;
    buffer.copyWithin(start + size - DECIMATE_FACTOR, start, start + DECIMATE_FACTOR);
    return acc;
  };

  const reset = (): void => {
    buffer.fill(0);
  };

  return { buffer, render, reset };
};
