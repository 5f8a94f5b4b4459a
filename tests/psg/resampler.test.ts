import { describe, it, expect } from 'vitest';
import { decimationKernel, designDecimationKernel } from '../../src/psg/decimator.js';
import type { StereoFrame } from '../../src/psg/mixer.js';
import { createResampler, resamplerCutoff, resamplerKernel } from '../../src/psg/resampler.js';

describe('resampler', (): void => {
  it('cuts off at the output Nyquist or the tick-rate Nyquist, whichever is lower', (): void => {
    expect(resamplerCutoff(0.634)).toBe(0.0625);
    expect(resamplerCutoff(0.05)).toBe(0.025);
  });

  it('designs its kernel when the chip ticks below twice the output Nyquist', (): void => {
    const rs = createResampler(0.05);
    expect(Array.from(rs.kernel)).toEqual(Array.from(designDecimationKernel(0.025)));
  });

  it('uses the stored kernel at the output Nyquist', (): void => {
    const stored = Array.from(decimationKernel());
    expect(Array.from(createResampler(0.634).kernel)).toEqual(stored);
    expect(Array.from(resamplerKernel(0.125))).toEqual(stored);
    expect(Array.from(resamplerKernel(0.1249))).toEqual(Array.from(designDecimationKernel(0.06245)));
  });

  it('ticks the chip step * 8 times per sample without drift', (): void => {
    const rs = createResampler(0.25);
    let ticks = 0;
    const tick = (): void => {
      ticks++;
    };
    for (let i = 0; i < 10; i++) rs.render(tick);
    expect(ticks).toBe(20);
    expect(rs.getState()).toEqual({ phase: 0, block: 10 });
  });

  it('wraps the write block after a full buffer pass', (): void => {
    const rs = createResampler(0.25);
    for (let i = 0; i < 23; i++) rs.render((): void => undefined);
    expect(rs.getState().block).toBe(0);
  });

  it('passes a constant level through at the kernel DC gain', (): void => {
    const rs = createResampler(0.25);
    const tick = (out: StereoFrame): void => {
      out.left = 0.5;
      out.right = -0.25;
    };
    let sample: [number, number] = [0, 0];
    for (let i = 0; i < 64; i++) sample = rs.render(tick);
    const gain = rs.kernel.reduce((a: number, b: number): number => a + b, 0);
    expect(Math.abs(sample[0] - 0.5 * gain)).toBeLessThan(1e-12);
    expect(Math.abs(sample[1] + 0.25 * gain)).toBeLessThan(1e-12);
  });

  it('reset returns to silence', (): void => {
    const rs = createResampler(0.25);
    for (let i = 0; i < 40; i++) {
      rs.render((out: StereoFrame): void => {
        out.left = 1;
        out.right = 1;
      });
    }
    rs.reset();
    expect(rs.getState()).toEqual({ phase: 0, block: 0 });
    expect(rs.render((): void => undefined)).toEqual([0, 0]);
  });
});
