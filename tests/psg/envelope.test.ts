import { describe, it, expect } from 'vitest';
import {
  createEnvelopeGenerator,
  decodeEnvelopeShape,
  envelopeSegments,
  type EnvelopeSegment,
} from '../../src/psg/envelope.js';

// Datasheet shapes, as [first, second] segments.
const SHAPES: Array<[EnvelopeSegment, EnvelopeSegment]> = [
  ['slideDown', 'holdBottom'],
  ['slideDown', 'holdBottom'],
  ['slideDown', 'holdBottom'],
  ['slideDown', 'holdBottom'],
  ['slideUp', 'holdBottom'],
  ['slideUp', 'holdBottom'],
  ['slideUp', 'holdBottom'],
  ['slideUp', 'holdBottom'],
  ['slideDown', 'slideDown'],
  ['slideDown', 'holdBottom'],
  ['slideDown', 'slideUp'],
  ['slideDown', 'holdTop'],
  ['slideUp', 'slideUp'],
  ['slideUp', 'holdTop'],
  ['slideUp', 'slideDown'],
  ['slideUp', 'holdBottom'],
];

const run = (shape: number, n: number, period = 1): number[] => {
  const env = createEnvelopeGenerator();
  env.setPeriod(period);
  env.setShape(shape);
  return Array.from({ length: n }, (): number => env.tick());
};

describe('envelope generator', (): void => {
  it('decodes the shape flags', (): void => {
    expect(decodeEnvelopeShape(0b1011)).toEqual({ hold: true, alternate: true, attack: false, continue: true });
    expect(decodeEnvelopeShape(0b0100)).toEqual({ hold: false, alternate: false, attack: true, continue: false });
  });

  it('maps all sixteen shapes onto their segments', (): void => {
    for (let shape = 0; shape < 16; shape++) {
      expect(envelopeSegments(shape)).toEqual(SHAPES[shape]);
    }
  });

  it('has eight distinct envelopes', (): void => {
    const distinct = new Set(SHAPES.map((_, shape): string => envelopeSegments(shape).join('/')));
    expect(distinct.size).toBe(8);
  });

  it('produces identical levels for codes that share an envelope', (): void => {
    const groups = [
      [0, 1, 2, 3, 9],
      [4, 5, 6, 7, 15],
    ];
    for (const [first, ...rest] of groups) {
      const reference = run(first!, 100, 2);
      for (const shape of rest) expect(run(shape, 100, 2)).toEqual(reference);
    }
  });

  it('powers on at level 0', (): void => {
    const env = createEnvelopeGenerator();
    expect(env.getState()).toEqual({ period: 1, counter: 0, shape: 0, segment: 0, level: 0 });
  });

  it('decays once and holds at the bottom (shape 0)', (): void => {
    const env = createEnvelopeGenerator();
    env.setShape(0);
    expect(env.getLevel()).toBe(31);
    const levels = Array.from({ length: 40 }, (): number => env.tick());
    expect(levels.slice(0, 31)).toEqual(Array.from({ length: 31 }, (_, i): number => 30 - i));
    expect(levels.slice(31)).toEqual(new Array(9).fill(0));
  });

  it('attacks once then drops to the bottom (shape 4)', (): void => {
    const levels = run(4, 40);
    expect(levels[0]).toBe(1);
    expect(levels[30]).toBe(31);
    expect(levels.slice(31)).toEqual(new Array(9).fill(0));
  });

  it('repeats the sawtooth (shape 8)', (): void => {
    const levels = run(8, 34);
    expect(levels[30]).toBe(0);
    expect(levels[31]).toBe(31);
    expect(levels[32]).toBe(30);
  });

  it('alternates direction (shape 10)', (): void => {
    const levels = run(10, 66);
    expect(levels[30]).toBe(0);
    expect(levels[31]).toBe(0);
    expect(levels[32]).toBe(1);
    expect(levels[62]).toBe(31);
    expect(levels[63]).toBe(31);
    expect(levels[64]).toBe(30);
  });

  it('holds at the top after one ramp (shapes 11 and 13)', (): void => {
    expect(run(11, 40).slice(31)).toEqual(new Array(9).fill(31));
    expect(run(13, 40).slice(30)).toEqual(new Array(10).fill(31));
  });

  it('steps once per period', (): void => {
    expect(run(0, 7, 3)).toEqual([31, 31, 30, 30, 30, 29, 29]);
  });

  it('restarts when the shape is rewritten', (): void => {
    const env = createEnvelopeGenerator();
    env.setShape(12);
    for (let i = 0; i < 10; i++) env.tick();
    expect(env.getLevel()).toBe(10);
    env.setShape(12);
    expect(env.getState()).toMatchObject({ counter: 0, segment: 0, level: 0, shape: 12 });
  });

  it('masks the shape to 4 bits', (): void => {
    const env = createEnvelopeGenerator();
    env.setShape(0x1d);
    expect(env.getShape()).toBe(0x0d);
  });

  it('combines fine and coarse period writes', (): void => {
    const env = createEnvelopeGenerator();
    env.setPeriodCoarse(0x12);
    expect(env.getPeriod()).toBe(0x1201);
    env.setPeriodFine(0x34);
    expect(env.getPeriod()).toBe(0x1234);
    env.setPeriodFine(0);
    expect(env.getPeriod()).toBe(0x1200);
  });

  it('keeps the 1 left by a zero fine write when coarse follows', (): void => {
    const env = createEnvelopeGenerator();
    env.setPeriodFine(0);
    expect(env.getPeriod()).toBe(1);
    env.setPeriodCoarse(0x12);
    expect(env.getPeriod()).toBe(0x1201);
  });

  it('stores a zero coarse write over a zero fine value as 1', (): void => {
    const env = createEnvelopeGenerator();
    env.setPeriod(0x1200);
    env.setPeriodCoarse(0);
    expect(env.getPeriod()).toBe(1);
  });

  it('treats period 0 as period 1', (): void => {
    expect(run(0, 3, 0)).toEqual(run(0, 3, 1));
  });

  it('reset restores power-on state', (): void => {
    const env = createEnvelopeGenerator();
    env.setPeriod(5);
    env.setShape(14);
    for (let i = 0; i < 50; i++) env.tick();
    env.reset();
    expect(env.getState()).toEqual({ period: 1, counter: 0, shape: 0, segment: 0, level: 0 });
  });
});
