import { lo, testBit, u16, u4 } from '../util/bit.js';

/**
 * One half of an envelope shape. Slides step the level once per period and hand over to the other
 * segment at their end. Holds never change the level again.
 */
export type EnvelopeSegment = 'slideDown' | 'slideUp' | 'holdTop' | 'holdBottom';

export interface EnvelopeShapeFlags {
  hold: boolean;
  alternate: boolean;
  attack: boolean;
  continue: boolean;
}

export const ENVELOPE_MAX_LEVEL = 31;

export const decodeEnvelopeShape = (shape: number): EnvelopeShapeFlags => ({
  hold: testBit(shape, 0),
  alternate: testBit(shape, 1),
  attack: testBit(shape, 2),
  continue: testBit(shape, 3),
});

// With continue clear the chip always ends at the bottom, whatever hold and alternate say.
// That is how the sixteen codes fold into eight distinct envelopes.
export const envelopeSegments = (shape: number): readonly [EnvelopeSegment, EnvelopeSegment] => {
  const f = decodeEnvelopeShape(shape);
  const first: EnvelopeSegment = f.attack ? 'slideUp' : 'slideDown';
  if (!f.continue) return [first, 'holdBottom'];
  if (f.hold) return [first, f.attack !== f.alternate ? 'holdTop' : 'holdBottom'];
  if (!f.alternate) return [first, first];
  return [first, f.attack ? 'slideDown' : 'slideUp'];
};

const SHAPE_SEGMENTS: ReadonlyArray<readonly [EnvelopeSegment, EnvelopeSegment]> = Array.from(
  { length: 16 },
  (_, shape): readonly [EnvelopeSegment, EnvelopeSegment] => envelopeSegments(shape),
);

export interface EnvelopeState {
  period: number;
  counter: number;
  shape: number;
  segment: 0 | 1;
  level: number;
}

export interface IEnvelopeGenerator {
  setPeriod: (period: number) => void;
  getPeriod: () => number;
  setPeriodFine: (value: number) => void;
  setPeriodCoarse: (value: number) => void;
  setShape: (shape: number) => void;
  getShape: () => number;
  tick: () => number;
  getLevel: () => number;
  getState: () => EnvelopeState;
  reset: () => void;
}

export const createEnvelopeGenerator = (): IEnvelopeGenerator => {
  let period = 1;
  let counter = 0;
  let shape = 0;
  let segment: 0 | 1 = 0;
  let level = 0;

  const current = (): EnvelopeSegment => SHAPE_SEGMENTS[shape]?.[segment] ?? 'holdBottom';

  const enterSegment = (): void => {
    const s = current();
    level = s === 'slideDown' || s === 'holdTop' ? ENVELOPE_MAX_LEVEL : 0;
  };

  const nextSegment = (): void => {
    segment = segment === 0 ? 1 : 0;
    enterSegment();
  };

  const setPeriod = (value: number): void => {
    period = Math.max(1, u16(value));
  };

  // Writing R13 restarts the envelope, even with an unchanged shape.
  const setShape = (value: number): void => {
    shape = u4(value);
    counter = 0;
    segment = 0;
    enterSegment();
  };

  const tick = (): number => {
    counter++;
    if (counter >= period) {
      counter = 0;
      switch (current()) {
        case 'slideDown':
          if (level === 0) nextSegment();
          else level--;
          break;
        case 'slideUp':
          if (level >= ENVELOPE_MAX_LEVEL) nextSegment();
          else level++;
          break;
        default:
          break;
      }
    }
    return level;
  };

  const reset = (): void => {
    period = 1;
    counter = 0;
    shape = 0;
    segment = 0;
    level = 0;
  };

  return {
    setPeriod,
    getPeriod: (): number => period,
    setPeriodFine: (value: number): void => setPeriod((period & 0xff00) | lo(value)),
    setPeriodCoarse: (value: number): void => setPeriod((period & 0x00ff) | (lo(value) << 8)),
    setShape,
    getShape: (): number => shape,
    tick,
    getLevel: (): number => level,
    getState: (): EnvelopeState => ({ period, counter, shape, segment, level }),
    reset,
  };
};

