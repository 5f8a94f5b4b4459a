/** Register numbers, decimal as in the YM2149 datasheet (the AY-3-8910 sheet uses octal). */
export const Reg = {
  TONE_A_FINE: 0,
  TONE_A_COARSE: 1,
  TONE_B_FINE: 2,
  TONE_B_COARSE: 3,
  TONE_C_FINE: 4,
  TONE_C_COARSE: 5,
  NOISE_PERIOD: 6,
  MIXER: 7,
  AMPLITUDE_A: 8,
  AMPLITUDE_B: 9,
  AMPLITUDE_C: 10,
  ENVELOPE_FINE: 11,
  ENVELOPE_COARSE: 12,
  ENVELOPE_SHAPE: 13,
  IO_PORT_A: 14,
  IO_PORT_B: 15,
} as const;

export type RegisterIndex = (typeof Reg)[keyof typeof Reg];

export const REGISTER_COUNT = 16;

// Bits each register actually holds.
export const REGISTER_MASKS: readonly number[] = [
  0xff, 0x0f, 0xff, 0x0f, 0xff, 0x0f, 0x1f, 0xff,
  0x1f, 0x1f, 0x1f, 0xff, 0xff, 0x0f, 0xff, 0xff,
];

// Value written to R13 in a frame dump when the shape must not be retriggered.
export const ENVELOPE_SHAPE_UNCHANGED = 0xff;

/**
 * One frame of register values as stored by YM/PT3 style dumps: periods are already combined
 * from their fine/coarse pairs.
 */
export interface RegisterFrame {
  toneA: number;
  toneB: number;
  toneC: number;
  noise: number;
  mixer: number;
  volumeA: number;
  volumeB: number;
  volumeC: number;
  envelopePeriod: number;
  envelopeShape: number;
}

export interface RegisterSink {
  writeRegister: (index: number, value: number) => void;
}

/** Splits a frame into register writes, in register order. */
export const frameToWrites = (frame: RegisterFrame): Array<[number, number]> => {
  const writes: Array<[number, number]> = [
    [Reg.TONE_A_FINE, frame.toneA & 0xff],
    [Reg.TONE_A_COARSE, (frame.toneA >>> 8) & 0x0f],
    [Reg.TONE_B_FINE, frame.toneB & 0xff],
    [Reg.TONE_B_COARSE, (frame.toneB >>> 8) & 0x0f],
    [Reg.TONE_C_FINE, frame.toneC & 0xff],
    [Reg.TONE_C_COARSE, (frame.toneC >>> 8) & 0x0f],
    [Reg.NOISE_PERIOD, frame.noise & 0x1f],
    [Reg.MIXER, frame.mixer & 0xff],
    [Reg.AMPLITUDE_A, frame.volumeA & 0x1f],
    [Reg.AMPLITUDE_B, frame.volumeB & 0x1f],
    [Reg.AMPLITUDE_C, frame.volumeC & 0x1f],
    [Reg.ENVELOPE_FINE, frame.envelopePeriod & 0xff],
    [Reg.ENVELOPE_COARSE, (frame.envelopePeriod >>> 8) & 0xff],
  ];
  if ((frame.envelopeShape & 0xff) !== ENVELOPE_SHAPE_UNCHANGED) {
    writes.push([Reg.ENVELOPE_SHAPE, frame.envelopeShape & 0x0f]);
  }
  return writes;
};

export const applyRegisterFrame = (sink: RegisterSink, frame: RegisterFrame): void => {
  for (const [index, value] of frameToWrites(frame)) sink.writeRegister(index, value);
};
