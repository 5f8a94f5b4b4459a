// Period, frequency and MIDI pitch conversions. Pitches need not be integers.

// Master clocks per period unit for one full output cycle: a tone toggles twice per cycle at
// 8 clocks per tick, an envelope ramp takes 32 steps at 8 clocks per tick.
const TONE_DIVIDER = 16;
const ENVELOPE_DIVIDER = 256;

const toPeriod = (value: number): number => Math.min(0xffff, Math.max(0, Math.round(value)));

export const midiPitchToFrequency = (pitch: number): number => Math.pow(2, (pitch - 69) / 12) * 440;

export const frequencyToMidiPitch = (frequency: number): number => Math.log2(frequency / 440) * 12 + 69;

export const frequencyToTonePeriod = (frequency: number, clockRate: number): number =>
  toPeriod(clockRate / (TONE_DIVIDER * frequency));

export const frequencyToEnvelopePeriod = (frequency: number, clockRate: number): number =>
  toPeriod(clockRate / (ENVELOPE_DIVIDER * frequency));

export const tonePeriodToFrequency = (period: number, clockRate: number): number =>
  clockRate / (period * TONE_DIVIDER);

export const envelopePeriodToFrequency = (period: number, clockRate: number): number =>
  clockRate / (period * ENVELOPE_DIVIDER);

export const midiPitchToTonePeriod = (pitch: number, clockRate: number): number =>
  frequencyToTonePeriod(midiPitchToFrequency(pitch), clockRate);

export const midiPitchToEnvelopePeriod = (pitch: number, clockRate: number): number =>
  frequencyToEnvelopePeriod(midiPitchToFrequency(pitch), clockRate);

export const tonePeriodToMidiPitch = (period: number, clockRate: number): number =>
  frequencyToMidiPitch(tonePeriodToFrequency(period, clockRate));

export const envelopePeriodToMidiPitch = (period: number, clockRate: number): number =>
  frequencyToMidiPitch(envelopePeriodToFrequency(period, clockRate));
