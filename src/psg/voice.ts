import { u4 } from '../util/bit.js';
import { createToneGenerator, type IToneGenerator, type ToneState } from './tone.js';
import type { MixableVoice } from './mixer.js';

export type VoiceIndex = 0 | 1 | 2;

export const VOICE_INDICES: readonly VoiceIndex[] = [0, 1, 2];

export interface VoiceState {
  tone: ToneState;
  amplitude: number;
  envelopeEnabled: boolean;
  toneEnabled: boolean;
  noiseEnabled: boolean;
  pan: [number, number];
}

export interface IVoice extends MixableVoice {
  readonly tone: IToneGenerator;
  setPeriod: (period: number) => void;
  getPeriod: () => number;
  setAmplitude: (amplitude: number) => void;
  setEnvelopeEnabled: (enabled: boolean) => void;
  // R8-R10: bits 0-3 amplitude, bit 4 envelope enable.
  setAmplitudeRegister: (value: number) => void;
  getAmplitudeRegister: () => number;
  setToneEnabled: (enabled: boolean) => void;
  setNoiseEnabled: (enabled: boolean) => void;
  setPanning: (balance: number, equalPower?: boolean) => void;
  getPanning: () => [number, number];
  getState: () => VoiceState;
  reset: () => void;
}

const clamp01 = (v: number): number => (Number.isNaN(v) ? 0.5 : Math.max(0, Math.min(1, v)));

export const createVoice = (): IVoice => {
  const tone = createToneGenerator();
  let amplitude = 0;
  let envelopeEnabled = false;
  // Power-on: both sources gated off, which leaves the voice at its (zero) fixed amplitude.
  let toneEnabled = false;
  let noiseEnabled = false;
  let panLeft = 0.5;
  let panRight = 0.5;

  /**
   * Balance runs from 0 (hard left) to 1 (hard right). With `equalPower` the balance is taken as a
   * power ratio, so both gains are square-rooted.
   */
  const setPanning = (balance: number, equalPower = false): void => {
    const b = clamp01(balance);
    panLeft = 1 - b;
    panRight = b;
    if (equalPower) {
      panLeft = Math.sqrt(panLeft);
      panRight = Math.sqrt(panRight);
    }
  };

  const reset = (): void => {
    tone.reset();
    amplitude = 0;
    envelopeEnabled = false;
    toneEnabled = false;
    noiseEnabled = false;
    panLeft = 0.5;
    panRight = 0.5;
  };

  return {
    tone,
    setPeriod: tone.setPeriod,
    getPeriod: tone.getPeriod,
    setAmplitude: (value: number): void => {
      amplitude = u4(value);
    },
    getAmplitude: (): number => amplitude,
    setEnvelopeEnabled: (enabled: boolean): void => {
      envelopeEnabled = enabled;
    },
    isEnvelopeEnabled: (): boolean => envelopeEnabled,
    setAmplitudeRegister: (value: number): void => {
      amplitude = u4(value);
      envelopeEnabled = (value & 0x10) !== 0;
    },
    getAmplitudeRegister: (): number => (envelopeEnabled ? 0x10 : 0) | amplitude,
    setToneEnabled: (enabled: boolean): void => {
      toneEnabled = enabled;
    },
    isToneEnabled: (): boolean => toneEnabled,
    setNoiseEnabled: (enabled: boolean): void => {
      noiseEnabled = enabled;
    },
    isNoiseEnabled: (): boolean => noiseEnabled,
    readToneBit: tone.readBit,
    setPanning,
    getPanning: (): [number, number] => [panLeft, panRight],
    getPanLeft: (): number => panLeft,
    getPanRight: (): number => panRight,
    getState: (): VoiceState => ({
      tone: tone.getState(),
      amplitude,
      envelopeEnabled,
      toneEnabled,
      noiseEnabled,
      pan: [panLeft, panRight],
    }),
    reset,
  };
};
