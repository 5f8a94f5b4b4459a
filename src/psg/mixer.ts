import type { DacTable } from './dac.js';

export interface StereoFrame {
  left: number;
  right: number;
}

/** The slice of a voice the mixer reads. */
export interface MixableVoice {
  readToneBit: () => number;
  isToneEnabled: () => boolean;
  isNoiseEnabled: () => boolean;
  isEnvelopeEnabled: () => boolean;
  getAmplitude: () => number;
  getPanLeft: () => number;
  getPanRight: () => number;
}

/**
 * Digital level (0-31) of one voice. A disabled source reads as a constant 1, so a voice with both
 * sources disabled outputs its amplitude continuously. Fixed amplitudes map onto the odd 5-bit
 * levels.
 */
export const voiceLevel = (voice: MixableVoice, noiseBit: number, envelopeLevel: number): number => {
  const tone = voice.isToneEnabled() ? voice.readToneBit() : 1;
  const noise = voice.isNoiseEnabled() ? noiseBit : 1;
  const gate = tone & noise;
  return gate * (voice.isEnvelopeEnabled() ? envelopeLevel : voice.getAmplitude() * 2 + 1);
};

export const mixVoices = (
  voices: readonly MixableVoice[],
  noiseBit: number,
  envelopeLevel: number,
  dac: DacTable,
  out: StereoFrame,
): StereoFrame => {
  let left = 0;
  let right = 0;
  for (const voice of voices) {
    const amplitude = dac.lookup(voiceLevel(voice, noiseBit, envelopeLevel));
    left = left + amplitude * voice.getPanLeft();
    right = right + amplitude * voice.getPanRight();
  }
  out.left = left;
  out.right = right;
  return out;
};
