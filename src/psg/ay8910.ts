import { getBit, hi, lo, u8 } from '../util/bit.js';
import { envFlag } from '../util/env.js';
import { resolveConfig, type PSGConfig, type ResolvedConfig } from './config.js';
import { createDacTable, type ChipVariant } from './dac.js';
import { createDcFilter } from './dc_filter.js';
import { createEnvelopeGenerator, type EnvelopeState } from './envelope.js';
import { mixVoices, type StereoFrame } from './mixer.js';
import { createNoiseGenerator, type NoiseState } from './noise.js';
import { Reg, REGISTER_COUNT } from './registers.js';
import { createResampler, type ResamplerState } from './resampler.js';
import { createVoice, VOICE_INDICES, type IVoice, type VoiceIndex, type VoiceState } from './voice.js';

export interface PSGState {
  variant: ChipVariant;
  voices: [VoiceState, VoiceState, VoiceState];
  noise: NoiseState;
  envelope: EnvelopeState;
  resampler: ResamplerState;
  registers: number[];
  samplesRendered: number;
}

export interface IPSG {
  readonly config: ResolvedConfig;
  writeRegister: (index: number, value: number) => void;
  readRegister: (index: number) => number;
  getVoice: (index: VoiceIndex) => IVoice;
  setMixer: (value: number) => void;
  getMixer: () => number;
  setNoisePeriod: (period: number) => void;
  setEnvelopePeriod: (period: number) => void;
  setEnvelopeShape: (shape: number) => void;
  renderSample: () => [number, number];
  renderBlock: (left: Float32Array, right: Float32Array) => void;
  getState: () => PSGState;
  reset: () => void;
}

/**
 * AY-3-8910 / YM2149 programmable sound generator.
 *
 * Register writes take effect at the next rendered sample. Each `renderSample` call advances the
 * chip by exactly one output period and returns a band-limited, DC-free stereo pair.
 *
 * @throws ConfigError when the clock or sample rate is unusable, or the variant is unknown.
 */
export const createPSG = (cfg: PSGConfig): IPSG => {
  const config = resolveConfig(cfg);
  const dac = createDacTable(config.variant);
  const voices: [IVoice, IVoice, IVoice] = [createVoice(), createVoice(), createVoice()];
  const noise = createNoiseGenerator();
  const envelope = createEnvelopeGenerator();
  const resampler = createResampler(config.step);
  const dcFilter = createDcFilter();
  // R7 bits 6-7 select the I/O port direction. Kept for readback only.
  let ioDirection = 0;
  let samplesRendered = 0;

  const PSG_DEBUG = envFlag('PSG_DEBUG');
  let writesSinceReport = 0;
  if (PSG_DEBUG) {
    console.log(
      `PSG: ${config.variant} clock=${config.clockRate}Hz rate=${config.sampleRate}Hz step=${config.step.toFixed(6)}`,
    );
  }

  const getVoice = (index: VoiceIndex): IVoice => voices[index];
  const voiceAt = (index: number): IVoice | undefined => voices[index];

  const setMixer = (value: number): void => {
    for (const i of VOICE_INDICES) {
      voices[i].setToneEnabled(getBit(value, i) === 0);
      voices[i].setNoiseEnabled(getBit(value, i + 3) === 0);
    }
    ioDirection = value & 0xc0;
  };

  const getMixer = (): number => {
    let value = ioDirection;
    for (const i of VOICE_INDICES) {
      if (!voices[i].isToneEnabled()) value |= 1 << i;
      if (!voices[i].isNoiseEnabled()) value |= 1 << (i + 3);
    }
    return value;
  };

  const writeRegister = (index: number, value: number): void => {
    const v = u8(value);
    if (PSG_DEBUG) writesSinceReport++;
    switch (index) {
      case Reg.TONE_A_FINE:
      case Reg.TONE_B_FINE:
      case Reg.TONE_C_FINE:
        voiceAt(index >> 1)?.tone.setPeriodFine(v);
        break;
      case Reg.TONE_A_COARSE:
      case Reg.TONE_B_COARSE:
      case Reg.TONE_C_COARSE:
        voiceAt(index >> 1)?.tone.setPeriodCoarse(v);
        break;
      case Reg.NOISE_PERIOD:
        noise.setPeriod(v);
        break;
      case Reg.MIXER:
        setMixer(v);
        break;
      case Reg.AMPLITUDE_A:
      case Reg.AMPLITUDE_B:
      case Reg.AMPLITUDE_C:
        voiceAt(index - Reg.AMPLITUDE_A)?.setAmplitudeRegister(v);
        break;
      case Reg.ENVELOPE_FINE:
        envelope.setPeriodFine(v);
        break;
      case Reg.ENVELOPE_COARSE:
        envelope.setPeriodCoarse(v);
        break;
      case Reg.ENVELOPE_SHAPE:
        envelope.setShape(v);
        break;
      default:
        // I/O ports and anything above R15 are not modelled.
        break;
    }
  };

  const readRegister = (index: number): number => {
    switch (index) {
      case Reg.TONE_A_FINE:
      case Reg.TONE_B_FINE:
      case Reg.TONE_C_FINE:
        return lo(voiceAt(index >> 1)?.tone.getPeriod() ?? 0);
      case Reg.TONE_A_COARSE:
      case Reg.TONE_B_COARSE:
      case Reg.TONE_C_COARSE:
        return hi(voiceAt(index >> 1)?.tone.getPeriod() ?? 0);
      case Reg.NOISE_PERIOD:
        return noise.getPeriod();
      case Reg.MIXER:
        return getMixer();
      case Reg.AMPLITUDE_A:
      case Reg.AMPLITUDE_B:
      case Reg.AMPLITUDE_C:
        return voiceAt(index - Reg.AMPLITUDE_A)?.getAmplitudeRegister() ?? 0;
      case Reg.ENVELOPE_FINE:
        return lo(envelope.getPeriod());
      case Reg.ENVELOPE_COARSE:
        return hi(envelope.getPeriod());
      case Reg.ENVELOPE_SHAPE:
        return envelope.getShape();
      default:
        return 0;
    }
  };

  const tick = (out: StereoFrame): void => {
    const noiseBit = noise.tick();
    const envelopeLevel = envelope.tick();
    voices[0].tone.tick();
    voices[1].tone.tick();
    voices[2].tone.tick();
    mixVoices(voices, noiseBit, envelopeLevel, dac, out);
  };

  const renderSample = (): [number, number] => {
    const [left, right] = resampler.render(tick);
    samplesRendered++;
    if (PSG_DEBUG && samplesRendered % config.sampleRate === 0) {
      console.log(`PSG writes/sec: ${writesSinceReport}, mixer=0x${getMixer().toString(16)}`);
      writesSinceReport = 0;
    }
    return dcFilter.render(left, right);
  };

  const renderBlock = (left: Float32Array, right: Float32Array): void => {
    const n = Math.min(left.length, right.length);
    for (let i = 0; i < n; i++) {
      const [l, r] = renderSample();
      left[i] = l;
      right[i] = r;
    }
  };

  const getState = (): PSGState => ({
    variant: config.variant,
    voices: [voices[0].getState(), voices[1].getState(), voices[2].getState()],
    noise: noise.getState(),
    envelope: envelope.getState(),
    resampler: resampler.getState(),
    registers: Array.from({ length: REGISTER_COUNT }, (_, i): number => readRegister(i)),
    samplesRendered,
  });

  const reset = (): void => {
    for (const v of voices) v.reset();
    noise.reset();
    envelope.reset();
    resampler.reset();
    dcFilter.reset();
    ioDirection = 0;
    samplesRendered = 0;
    writesSinceReport = 0;
  };

  return {
    config,
    writeRegister,
    readRegister,
    getVoice,
    setMixer,
    getMixer,
    setNoisePeriod: noise.setPeriod,
    setEnvelopePeriod: envelope.setPeriod,
    setEnvelopeShape: envelope.setShape,
    renderSample,
    renderBlock,
    getState,
    reset,
  };
};
