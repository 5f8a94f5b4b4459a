export { createPSG, type IPSG, type PSGState } from './psg/ay8910.js';
export {
  CLOCK_DIVIDER,
  CLOCK_PRESETS,
  DEFAULT_VARIANT,
  maxClockRate,
  resolveConfig,
  type PSGConfig,
  type ResolvedConfig,
} from './psg/config.js';
export { ConfigError, type ConfigErrorCode } from './psg/errors.js';
export {
  AY_DAC_TABLE,
  YM_DAC_TABLE,
  CHIP_VARIANTS,
  createDacTable,
  isChipVariant,
  type ChipVariant,
  type DacTable,
} from './psg/dac.js';
export { createToneGenerator, type IToneGenerator, type ToneState } from './psg/tone.js';
export { createNoiseGenerator, NOISE_LFSR_MASK, NOISE_SEED, type INoiseGenerator, type NoiseState } from './psg/noise.js';
export {
  createEnvelopeGenerator,
  decodeEnvelopeShape,
  envelopeSegments,
  ENVELOPE_MAX_LEVEL,
  type EnvelopeSegment,
  type EnvelopeShapeFlags,
  type EnvelopeState,
  type IEnvelopeGenerator,
} from './psg/envelope.js';
export { createVoice, VOICE_INDICES, type IVoice, type VoiceIndex, type VoiceState } from './psg/voice.js';
export { mixVoices, voiceLevel, type MixableVoice, type StereoFrame } from './psg/mixer.js';
export { createResampler, resamplerCutoff, resamplerKernel, type IResampler, type ResamplerState } from './psg/resampler.js';
export {
  besselI0,
  createDecimator,
  decimationKernel,
  designDecimationKernel,
  DECIMATE_FACTOR,
  DECIMATION_CUTOFF,
  FIR_SIZE,
  KAISER_BETA,
  type IDecimator,
} from './psg/decimator.js';
export { createInterpolator, type IInterpolator } from './psg/interpolator.js';
export { createDcFilter, DC_FILTER_SIZE, type IDcFilter } from './psg/dc_filter.js';
export {
  Reg,
  REGISTER_COUNT,
  REGISTER_MASKS,
  ENVELOPE_SHAPE_UNCHANGED,
  applyRegisterFrame,
  frameToWrites,
  type RegisterFrame,
  type RegisterIndex,
  type RegisterSink,
} from './psg/registers.js';
export * from './psg/math.js';
export { createWavWriter, floatToS16, WAV_HEADER_SIZE, type IWavWriter } from './util/wavWriter.js';
export { u8, u16, hi, lo, getBit } from './util/bit.js';
