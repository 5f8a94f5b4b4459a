import { promises as fs } from 'fs';
import path from 'path';
import { createPSG } from '../src/psg/ay8910.js';
import { CLOCK_PRESETS } from '../src/psg/config.js';
import { isChipVariant } from '../src/psg/dac.js';
import { ConfigError } from '../src/psg/errors.js';
import { frequencyToEnvelopePeriod, frequencyToTonePeriod } from '../src/psg/math.js';
import { Reg } from '../src/psg/registers.js';
import { envNumber, envString } from '../src/util/env.js';
import { createWavWriter } from '../src/util/wavWriter.js';

interface RenderOptions {
  clockRate: number;
  sampleRate: number;
  seconds: number;
  frequency: number;
  amplitude: number;
  // R13 value; negative means fixed amplitude.
  envelopeShape: number;
  envelopeFrequency: number;
  variant: string;
  outPath: string;
}

const render = async (opts: RenderOptions): Promise<{ rms: number; peak: number; frames: number }> => {
  const variant = isChipVariant(opts.variant) ? opts.variant : undefined;
  if (variant === undefined) throw new ConfigError('UNSUPPORTED_VARIANT', `unknown variant ${opts.variant}`);
  const psg = createPSG({ clockRate: opts.clockRate, sampleRate: opts.sampleRate, variant });

  const period = frequencyToTonePeriod(opts.frequency, opts.clockRate);
  psg.writeRegister(Reg.TONE_A_FINE, period & 0xff);
  psg.writeRegister(Reg.TONE_A_COARSE, period >>> 8);
  psg.writeRegister(Reg.MIXER, 0b00111110);
  if (opts.envelopeShape >= 0) {
    const envPeriod = frequencyToEnvelopePeriod(opts.envelopeFrequency, opts.clockRate);
    psg.writeRegister(Reg.ENVELOPE_FINE, envPeriod & 0xff);
    psg.writeRegister(Reg.ENVELOPE_COARSE, envPeriod >>> 8);
    psg.writeRegister(Reg.AMPLITUDE_A, 0x10);
    psg.writeRegister(Reg.ENVELOPE_SHAPE, opts.envelopeShape);
  } else {
    psg.writeRegister(Reg.AMPLITUDE_A, opts.amplitude);
  }

  const frames = Math.floor(opts.seconds * opts.sampleRate);
  const wav = createWavWriter(opts.sampleRate);
  let sumSquares = 0;
  let peak = 0;
  for (let i = 0; i < frames; i++) {
    const [l, r] = psg.renderSample();
    wav.pushFrame(l, r);
    sumSquares += l * l;
    peak = Math.max(peak, Math.abs(l), Math.abs(r));
  }

  await fs.mkdir(path.dirname(opts.outPath), { recursive: true });
  await fs.writeFile(opts.outPath, wav.finish());
  return { rms: frames > 0 ? Math.sqrt(sumSquares / frames) : 0, peak, frames };
};

async function main(): Promise<void> {
  const ROOT = process.cwd();
  const outEnv = envString('OUT_WAV', 'out/tone.wav');
  const opts: RenderOptions = {
    clockRate: envNumber('PSG_CLOCK', CLOCK_PRESETS.msx),
    sampleRate: envNumber('SAMPLE_RATE', 44100),
    seconds: envNumber('SECONDS', 1),
    frequency: envNumber('FREQ', 440),
    amplitude: envNumber('AMPLITUDE', 15),
    envelopeShape: envNumber('ENV_SHAPE', -1),
    envelopeFrequency: envNumber('ENV_FREQ', 2),
    variant: envString('PSG_VARIANT', 'YM2149'),
    outPath: path.isAbsolute(outEnv) ? outEnv : path.join(ROOT, outEnv),
  };

  const { rms, peak, frames } = await render(opts);
  console.log(`WAV written: ${opts.outPath} (${frames} frames @ ${opts.sampleRate} Hz)`);
  console.log(`RMS=${rms.toFixed(6)} peak=${peak.toFixed(6)}`);
}

main().catch((e: unknown) => {
  if (e instanceof ConfigError) console.error(`config error (${e.code}): ${e.message}`);
  else console.error(e instanceof Error ? e.stack ?? e.message : String(e));
  process.exit(1);
});
