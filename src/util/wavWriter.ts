export interface IWavWriter {
  // Samples are floats, full scale at +/-1.0. Out-of-range values clip.
  pushFrame: (left: number, right: number) => void;
  finish: () => Uint8Array;
  getFrameCount: () => number;
}

export const WAV_HEADER_SIZE = 44;

export const floatToS16 = (x: number): number => {
  if (Number.isNaN(x)) return 0;
  const v = Math.round(x * 32767);
  if (v > 32767) return 32767;
  if (v < -32768) return -32768;
  return v;
};

/** Stereo 16-bit PCM WAV, built in memory. */
export const createWavWriter = (sampleRate: number): IWavWriter => {
  const sr: number = sampleRate >>> 0;
  const channels = 2;
  const blockAlign = channels * 2;
  const chunks: Int16Array[] = [];
  let current = new Int16Array(4096);
  let fill = 0;
  let frameCount = 0;

  const pushFrame = (left: number, right: number): void => {
    if (fill === current.length) {
      chunks.push(current);
      current = new Int16Array(4096);
      fill = 0;
    }
    current[fill++] = floatToS16(left);
    current[fill++] = floatToS16(right);
    frameCount++;
  };

  const finish = (): Uint8Array => {
    const dataSize = frameCount * blockAlign;
    const out = new Uint8Array(WAV_HEADER_SIZE + dataSize);
    const view = new DataView(out.buffer);
    const ascii = (off: number, s: string): void => {
      for (let i = 0; i < s.length; i++) out[off + i] = s.charCodeAt(i);
    };

    ascii(0, 'RIFF');
    view.setUint32(4, WAV_HEADER_SIZE - 8 + dataSize, true);
    ascii(8, 'WAVE');
    ascii(12, 'fmt ');
    view.setUint32(16, 16, true); // fmt chunk size
    view.setUint16(20, 1, true); // PCM
    view.setUint16(22, channels, true);
    view.setUint32(24, sr, true);
    view.setUint32(28, (sr * blockAlign) >>> 0, true);
    view.setUint16(32, blockAlign, true);
    view.setUint16(34, 16, true);
    ascii(36, 'data');
    view.setUint32(40, dataSize, true);

    let off = WAV_HEADER_SIZE;
    const write = (samples: Int16Array, count: number): void => {
      for (let i = 0; i < count; i++) {
        view.setInt16(off, samples[i] ?? 0, true);
        off += 2;
      }
    };
    for (const chunk of chunks) write(chunk, chunk.length);
    write(current, fill);
    return out;
  };

  const getFrameCount = (): number => frameCount;

  return { pushFrame, finish, getFrameCount };
};
