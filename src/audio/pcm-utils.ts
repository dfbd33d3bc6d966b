/**
 * PCM utilities (mono, signed 16-bit little-endian).
 *
 * Narration audio has one fixed format end to end; these helpers frame it, nothing more.
 */

export const NARRATION_SAMPLE_RATE_HZ = 22050;
export const NARRATION_CHANNELS = 1;
export const NARRATION_BIT_DEPTH = 16;
export const PCM_BYTES_PER_SAMPLE = 2;

export function assertS16leMonoPcm(buffer: Buffer, label: string): void {
  if (buffer.length % PCM_BYTES_PER_SAMPLE !== 0) {
    throw new Error(`${label}: PCM length ${buffer.length} is not a whole number of 16-bit samples`);
  }
}

/** Number of whole samples in `ms` milliseconds at `sampleRateHz` (rounded down). */
export function samplesForMs(ms: number, sampleRateHz: number = NARRATION_SAMPLE_RATE_HZ): number {
  return Math.floor((ms * sampleRateHz) / 1000);
}

export function durationMsForSamples(samples: number, sampleRateHz: number = NARRATION_SAMPLE_RATE_HZ): number {
  return (samples * 1000) / sampleRateHz;
}

/** All-zero PCM lasting `ms` milliseconds. */
export function silencePcm(ms: number, sampleRateHz: number = NARRATION_SAMPLE_RATE_HZ): Buffer {
  return Buffer.alloc(samplesForMs(ms, sampleRateHz) * PCM_BYTES_PER_SAMPLE);
}

/** Sine tone, mono s16le. Amplitude is a 0..1 fraction of full scale. */
export function tonePcm(
  ms: number,
  frequencyHz: number,
  amplitude = 0.2,
  sampleRateHz: number = NARRATION_SAMPLE_RATE_HZ
): Buffer {
  const samples = samplesForMs(ms, sampleRateHz);
  const out = Buffer.alloc(samples * PCM_BYTES_PER_SAMPLE);
  const peak = Math.round(32767 * Math.min(Math.max(amplitude, 0), 1));
  for (let i = 0; i < samples; i++) {
    out.writeInt16LE(Math.round(peak * Math.sin((2 * Math.PI * frequencyHz * i) / sampleRateHz)), i * PCM_BYTES_PER_SAMPLE);
  }
  return out;
}

/**
 * Resample mono s16le PCM using linear interpolation.
 * Used only when a voice model runs at a rate other than the narration rate.
 */
export function resampleS16leMonoLinear(pcm: Buffer, fromRateHz: number, toRateHz: number): Buffer {
  assertS16leMonoPcm(pcm, "resampleS16leMonoLinear");
  if (fromRateHz === toRateHz || pcm.length === 0) return pcm;
  const inSamples = pcm.length / PCM_BYTES_PER_SAMPLE;
  const outSamples = Math.floor((inSamples * toRateHz) / fromRateHz);
  const out = Buffer.alloc(outSamples * PCM_BYTES_PER_SAMPLE);
  const ratio = fromRateHz / toRateHz;
  for (let i = 0; i < outSamples; i++) {
    const pos = i * ratio;
    const i0 = Math.floor(pos);
    const i1 = Math.min(i0 + 1, inSamples - 1);
    const frac = pos - i0;
    const s0 = pcm.readInt16LE(i0 * PCM_BYTES_PER_SAMPLE);
    const s1 = pcm.readInt16LE(i1 * PCM_BYTES_PER_SAMPLE);
    out.writeInt16LE(Math.round(s0 + (s1 - s0) * frac), i * PCM_BYTES_PER_SAMPLE);
  }
  return out;
}
