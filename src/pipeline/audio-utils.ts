/**
 * Audio format helpers: PCM <-> WAV for the export stage.
 */

import { NARRATION_BIT_DEPTH, NARRATION_CHANNELS } from "../audio/pcm-utils";

const WAV_HEADER_BYTES = 44;

export interface WavInfo {
  sampleRateHz: number;
  channels: number;
  bitDepth: number;
  /** Raw PCM payload of the data chunk. */
  pcm: Buffer;
}

/**
 * Prepend a 44-byte WAV header to PCM.
 * Defaults to 16-bit mono, the narration format.
 */
export function pcmToWav(
  pcm: Buffer,
  sampleRateHz: number,
  numChannels: number = NARRATION_CHANNELS,
  bitsPerSample: number = NARRATION_BIT_DEPTH
): Buffer {
  const byteRate = sampleRateHz * numChannels * (bitsPerSample / 8);
  const dataSize = pcm.length;
  const fileSize = WAV_HEADER_BYTES + dataSize;
  const header = Buffer.alloc(WAV_HEADER_BYTES);
  header.write("RIFF", 0);
  header.writeUInt32LE(fileSize - 8, 4);
  header.write("WAVE", 8);
  header.write("fmt ", 12);
  header.writeUInt32LE(16, 16);
  header.writeUInt16LE(1, 20);
  header.writeUInt16LE(numChannels, 22);
  header.writeUInt32LE(sampleRateHz, 24);
  header.writeUInt32LE(byteRate, 28);
  header.writeUInt16LE((numChannels * bitsPerSample) / 8, 32);
  header.writeUInt16LE(bitsPerSample, 34);
  header.write("data", 36);
  header.writeUInt32LE(dataSize, 40);
  return Buffer.concat([header, pcm]);
}

/**
 * Read a PCM WAV file. Walks the chunk list, so files with extra chunks
 * (LIST, fact) written by ffmpeg are accepted.
 */
export function parseWav(wav: Buffer): WavInfo {
  if (wav.length < 12 || wav.toString("ascii", 0, 4) !== "RIFF" || wav.toString("ascii", 8, 12) !== "WAVE") {
    throw new Error("Not a RIFF/WAVE file");
  }
  let offset = 12;
  let fmt: Omit<WavInfo, "pcm"> | null = null;
  while (offset + 8 <= wav.length) {
    const id = wav.toString("ascii", offset, offset + 4);
    const size = wav.readUInt32LE(offset + 4);
    const body = offset + 8;
    if (id === "fmt ") {
      const audioFormat = wav.readUInt16LE(body);
      if (audioFormat !== 1) throw new Error(`Unsupported WAV encoding ${audioFormat} (PCM only)`);
      fmt = {
        channels: wav.readUInt16LE(body + 2),
        sampleRateHz: wav.readUInt32LE(body + 4),
        bitDepth: wav.readUInt16LE(body + 14),
      };
    } else if (id === "data") {
      if (!fmt) throw new Error("WAV data chunk precedes fmt chunk");
      // ffmpeg writing to a pipe leaves the size unset; take what is there.
      const end = Math.min(body + size, wav.length);
      return { ...fmt, pcm: wav.subarray(body, end) };
    }
    offset = body + size + (size % 2);
  }
  throw new Error("WAV file has no data chunk");
}
