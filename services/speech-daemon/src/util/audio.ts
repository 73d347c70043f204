import fs from "node:fs/promises";
import type { SynthesisResult } from "../modules/tts/types";

const WAVE_FORMAT_PCM = 1;
const WAVE_FORMAT_IEEE_FLOAT = 3;
const WAVE_FORMAT_EXTENSIBLE = 0xfffe;

// minimal WAV writer: mono, 32-bit IEEE float, so the samples decode bit-for-bit
export const encodeWavFloat32 = (samples: Float32Array, sampleRate: number): Buffer => {
  const numChannels = 1;
  const bitsPerSample = 32;
  const byteRate = (sampleRate * numChannels * bitsPerSample) / 8;
  const blockAlign = (numChannels * bitsPerSample) / 8;

  const dataSize = samples.length * 4;
  const buffer = Buffer.alloc(44 + dataSize);

  buffer.write("RIFF", 0);
  buffer.writeUInt32LE(36 + dataSize, 4);
  buffer.write("WAVE", 8);
  buffer.write("fmt ", 12);
  buffer.writeUInt32LE(16, 16);
  buffer.writeUInt16LE(WAVE_FORMAT_IEEE_FLOAT, 20);
  buffer.writeUInt16LE(numChannels, 22);
  buffer.writeUInt32LE(sampleRate, 24);
  buffer.writeUInt32LE(byteRate, 28);
  buffer.writeUInt16LE(blockAlign, 32);
  buffer.writeUInt16LE(bitsPerSample, 34);
  buffer.write("data", 36);
  buffer.writeUInt32LE(dataSize, 40);

  for (let i = 0; i < samples.length; i += 1) {
    buffer.writeFloatLE(samples[i], 44 + i * 4);
  }
  return buffer;
};

export const writeWavFile = async (path: string, result: SynthesisResult): Promise<void> => {
  await fs.writeFile(path, encodeWavFloat32(result.samples, result.sampleRate));
};

interface WavFormat {
  format: number;
  channels: number;
  sampleRate: number;
  bitsPerSample: number;
}

const readSample = (buf: Buffer, offset: number, fmt: WavFormat): number => {
  if (fmt.format === WAVE_FORMAT_IEEE_FLOAT) {
    return fmt.bitsPerSample === 64 ? buf.readDoubleLE(offset) : buf.readFloatLE(offset);
  }
  switch (fmt.bitsPerSample) {
    case 8:
      return (buf.readUInt8(offset) - 128) / 128;
    case 16:
      return buf.readInt16LE(offset) / 32768;
    case 24:
      return buf.readIntLE(offset, 3) / 8388608;
    default:
      return buf.readInt32LE(offset) / 2147483648;
  }
};

/**
 * Decodes a RIFF/WAVE buffer (PCM 8/16/24/32-bit or IEEE float) into mono
 * float samples. Multi-channel audio is averaged down to one channel.
 */
export const decodeWav = (buf: Buffer): SynthesisResult => {
  if (buf.length < 12 || buf.toString("ascii", 0, 4) !== "RIFF" || buf.toString("ascii", 8, 12) !== "WAVE") {
    throw new Error("not a RIFF/WAVE buffer");
  }

  let fmt: WavFormat | undefined;
  let data: Buffer | undefined;
  let offset = 12;

  while (offset + 8 <= buf.length) {
    const id = buf.toString("ascii", offset, offset + 4);
    const size = buf.readUInt32LE(offset + 4);
    const body = offset + 8;

    if (id === "fmt ") {
      let format = buf.readUInt16LE(body);
      if (format === WAVE_FORMAT_EXTENSIBLE && size >= 26) {
        format = buf.readUInt16LE(body + 24);
      }
      fmt = {
        format,
        channels: buf.readUInt16LE(body + 2),
        sampleRate: buf.readUInt32LE(body + 4),
        bitsPerSample: buf.readUInt16LE(body + 14),
      };
    } else if (id === "data") {
      // streaming writers leave the size as 0xffffffff
      data ??= buf.subarray(body, Math.min(body + size, buf.length));
      // fmt may follow data
      if (fmt) break;
    }

    offset = body + size + (size % 2);
  }

  if (!fmt) throw new Error("wav has no fmt chunk");
  if (!data) throw new Error("wav has no data chunk");
  if (fmt.format !== WAVE_FORMAT_PCM && fmt.format !== WAVE_FORMAT_IEEE_FLOAT) {
    throw new Error(`unsupported wav format ${fmt.format}`);
  }
  if (fmt.channels < 1 || fmt.bitsPerSample % 8 !== 0 || fmt.bitsPerSample === 0) {
    throw new Error(`malformed wav fmt (channels=${fmt.channels} bits=${fmt.bitsPerSample})`);
  }

  const bytesPerSample = fmt.bitsPerSample / 8;
  const frameBytes = bytesPerSample * fmt.channels;
  const frames = Math.floor(data.length / frameBytes);
  const samples = new Float32Array(frames);

  for (let i = 0; i < frames; i += 1) {
    let sum = 0;
    for (let c = 0; c < fmt.channels; c += 1) {
      sum += readSample(data, i * frameBytes + c * bytesPerSample, fmt);
    }
    samples[i] = sum / fmt.channels;
  }

  return { samples, sampleRate: fmt.sampleRate };
};
