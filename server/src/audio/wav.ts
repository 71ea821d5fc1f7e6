import { InvalidAudioError } from "../errors";
import type { DecodedWav, Waveform } from "./types";

const HEADER_BYTES = 44;

export function encodeWav(wave: Waveform): Buffer {
  const numChannels = 1;
  const bitsPerSample = 16;
  const blockAlign = (numChannels * bitsPerSample) / 8;
  const byteRate = wave.sampleRate * blockAlign;
  const dataLength = wave.samples.length * blockAlign;

  const buf = Buffer.alloc(HEADER_BYTES + dataLength);

  // "RIFF" chunk descriptor
  buf.write("RIFF", 0, "ascii");
  buf.writeUInt32LE(36 + dataLength, 4);
  buf.write("WAVE", 8, "ascii");

  // "fmt " sub-chunk
  buf.write("fmt ", 12, "ascii");
  buf.writeUInt32LE(16, 16);
  buf.writeUInt16LE(1, 20); // PCM
  buf.writeUInt16LE(numChannels, 22);
  buf.writeUInt32LE(wave.sampleRate, 24);
  buf.writeUInt32LE(byteRate, 28);
  buf.writeUInt16LE(blockAlign, 32);
  buf.writeUInt16LE(bitsPerSample, 34);

  // "data" sub-chunk
  buf.write("data", 36, "ascii");
  buf.writeUInt32LE(dataLength, 40);

  for (let i = 0; i < wave.samples.length; i++) {
    buf.writeInt16LE(wave.samples[i], HEADER_BYTES + i * 2);
  }
  return buf;
}

// 16-bit integer PCM only; extra channels are averaged down to mono
export function decodeWav(buf: Buffer): DecodedWav {
  if (buf.length < 12 || buf.toString("ascii", 0, 4) !== "RIFF" || buf.toString("ascii", 8, 12) !== "WAVE") {
    throw new InvalidAudioError("not a RIFF/WAVE file");
  }

  let offset = 12;
  let fmt: { channels: number; sampleRate: number; bitsPerSample: number; format: number } | null = null;
  let data: Buffer | null = null;

  while (offset + 8 <= buf.length) {
    const id = buf.toString("ascii", offset, offset + 4);
    const size = buf.readUInt32LE(offset + 4);
    const body = offset + 8;

    if (id === "fmt ") {
      if (size < 16 || body + 16 > buf.length) throw new InvalidAudioError("truncated fmt chunk");
      fmt = {
        format: buf.readUInt16LE(body),
        channels: buf.readUInt16LE(body + 2),
        sampleRate: buf.readUInt32LE(body + 4),
        bitsPerSample: buf.readUInt16LE(body + 14),
      };
    } else if (id === "data") {
      // streamed WAVs sometimes carry a bogus size; clamp to what we have
      data = buf.subarray(body, Math.min(body + size, buf.length));
      break;
    }
    offset = body + size + (size % 2);
  }

  if (!fmt) throw new InvalidAudioError("missing fmt chunk");
  if (!data) throw new InvalidAudioError("missing data chunk");
  // 0xFFFE is WAVE_FORMAT_EXTENSIBLE, which ffmpeg emits for some layouts
  if (fmt.format !== 1 && fmt.format !== 0xfffe) throw new InvalidAudioError(`unsupported WAV format ${fmt.format}`);
  if (fmt.bitsPerSample !== 16) throw new InvalidAudioError(`unsupported bit depth ${fmt.bitsPerSample}`);
  if (fmt.channels < 1 || fmt.sampleRate <= 0) throw new InvalidAudioError("invalid channel count or sample rate");

  const frameBytes = fmt.channels * 2;
  const frames = Math.floor(data.length / frameBytes);
  if (frames === 0) throw new InvalidAudioError("audio contains no samples");

  const samples = new Int16Array(frames);
  for (let f = 0; f < frames; f++) {
    let acc = 0;
    for (let c = 0; c < fmt.channels; c++) {
      acc += data.readInt16LE(f * frameBytes + c * 2);
    }
    samples[f] = Math.round(acc / fmt.channels);
  }

  return {
    samples,
    sampleRate: fmt.sampleRate,
    channels: fmt.channels,
    durationSec: frames / fmt.sampleRate,
  };
}

export function durationOf(wave: Waveform): number {
  return wave.samples.length / wave.sampleRate;
}
