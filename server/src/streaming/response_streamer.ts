import type { Response } from "express";
import { Readable } from "stream";
import { pipeline } from "stream/promises";

import { encodeWav } from "../audio/wav";
import type { SynthesisResult } from "../synthesis/result";

export type StreamOutcome = "completed" | "client_closed";

const DEFAULT_CHUNK_BYTES = 64 * 1024;

function* slices(buf: Buffer, size: number): Generator<Buffer> {
  for (let offset = 0; offset < buf.length; offset += size) {
    yield buf.subarray(offset, offset + size);
  }
}

function isPrematureClose(e: unknown): boolean {
  return typeof e === "object" && e !== null && "code" in e && e.code === "ERR_STREAM_PREMATURE_CLOSE";
}

export function audioHeaders(result: SynthesisResult, byteLength: number): Record<string, string> {
  return {
    "Content-Type": "audio/wav",
    "Content-Length": String(byteLength),
    "Content-Disposition": `attachment; filename=tts_output_${result.requestId}.wav`,
    "X-Sampling-Rate": String(result.sampleRate),
    "X-Request-ID": result.requestId,
    "X-Inference-Mode": result.mode,
    "X-Audio-Duration": result.durationSec.toFixed(3),
    "X-Chunk-Count": String(result.chunkCount),
  };
}

export async function streamResult(
  res: Response,
  result: SynthesisResult,
  chunkBytes: number = DEFAULT_CHUNK_BYTES,
): Promise<StreamOutcome> {
  const wav = encodeWav(result.take());

  res.status(200).set(audioHeaders(result, wav.length));

  try {
    await pipeline(Readable.from(slices(wav, chunkBytes)), res);
    return "completed";
  } catch (e) {
    if (isPrematureClose(e) || res.destroyed) return "client_closed";
    throw e;
  }
}
