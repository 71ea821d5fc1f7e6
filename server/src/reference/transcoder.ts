import { execFile } from "child_process";
import { promisify } from "util";

import { CancelledError, InvalidAudioError, ServiceError } from "../errors";

const execFileAsync = promisify(execFile);

export interface AudioTranscoder {
  toWav(inputPath: string, outputPath: string, sampleRate: number, signal?: AbortSignal): Promise<void>;
}

function errorCode(e: unknown): string | undefined {
  if (typeof e === "object" && e !== null && "code" in e) return String(e.code);
  return undefined;
}

export class FfmpegTranscoder implements AudioTranscoder {
  constructor(private readonly bin: string = "ffmpeg") {}

  async toWav(inputPath: string, outputPath: string, sampleRate: number, signal?: AbortSignal): Promise<void> {
    try {
      await execFileAsync(
        this.bin,
        ["-y", "-i", inputPath, "-ar", String(sampleRate), "-ac", "1", "-acodec", "pcm_s16le", "-f", "wav", outputPath],
        { signal },
      );
    } catch (e) {
      if (signal?.aborted) throw new CancelledError("request cancelled during transcoding");
      if (errorCode(e) === "ENOENT") {
        throw new ServiceError("Internal", 500, `${this.bin} not installed, cannot convert reference audio to WAV`, {
          cause: e,
        });
      }
      throw new InvalidAudioError("reference audio could not be decoded", e);
    }
  }
}
