import type { Waveform } from "../audio/types";
import { durationOf } from "../audio/wav";
import type { InferMode } from "../model/types";

type ResultInit = {
  requestId: string;
  wave: Waveform;
  mode: InferMode;
  chunkCount: number;
};

// samples can be taken once
export class SynthesisResult {
  readonly requestId: string;
  readonly sampleRate: number;
  readonly durationSec: number;
  readonly mode: InferMode;
  readonly chunkCount: number;
  private samples: Int16Array | null;

  constructor(init: ResultInit) {
    this.requestId = init.requestId;
    this.sampleRate = init.wave.sampleRate;
    this.durationSec = durationOf(init.wave);
    this.mode = init.mode;
    this.chunkCount = init.chunkCount;
    this.samples = init.wave.samples;
  }

  take(): Waveform {
    if (!this.samples) throw new Error(`synthesis result ${this.requestId} already consumed`);
    const samples = this.samples;
    this.samples = null;
    return { samples, sampleRate: this.sampleRate };
  }
}
