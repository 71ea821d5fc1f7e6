import type { Waveform } from "../audio/types";

export type InferMode = "standard" | "batch";

export type InferenceParams = {
  speed?: number;
  seed?: number;
  doSample: boolean;
  topP: number;
  topK?: number; // absent means no top-k filtering
  temperature: number;
  lengthPenalty: number;
  numBeams: number;
  repetitionPenalty: number;
  maxMelTokens: number;
  /** model-side sentence bucketing, in text tokens */
  maxTextTokensPerSentence: number;
};

export type ReferenceVoice = {
  /** normalised mono PCM16 WAV bytes */
  wav: Buffer;
  sampleRate: number;
  durationSec: number;
};

export type ModelInput = {
  text: string;
  reference: ReferenceVoice;
  mode: InferMode;
  params: InferenceParams;
};

// need not be reentrant; only reached through the InferenceGate
export interface SynthesisModel {
  readonly name: string;
  readonly sampleRate: number;
  load(): Promise<void>;
  synthesize(input: ModelInput): Promise<Waveform>;
}
