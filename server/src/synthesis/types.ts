import type { GateSlot } from "../gate/types";
import type { InferenceParams, InferMode } from "../model/types";
import type { ReferenceAsset } from "../reference/types";

export type SynthesisRequest = {
  text: string;
  referenceSource: string;
  mode: InferMode;
  params: InferenceParams;
  chunkSize?: number;
};

export type SynthesisPlan =
  | { mode: "standard"; text: string }
  | { mode: "batch"; chunks: string[]; escalated: boolean };

export type InferenceJob = {
  requestId: string;
  request: SynthesisRequest;
  plan: SynthesisPlan;
  reference: ReferenceAsset;
  slot: GateSlot;
  createdAt: number;
};
