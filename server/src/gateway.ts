import type { Express } from "express";

import type { AppConfig } from "./config";
import { InferenceGate } from "./gate/inference_gate";
import { HealthReporter } from "./health/health_reporter";
import { createApp } from "./http/app";
import { ModelHandle } from "./model/model_handle";
import type { SynthesisModel } from "./model/types";
import { ReferenceAudioFetcher } from "./reference/fetcher";
import { FfmpegTranscoder, type AudioTranscoder } from "./reference/transcoder";
import { SynthesisDispatcher } from "./synthesis/dispatcher";
import { TtsService } from "./tts/tts_service";

export const SERVICE_NAME = "voice-synthesis-gateway";
export const SERVICE_VERSION = "1.0.0";

type GatewayParts = {
  model: SynthesisModel;
  transcoder?: AudioTranscoder;
  fetchImpl?: typeof fetch;
  tmpRoot?: string;
};

export type Gateway = {
  app: Express;
  model: ModelHandle;
  gate: InferenceGate;
  fetcher: ReferenceAudioFetcher;
  service: TtsService;
  health: HealthReporter;
};

export function createGateway(config: AppConfig, parts: GatewayParts): Gateway {
  const model = new ModelHandle(parts.model, config.modelDir);

  const gate = new InferenceGate({
    capacity: config.maxConcurrency,
    admissionTimeoutMs: config.admissionTimeoutMs,
  });

  const fetcher = new ReferenceAudioFetcher({
    transcoder: parts.transcoder ?? new FfmpegTranscoder(config.ffmpegPath),
    timeoutMs: config.fetchTimeoutMs,
    retry: { maxAttempts: config.fetchMaxAttempts, baseDelayMs: config.fetchRetryDelayMs, exponential: true },
    maxBytes: config.maxReferenceBytes,
    minBytes: config.minReferenceBytes,
    sampleRate: config.referenceSampleRate,
    tmpRoot: parts.tmpRoot,
    userAgent: `${SERVICE_NAME}/${SERVICE_VERSION}`,
    fetchImpl: parts.fetchImpl,
  });

  const dispatcher = new SynthesisDispatcher(model, {
    maxTextChars: config.maxTextChars,
    standardMaxChars: config.standardMaxChars,
    chunkChars: config.chunkChars,
    chunkHardLimit: config.chunkHardLimit,
    join: { gapMs: config.chunkGapMs },
  });

  const service = new TtsService({ model, fetcher, gate, dispatcher });
  const health = new HealthReporter(model, gate, { service: SERVICE_NAME, version: SERVICE_VERSION });

  const app = createApp({
    service,
    health,
    limits: { chunkHardLimit: config.chunkHardLimit },
    corsOrigins: config.corsOrigins,
    streamChunkBytes: config.streamChunkBytes,
  });

  return { app, model, gate, fetcher, service, health };
}
