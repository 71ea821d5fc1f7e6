import { decodeWav } from "../audio/wav";
import type { Waveform } from "../audio/types";
import type { ModelInput, SynthesisModel } from "./types";

type HttpBackendConfig = {
  baseUrl: string;
  timeoutMs: number;
  sampleRate?: number;
  fetchImpl?: typeof fetch;
};

// GPU inference worker on the same host: GET /health, POST /infer -> WAV
export class HttpModelBackend implements SynthesisModel {
  readonly name = "indextts-worker";
  private cfg: HttpBackendConfig;
  private declaredRate: number;
  private fetchImpl: typeof fetch;

  constructor(cfg: HttpBackendConfig) {
    if (!cfg.baseUrl) throw new Error("MODEL_SERVICE_URL not set");
    this.cfg = { ...cfg, baseUrl: cfg.baseUrl.replace(/\/+$/, "") };
    this.declaredRate = cfg.sampleRate ?? 24000;
    this.fetchImpl = cfg.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  get sampleRate(): number {
    return this.declaredRate;
  }

  async load(): Promise<void> {
    const resp = await this.fetchImpl(`${this.cfg.baseUrl}/health`, {
      signal: AbortSignal.timeout(this.cfg.timeoutMs),
    });
    const text = await resp.text();
    if (!resp.ok) {
      throw new Error(`model worker not healthy status=${resp.status} body=${text}`);
    }

    const rate = Number(resp.headers.get("x-sampling-rate"));
    if (Number.isInteger(rate) && rate > 0) this.declaredRate = rate;
  }

  // no caller signal: once started, a model call runs to completion
  async synthesize(input: ModelInput): Promise<Waveform> {
    const p = input.params;
    const body = {
      text: input.text,
      infer_mode: input.mode,
      reference_wav_base64: input.reference.wav.toString("base64"),
      speed: p.speed,
      seed: p.seed,
      do_sample: p.doSample,
      top_p: p.topP,
      top_k: p.topK ?? null,
      temperature: p.temperature,
      length_penalty: p.lengthPenalty,
      num_beams: p.numBeams,
      repetition_penalty: p.repetitionPenalty,
      max_mel_tokens: p.maxMelTokens,
      max_text_tokens_per_sentence: p.maxTextTokensPerSentence,
    };

    const resp = await this.fetchImpl(`${this.cfg.baseUrl}/infer`, {
      method: "POST",
      headers: { "Content-Type": "application/json", Accept: "audio/wav" },
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(this.cfg.timeoutMs),
    });

    if (!resp.ok) {
      const text = await resp.text();
      throw new Error(`model worker infer failed status=${resp.status} body=${text}`);
    }

    const wav = decodeWav(Buffer.from(await resp.arrayBuffer()));
    return { samples: wav.samples, sampleRate: wav.sampleRate };
  }
}
