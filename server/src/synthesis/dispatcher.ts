import type { Waveform } from "../audio/types";
import { NotReadyError, SynthesisError, TextTooLongError, ValidationError, describeError } from "../errors";
import { Logger } from "../logging/logger";
import type { ModelHandle } from "../model/model_handle";
import type { InferMode } from "../model/types";
import { DEFAULT_JOIN, joinWaveforms, type JoinOptions } from "./join";
import { SynthesisResult } from "./result";
import { splitIntoChunks } from "./text_chunker";
import type { InferenceJob, SynthesisPlan, SynthesisRequest } from "./types";

export type DispatcherOptions = {
  maxTextChars: number;
  standardMaxChars: number;
  chunkChars: number;
  chunkHardLimit: number;
  join?: Partial<JoinOptions>;
};

const log = new Logger("dispatch");

export class SynthesisDispatcher {
  private opts: DispatcherOptions;
  private join: JoinOptions;

  constructor(
    private readonly model: ModelHandle,
    opts: DispatcherOptions,
  ) {
    this.opts = opts;
    this.join = { ...DEFAULT_JOIN, ...opts.join };
  }

  // pure; runs before any reference download or gate admission
  plan(req: SynthesisRequest): SynthesisPlan {
    const escalated = req.mode === "standard" && req.text.length > this.opts.standardMaxChars;
    if (req.mode === "standard" && !escalated) {
      this.checkTotalLength(req.text);
      return { mode: "standard", text: req.text.trim() };
    }

    const chunks = splitIntoChunks(req.text, {
      chunkChars: Math.min(req.chunkSize ?? this.opts.chunkChars, this.opts.chunkHardLimit),
      hardLimit: this.opts.chunkHardLimit,
    });
    if (chunks.length === 0) throw new ValidationError("text", "text contains nothing to synthesize");
    // after chunking, so an over-ceiling clause is what gets reported
    this.checkTotalLength(req.text);
    return { mode: "batch", chunks, escalated };
  }

  private checkTotalLength(text: string) {
    if (text.length > this.opts.maxTextChars) {
      throw new TextTooLongError(text.length, this.opts.maxTextChars, "text");
    }
  }

  // caller holds job.slot
  async dispatch(job: InferenceJob): Promise<SynthesisResult> {
    const { plan, requestId } = job;

    if (plan.mode === "standard") {
      const wave = await this.invoke(job, plan.text, "standard");
      return new SynthesisResult({ requestId, wave, mode: "standard", chunkCount: 1 });
    }

    if (plan.escalated) {
      log.info(`[${requestId}] text of ${job.request.text.length} chars exceeds standard limit, using batch mode`);
    }

    const waves: Waveform[] = [];
    for (let i = 0; i < plan.chunks.length; i++) {
      const wave = await this.invoke(job, plan.chunks[i], "batch", i);
      if (waves.length > 0 && wave.sampleRate !== waves[0].sampleRate) {
        throw new SynthesisError(
          `chunk ${i + 1}/${plan.chunks.length} came back at ${wave.sampleRate}Hz, expected ${waves[0].sampleRate}Hz`,
        );
      }
      waves.push(wave);
      log.debug(`[${requestId}] chunk ${i + 1}/${plan.chunks.length} done (${plan.chunks[i].length} chars)`);
    }

    return new SynthesisResult({
      requestId,
      wave: joinWaveforms(waves, this.join),
      mode: "batch",
      chunkCount: waves.length,
    });
  }

  private async invoke(job: InferenceJob, text: string, mode: InferMode, chunk?: number): Promise<Waveform> {
    const where = chunk === undefined ? "" : ` (chunk ${chunk + 1})`;
    let wave: Waveform;
    try {
      wave = await this.model.synthesize({
        text,
        mode,
        reference: job.reference,
        params: job.request.params,
      });
    } catch (e) {
      if (e instanceof NotReadyError) throw e;
      log.error(`[${job.requestId}] model inference failed${where}`, e);
      throw new SynthesisError(`model inference failed${where}: ${describeError(e)}`, e);
    }

    if (wave.samples.length === 0 || wave.sampleRate <= 0) {
      throw new SynthesisError(`model returned no audio${where}`);
    }
    return wave;
  }
}
