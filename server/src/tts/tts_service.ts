import { NotReadyError, describeError } from "../errors";
import type { InferenceGate } from "../gate/inference_gate";
import { Logger } from "../logging/logger";
import type { ModelHandle } from "../model/model_handle";
import type { ReferenceAudioFetcher } from "../reference/fetcher";
import type { SynthesisDispatcher } from "../synthesis/dispatcher";
import type { SynthesisResult } from "../synthesis/result";
import type { SynthesisRequest } from "../synthesis/types";
import type { RequestContext } from "./types";

type TtsServiceDeps = {
  model: ModelHandle;
  fetcher: ReferenceAudioFetcher;
  gate: InferenceGate;
  dispatcher: SynthesisDispatcher;
};

const log = new Logger("tts");

export class TtsService {
  private deps: TtsServiceDeps;

  constructor(deps: TtsServiceDeps) {
    this.deps = deps;
  }

  async synthesize(req: SynthesisRequest, ctx: RequestContext): Promise<SynthesisResult> {
    const { model, fetcher, gate, dispatcher } = this.deps;
    const started = Date.now();

    try {
      if (!model.isReady) throw new NotReadyError();
      const plan = dispatcher.plan(req);

      log.info(`[${ctx.requestId}] fetching reference audio: ${req.referenceSource}`);
      const result = await fetcher.withReference(req.referenceSource, ctx, (reference) =>
        gate.run(
          (slot) => {
            const queuedMs = slot.acquiredAt - started;
            log.info(`[${ctx.requestId}] admitted to slot ${slot.id}, starting ${plan.mode} inference (${queuedMs}ms since request)`);
            // no signal past this point: admitted inference runs to completion
            return dispatcher.dispatch({
              requestId: ctx.requestId,
              request: req,
              plan,
              reference,
              slot,
              createdAt: slot.acquiredAt,
            });
          },
          { signal: ctx.signal },
        ),
      );

      this.summary(ctx, req, started, { mode: result.mode });
      return result;
    } catch (e) {
      this.summary(ctx, req, started, { error: e });
      throw e;
    }
  }

  private summary(ctx: RequestContext, req: SynthesisRequest, started: number, outcome: { mode?: string; error?: unknown }) {
    const info = {
      request_id: ctx.requestId,
      text_length: req.text.length,
      infer_mode: outcome.mode ?? req.mode,
      prompt_url: req.referenceSource,
      duration: `${((Date.now() - started) / 1000).toFixed(3)}s`,
      success: outcome.error === undefined,
      ...(outcome.error !== undefined ? { error: describeError(outcome.error) } : {}),
    };

    if (outcome.error !== undefined) log.warn(`synthesis failed: ${JSON.stringify(info)}`);
    else log.info(`synthesis succeeded: ${JSON.stringify(info)}`);
  }
}
