import { z } from "zod";

import { ValidationError } from "../errors";
import type { SynthesisRequest } from "../synthesis/types";

export type RequestLimits = {
  chunkHardLimit: number;
};

const inferMode = z.enum(["standard", "batch"]);

export function buildRequestSchema(limits: RequestLimits) {
  const chunkSize = z.number().int().min(1).max(limits.chunkHardLimit);

  return z.object({
    text: z
      .string({ required_error: "text is required" })
      .refine((s) => s.trim().length > 0, "text must not be empty"),
    reference_source: z.string().min(1).optional(),
    prompt_url: z.string().min(1).optional(),
    mode: inferMode.optional(),
    infer_mode: inferMode.optional(),

    speed: z.number().min(0.25).max(4).optional(),
    seed: z.number().int().min(0).optional(),
    chunk_size: chunkSize.optional(),

    do_sample: z.boolean().default(true),
    top_p: z.number().min(0).max(1).default(0.8),
    top_k: z.number().int().default(30),
    temperature: z.number().positive().default(1.0),
    length_penalty: z.number().default(0.0),
    num_beams: z.number().int().min(1).default(3),
    repetition_penalty: z.number().positive().default(10.0),
    max_mel_tokens: z.number().int().min(1).default(600),
    max_text_tokens_per_sentence: z.number().int().min(1).default(120),
  });
}

export type RequestSchema = ReturnType<typeof buildRequestSchema>;

// first failing field wins; prompt_url and infer_mode are legacy aliases
export function parseSynthesisRequest(body: unknown, schema: RequestSchema): SynthesisRequest {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue.path.length > 0 ? issue.path.join(".") : "body";
    throw new ValidationError(field, field === "body" ? "request body must be a JSON object" : issue.message);
  }

  const b = parsed.data;
  const referenceSource = b.reference_source ?? b.prompt_url;
  if (!referenceSource) throw new ValidationError("reference_source", "reference_source is required");

  return {
    text: b.text,
    referenceSource,
    mode: b.mode ?? b.infer_mode ?? "standard",
    chunkSize: b.chunk_size,
    params: {
      speed: b.speed,
      seed: b.seed,
      doSample: b.do_sample,
      topP: b.top_p,
      topK: b.top_k > 0 ? b.top_k : undefined,
      temperature: b.temperature,
      lengthPenalty: b.length_penalty,
      numBeams: b.num_beams,
      repetitionPenalty: b.repetition_penalty,
      maxMelTokens: b.max_mel_tokens,
      maxTextTokensPerSentence: b.max_text_tokens_per_sentence,
    },
  };
}
