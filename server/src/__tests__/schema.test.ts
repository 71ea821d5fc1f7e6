import { ValidationError } from "../errors";
import { buildRequestSchema, parseSynthesisRequest } from "../http/schema";

const schema = buildRequestSchema({ chunkHardLimit: 400 });
const REF = "https://voices.test/alice.wav";

function fieldOf(body: unknown): string | undefined {
  try {
    parseSynthesisRequest(body, schema);
  } catch (e) {
    if (e instanceof ValidationError) return e.field;
    throw e;
  }
  return undefined;
}

describe("parseSynthesisRequest", () => {
  it("applies sampling defaults", () => {
    const req = parseSynthesisRequest({ text: "Hello", reference_source: REF }, schema);
    expect(req).toEqual({
      text: "Hello",
      referenceSource: REF,
      mode: "standard",
      chunkSize: undefined,
      params: {
        speed: undefined,
        seed: undefined,
        doSample: true,
        topP: 0.8,
        topK: 30,
        temperature: 1,
        lengthPenalty: 0,
        numBeams: 3,
        repetitionPenalty: 10,
        maxMelTokens: 600,
        maxTextTokensPerSentence: 120,
      },
    });
  });

  it("accepts the legacy field names", () => {
    const req = parseSynthesisRequest({ text: "Hello", prompt_url: REF, infer_mode: "batch" }, schema);
    expect(req.referenceSource).toBe(REF);
    expect(req.mode).toBe("batch");
  });

  it("keeps max_text_tokens_per_sentence as a model parameter, not a chunk size", () => {
    const req = parseSynthesisRequest(
      { text: "Hello", reference_source: REF, max_text_tokens_per_sentence: 80, chunk_size: 60 },
      schema,
    );
    expect(req.params.maxTextTokensPerSentence).toBe(80);
    expect(req.chunkSize).toBe(60);
  });

  it("prefers the current names over the legacy ones", () => {
    const req = parseSynthesisRequest(
      { text: "Hi", reference_source: REF, prompt_url: "https://other.test/b.wav", mode: "standard", infer_mode: "batch" },
      schema,
    );
    expect(req.referenceSource).toBe(REF);
    expect(req.mode).toBe("standard");
  });

  it("treats a non-positive top_k as unset", () => {
    expect(parseSynthesisRequest({ text: "Hi", reference_source: REF, top_k: 0 }, schema).params.topK).toBeUndefined();
  });

  it("names the failing field", () => {
    expect(fieldOf({ reference_source: REF })).toBe("text");
    expect(fieldOf({ text: "   ", reference_source: REF })).toBe("text");
    expect(fieldOf({ text: "Hi", reference_source: REF, mode: "fast" })).toBe("mode");
    expect(fieldOf({ text: "Hi", reference_source: REF, speed: 10 })).toBe("speed");
    expect(fieldOf({ text: "Hi", reference_source: REF, seed: -1 })).toBe("seed");
    expect(fieldOf({ text: "Hi", reference_source: REF, chunk_size: 401 })).toBe("chunk_size");
    expect(fieldOf({ text: "Hi" })).toBe("reference_source");
    expect(fieldOf(null)).toBe("body");
  });

  it("uses readable messages", () => {
    expect(() => parseSynthesisRequest({ reference_source: REF }, schema)).toThrow("text is required");
    expect(() => parseSynthesisRequest({ text: " ", reference_source: REF }, schema)).toThrow("text must not be empty");
    expect(() => parseSynthesisRequest("hello", schema)).toThrow("request body must be a JSON object");
  });
});
