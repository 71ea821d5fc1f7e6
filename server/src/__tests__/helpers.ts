import { copyFile, mkdtemp, readFile, writeFile } from "fs/promises";
import { tmpdir } from "os";
import path from "path";

import type { Waveform } from "../audio/types";
import { encodeWav } from "../audio/wav";
import { loadConfig, type AppConfig } from "../config";
import { InvalidAudioError } from "../errors";
import { REQUIRED_MODEL_FILES } from "../model/model_handle";
import type { ModelInput, SynthesisModel } from "../model/types";
import type { AudioTranscoder } from "../reference/transcoder";

export const STUB_RATE = 22050;
export const STUB_PAD = 50;

/**
 * Deterministic model: 100 samples per character framed by STUB_PAD zero
 * samples on each side. Every inner sample has |value| in [100, 999] and
 * depends only on the text, the sample index and the seed.
 */
export class StubModel implements SynthesisModel {
  readonly name = "stub";
  readonly sampleRate: number = STUB_RATE;
  readonly calls: ModelInput[] = [];
  loaded = false;
  inFlight = 0;
  maxInFlight = 0;

  constructor(
    private readonly opts: { delayMs?: number; failOn?: string; loadError?: Error } = {},
  ) {}

  async load(): Promise<void> {
    if (this.opts.loadError) throw this.opts.loadError;
    this.loaded = true;
  }

  async synthesize(input: ModelInput): Promise<Waveform> {
    this.calls.push(input);
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      if (this.opts.delayMs) await new Promise((r) => setTimeout(r, this.opts.delayMs));
      if (this.opts.failOn && input.text.includes(this.opts.failOn)) {
        throw new Error("CUDA out of memory");
      }
      return stubWave(input.text, input.params.seed ?? 0);
    } finally {
      this.inFlight--;
    }
  }
}

export function stubWave(text: string, seed = 0): Waveform {
  const inner = text.length * 100;
  const samples = new Int16Array(inner + 2 * STUB_PAD);
  for (let i = 0; i < inner; i++) {
    const code = text.charCodeAt(Math.floor(i / 100));
    const magnitude = 100 + ((code * 31 + i * 7 + seed) % 900);
    samples[STUB_PAD + i] = i % 2 === 0 ? magnitude : -magnitude;
  }
  return { samples, sampleRate: STUB_RATE };
}

export function toneWav(frames: number, sampleRate = 16000): Buffer {
  const samples = new Int16Array(frames);
  for (let i = 0; i < frames; i++) samples[i] = Math.round(Math.sin(i / 8) * 8000);
  return encodeWav({ samples, sampleRate });
}

/** Stands in for ffmpeg: accepts only input that already is a RIFF file. */
export class CopyTranscoder implements AudioTranscoder {
  calls = 0;

  async toWav(inputPath: string, outputPath: string): Promise<void> {
    this.calls++;
    const head = (await readFile(inputPath)).subarray(0, 4).toString("ascii");
    if (head !== "RIFF") throw new InvalidAudioError("reference audio could not be decoded");
    await copyFile(inputPath, outputPath);
  }
}

export type FakeRoute =
  | { status?: number; body?: Buffer | string; headers?: Record<string, string> }
  | { networkError: string }
  | { hang: true };

/**
 * In-process stand-in for the remote host serving reference audio. Each URL
 * maps to a route, or to a list of routes consumed one per call.
 */
export function fakeFetch(routes: Record<string, FakeRoute | FakeRoute[]>) {
  const calls: string[] = [];
  const bodies: string[] = [];

  const impl: typeof fetch = async (input, init) => {
    const url = typeof input === "string" ? input : input instanceof URL ? input.href : input.url;
    calls.push(url);
    if (typeof init?.body === "string") bodies.push(init.body);

    const entry = routes[url];
    const route = Array.isArray(entry) ? entry[Math.min(calls.filter((u) => u === url).length, entry.length) - 1] : entry;
    if (!route) return new Response("not found", { status: 404 });

    if ("networkError" in route) throw new TypeError(`fetch failed: ${route.networkError}`);

    if ("hang" in route) {
      return new Promise<Response>((_resolve, reject) => {
        const signal = init?.signal;
        signal?.addEventListener("abort", () => reject(signal.reason), { once: true });
      });
    }

    const body = typeof route.body === "string" || route.body === undefined ? (route.body ?? "") : Uint8Array.from(route.body);
    return new Response(body, { status: route.status ?? 200, headers: route.headers });
  };

  return { impl, calls, bodies };
}

export function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    ...loadConfig({}, []),
    fetchRetryDelayMs: 1,
    fetchTimeoutMs: 1000,
    ...overrides,
  };
}

export async function makeModelDir(): Promise<string> {
  const dir = await mkdtemp(path.join(tmpdir(), "model-"));
  for (const f of REQUIRED_MODEL_FILES) await writeFile(path.join(dir, f), "weights");
  return dir;
}

export function deferred<T = void>() {
  let resolve: (v: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}
