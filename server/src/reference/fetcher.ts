import { mkdtemp, readFile, rm, unlink, writeFile } from "fs/promises";
import { tmpdir } from "os";
import path from "path";

import { decodeWav } from "../audio/wav";
import {
  CancelledError,
  FetchError,
  InvalidAudioError,
  PayloadTooLargeError,
  ValidationError,
  describeError,
} from "../errors";
import { Logger } from "../logging/logger";
import { withRetry, type RetryPolicy } from "./retry";
import type { AudioTranscoder } from "./transcoder";
import type { Downloaded, FetchContext, ReferenceAsset } from "./types";

export type FetcherOptions = {
  transcoder: AudioTranscoder;
  timeoutMs: number;
  retry: RetryPolicy;
  maxBytes: number;
  minBytes: number;
  sampleRate: number;
  tmpRoot?: string;
  userAgent?: string;
  fetchImpl?: typeof fetch;
};

const EXT_BY_TYPE: Record<string, string> = {
  "audio/mpeg": ".mp3",
  "audio/mp3": ".mp3",
  "audio/wav": ".wav",
  "audio/wave": ".wav",
  "audio/x-wav": ".wav",
  "audio/ogg": ".ogg",
  "audio/opus": ".opus",
  "audio/flac": ".flac",
  "audio/x-flac": ".flac",
  "audio/aac": ".aac",
  "audio/mp4": ".m4a",
  "audio/x-m4a": ".m4a",
  "audio/webm": ".webm",
};

export function guessExtension(url: URL, contentType: string | null): string {
  if (contentType) {
    const ext = EXT_BY_TYPE[contentType.split(";")[0].trim().toLowerCase()];
    if (ext) return ext;
  }
  const fromPath = path.extname(url.pathname);
  return fromPath || ".bin";
}

export function parseReferenceUrl(source: string): URL {
  let url: URL;
  try {
    url = new URL(source);
  } catch {
    throw new ValidationError("reference_source", "reference_source must be an absolute URL");
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new ValidationError("reference_source", "Only http/https URLs are supported");
  }
  return url;
}

const log = new Logger("reference");

export class ReferenceAudioFetcher {
  private opts: FetcherOptions;
  private fetchImpl: typeof fetch;
  private live = 0;

  constructor(opts: FetcherOptions) {
    this.opts = opts;
    this.fetchImpl = opts.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  // acquired and not yet released
  get activeCount(): number {
    return this.live;
  }

  async withReference<T>(source: string, ctx: FetchContext, fn: (asset: ReferenceAsset) => Promise<T>): Promise<T> {
    const asset = await this.acquire(source, ctx);
    try {
      return await fn(asset);
    } finally {
      await asset.release();
    }
  }

  async acquire(source: string, ctx: FetchContext): Promise<ReferenceAsset> {
    const url = parseReferenceUrl(source);
    const started = Date.now();

    const downloaded = await withRetry(this.opts.retry, () => this.download(url, ctx), {
      signal: ctx.signal,
      label: `[${ctx.requestId}] fetch reference`,
    });

    if (downloaded.bytes.length < this.opts.minBytes) {
      throw new InvalidAudioError("Audio content is empty or too short");
    }
    log.info(
      `[${ctx.requestId}] reference downloaded: ${downloaded.bytes.length} bytes in ${((Date.now() - started) / 1000).toFixed(2)}s`,
    );

    const dir = await mkdtemp(path.join(this.opts.tmpRoot ?? tmpdir(), "ref-"));
    this.live++;

    let released = false;
    const release = async () => {
      if (released) return;
      released = true;
      try {
        await rm(dir, { recursive: true, force: true });
        log.debug(`[${ctx.requestId}] reference storage released`);
      } catch (e) {
        log.error(`[${ctx.requestId}] failed to remove reference storage ${dir}`, e);
        throw e;
      } finally {
        this.live--;
      }
    };

    try {
      const rawPath = path.join(dir, `input${guessExtension(url, downloaded.contentType)}`);
      const wavPath = path.join(dir, "reference.wav");

      await writeFile(rawPath, downloaded.bytes);
      if (ctx.signal?.aborted) throw new CancelledError("request cancelled before transcoding");
      await this.opts.transcoder.toWav(rawPath, wavPath, this.opts.sampleRate, ctx.signal);
      await unlink(rawPath);

      const wav = await readFile(wavPath);
      const decoded = decodeWav(wav);

      return {
        source,
        dir,
        wavPath,
        wav,
        sampleRate: decoded.sampleRate,
        durationSec: decoded.durationSec,
        originalBytes: downloaded.bytes.length,
        contentType: downloaded.contentType,
        release,
      };
    } catch (e) {
      await release();
      throw e;
    }
  }

  private async download(url: URL, ctx: FetchContext): Promise<Downloaded> {
    const timeout = AbortSignal.timeout(this.opts.timeoutMs);
    const signal = ctx.signal ? AbortSignal.any([ctx.signal, timeout]) : timeout;

    let resp: Response;
    try {
      resp = await this.fetchImpl(url, {
        headers: { "User-Agent": this.opts.userAgent ?? "voice-synthesis-gateway/1.0" },
        redirect: "follow",
        signal,
      });
    } catch (e) {
      throw this.classify(e, ctx.signal, timeout);
    }

    if (resp.status !== 200) {
      await resp.body?.cancel();
      throw new FetchError(`Fetch audio failed: ${resp.status}`, {
        retryable: resp.status >= 500 || resp.status === 429,
        upstreamStatus: resp.status,
      });
    }

    const declared = Number(resp.headers.get("content-length") ?? NaN);
    if (Number.isFinite(declared) && declared > this.opts.maxBytes) {
      await resp.body?.cancel();
      throw new PayloadTooLargeError(this.opts.maxBytes);
    }

    const chunks: Buffer[] = [];
    let total = 0;
    if (resp.body) {
      const reader = resp.body.getReader();
      for (;;) {
        const next = await reader.read().catch((e: unknown) => {
          throw this.classify(e, ctx.signal, timeout);
        });
        if (next.done) break;

        total += next.value.byteLength;
        if (total > this.opts.maxBytes) {
          await reader.cancel();
          throw new PayloadTooLargeError(this.opts.maxBytes);
        }
        chunks.push(Buffer.from(next.value));
      }
    }

    return { bytes: Buffer.concat(chunks), contentType: resp.headers.get("content-type") };
  }

  private classify(e: unknown, caller: AbortSignal | undefined, timeout: AbortSignal): Error {
    if (caller?.aborted) return new CancelledError("request cancelled while fetching reference audio");
    if (timeout.aborted) {
      return new FetchError(`Fetch timed out after ${this.opts.timeoutMs}ms`, { retryable: true, cause: e });
    }
    return new FetchError(`Fetch failed: ${describeError(e)}`, { retryable: true, cause: e });
  }
}
