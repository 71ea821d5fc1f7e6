import fs from "fs/promises";
import path from "path";

import { NotReadyError, describeError } from "../errors";
import { Logger } from "../logging/logger";
import type { Waveform } from "../audio/types";
import type { ModelInput, SynthesisModel } from "./types";

export const REQUIRED_MODEL_FILES = ["bigvgan_generator.pth", "bpe.model", "gpt.pth", "config.yaml"] as const;

export type ModelState = "unloaded" | "loading" | "ready" | "failed";

const log = new Logger("model");

export class ModelHandle {
  private _state: ModelState = "unloaded";
  private _error: string | null = null;
  private _loadedAt: Date | null = null;

  constructor(
    private readonly model: SynthesisModel,
    private readonly modelDir: string,
  ) {}

  get state(): ModelState {
    return this._state;
  }

  get isReady(): boolean {
    return this._state === "ready";
  }

  describe() {
    return {
      name: this.model.name,
      state: this._state,
      modelDir: this.modelDir,
      sampleRate: this.model.sampleRate,
      loadedAt: this._loadedAt?.toISOString() ?? null,
      error: this._error,
    };
  }

  async load(): Promise<void> {
    this._state = "loading";
    try {
      log.info(`checking model files in ${this.modelDir}`);
      for (const file of REQUIRED_MODEL_FILES) {
        const p = path.join(this.modelDir, file);
        try {
          await fs.access(p);
        } catch (e) {
          log.error(`missing required model file: ${file} (${p})`);
          throw new Error(`Missing required model file: ${file} (${p})`, { cause: e });
        }
        log.info(`model file ok: ${file}`);
      }

      const started = Date.now();
      await this.model.load();
      this._loadedAt = new Date();
      this._state = "ready";
      log.info(`model ${this.model.name} ready in ${((Date.now() - started) / 1000).toFixed(2)}s`);
    } catch (e) {
      this._state = "failed";
      this._error = describeError(e);
      throw e;
    }
  }

  synthesize(input: ModelInput): Promise<Waveform> {
    if (!this.isReady) return Promise.reject(new NotReadyError());
    return this.model.synthesize(input);
  }
}
