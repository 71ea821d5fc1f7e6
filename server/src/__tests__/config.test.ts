import { loadConfig } from "../config";

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    const cfg = loadConfig({}, []);
    expect(cfg).toMatchObject({
      host: "0.0.0.0",
      port: 6008,
      modelDir: "checkpoints",
      logLevel: "info",
      maxConcurrency: 1,
      admissionTimeoutMs: 30_000,
      fetchMaxAttempts: 3,
      fetchRetryDelayMs: 500,
      maxTextChars: 5000,
      standardMaxChars: 300,
      chunkChars: 120,
      chunkHardLimit: 400,
      chunkGapMs: 80,
      referenceSampleRate: 16000,
      streamChunkBytes: 65536,
      corsOrigins: ["*"],
    });
    expect(cfg.logFile).toBeUndefined();
  });

  it("reads the environment and ignores empty values", () => {
    const cfg = loadConfig({ PORT: "7000", MAX_CONCURRENT_INFERENCES: "4", LOG_LEVEL: "WARNING", HOST: "" }, []);
    expect(cfg.port).toBe(7000);
    expect(cfg.maxConcurrency).toBe(4);
    expect(cfg.logLevel).toBe("warn");
    expect(cfg.host).toBe("0.0.0.0");
  });

  it("lets flags override the environment", () => {
    const cfg = loadConfig({ PORT: "7000", MODEL_DIR: "/env/models" }, [
      "--port",
      "7100",
      "--model_dir",
      "/flag/models",
      "--log_level",
      "debug",
    ]);
    expect(cfg.port).toBe(7100);
    expect(cfg.modelDir).toBe("/flag/models");
    expect(cfg.logLevel).toBe("debug");
  });

  it("splits the allowed CORS origins", () => {
    expect(loadConfig({ CORS_ORIGINS: "https://a.test, https://b.test," }, []).corsOrigins).toEqual([
      "https://a.test",
      "https://b.test",
    ]);
    expect(() => loadConfig({ CORS_ORIGINS: " , " }, [])).toThrow(/^invalid configuration CORS_ORIGINS: /);
  });

  it("names the offending setting", () => {
    expect(() => loadConfig({ PORT: "abc" }, [])).toThrow(/^invalid configuration PORT: /);
    expect(() => loadConfig({ MAX_CONCURRENT_INFERENCES: "0" }, [])).toThrow(
      /^invalid configuration MAX_CONCURRENT_INFERENCES: /,
    );
    expect(() => loadConfig({ LOG_LEVEL: "verbose" }, [])).toThrow(/^invalid configuration LOG_LEVEL: /);
  });

  it("requires the preferred chunk size to fit under the hard limit", () => {
    expect(() => loadConfig({ CHUNK_CHARS: "500", CHUNK_HARD_LIMIT: "400" }, [])).toThrow(
      "invalid configuration CHUNK_CHARS: must not exceed CHUNK_HARD_LIMIT (400)",
    );
  });

  it("rejects unknown flags", () => {
    expect(() => loadConfig({}, ["--verbose"])).toThrow();
  });
});
