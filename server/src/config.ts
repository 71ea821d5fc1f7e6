import { parseArgs } from "util";
import { z } from "zod";

const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

const intFrom = (min: number) => z.coerce.number().int().min(min);

const configSchema = z.object({
  host: z.string().min(1).default("0.0.0.0"),
  port: intFrom(0).max(65535).default(6008),
  modelDir: z.string().min(1).default("checkpoints"),
  modelServiceUrl: z.string().url().default("http://127.0.0.1:8100"),
  modelTimeoutMs: intFrom(1).default(300_000),
  logLevel: z
    .string()
    .transform((s) => (s.toLowerCase() === "warning" ? "warn" : s.toLowerCase()))
    .pipe(z.enum(LOG_LEVELS))
    .default("info"),
  logFile: z.string().min(1).optional(),
  maxConcurrency: intFrom(1).default(1),
  admissionTimeoutMs: intFrom(0).default(30_000),
  fetchTimeoutMs: intFrom(1).default(30_000),
  fetchMaxAttempts: intFrom(1).default(3),
  fetchRetryDelayMs: intFrom(0).default(500),
  maxReferenceBytes: intFrom(1).default(20 * 1024 * 1024),
  minReferenceBytes: intFrom(0).default(16),
  maxTextChars: intFrom(1).default(5000),
  standardMaxChars: intFrom(1).default(300),
  chunkChars: intFrom(1).default(120),
  chunkHardLimit: intFrom(1).default(400),
  chunkGapMs: intFrom(0).default(80),
  ffmpegPath: z.string().min(1).default("ffmpeg"),
  referenceSampleRate: intFrom(8000).default(16000),
  streamChunkBytes: intFrom(1).default(64 * 1024),
  // comma-separated; "*" allows any origin
  corsOrigins: z
    .string()
    .transform((s) =>
      s
        .split(",")
        .map((o) => o.trim())
        .filter((o) => o.length > 0),
    )
    .pipe(z.array(z.string()).min(1))
    .default("*"),
});

export type AppConfig = z.infer<typeof configSchema>;

const ENV_BINDINGS: ReadonlyArray<readonly [keyof AppConfig, string]> = [
  ["host", "HOST"],
  ["port", "PORT"],
  ["modelDir", "MODEL_DIR"],
  ["modelServiceUrl", "MODEL_SERVICE_URL"],
  ["modelTimeoutMs", "MODEL_TIMEOUT_MS"],
  ["logLevel", "LOG_LEVEL"],
  ["logFile", "LOG_FILE"],
  ["maxConcurrency", "MAX_CONCURRENT_INFERENCES"],
  ["admissionTimeoutMs", "ADMISSION_TIMEOUT_MS"],
  ["fetchTimeoutMs", "FETCH_TIMEOUT_MS"],
  ["fetchMaxAttempts", "FETCH_MAX_ATTEMPTS"],
  ["fetchRetryDelayMs", "FETCH_RETRY_DELAY_MS"],
  ["maxReferenceBytes", "MAX_REFERENCE_BYTES"],
  ["minReferenceBytes", "MIN_REFERENCE_BYTES"],
  ["maxTextChars", "MAX_TEXT_CHARS"],
  ["standardMaxChars", "STANDARD_MAX_CHARS"],
  ["chunkChars", "CHUNK_CHARS"],
  ["chunkHardLimit", "CHUNK_HARD_LIMIT"],
  ["chunkGapMs", "CHUNK_GAP_MS"],
  ["ffmpegPath", "FFMPEG_PATH"],
  ["referenceSampleRate", "REFERENCE_SAMPLE_RATE"],
  ["streamChunkBytes", "STREAM_CHUNK_BYTES"],
  ["corsOrigins", "CORS_ORIGINS"],
];

type RawConfig = Partial<Record<keyof AppConfig, string>>;

function fromEnv(env: NodeJS.ProcessEnv): RawConfig {
  const raw: RawConfig = {};
  for (const [key, envName] of ENV_BINDINGS) {
    const v = env[envName];
    if (v !== undefined && v !== "") raw[key] = v;
  }
  return raw;
}

function fromArgs(argv: string[]): RawConfig {
  const { values } = parseArgs({
    args: argv,
    options: {
      host: { type: "string" },
      port: { type: "string" },
      model_dir: { type: "string" },
      log_level: { type: "string" },
      log_file: { type: "string" },
      max_concurrency: { type: "string" },
    },
    strict: true,
    allowPositionals: false,
  });

  const raw: RawConfig = {};
  if (values.host !== undefined) raw.host = values.host;
  if (values.port !== undefined) raw.port = values.port;
  if (values.model_dir !== undefined) raw.modelDir = values.model_dir;
  if (values.log_level !== undefined) raw.logLevel = values.log_level;
  if (values.log_file !== undefined) raw.logFile = values.log_file;
  if (values.max_concurrency !== undefined) raw.maxConcurrency = values.max_concurrency;
  return raw;
}

function settingName(key: string): string {
  return ENV_BINDINGS.find(([k]) => k === key)?.[1] ?? key;
}

// flags > env > defaults
export function loadConfig(env: NodeJS.ProcessEnv = process.env, argv: string[] = process.argv.slice(2)): AppConfig {
  const raw = { ...fromEnv(env), ...fromArgs(argv) };
  const parsed = configSchema.safeParse(raw);

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`invalid configuration ${settingName(String(issue.path[0] ?? "config"))}: ${issue.message}`);
  }

  const cfg = parsed.data;
  if (cfg.chunkChars > cfg.chunkHardLimit) {
    throw new Error(`invalid configuration CHUNK_CHARS: must not exceed CHUNK_HARD_LIMIT (${cfg.chunkHardLimit})`);
  }
  return cfg;
}
