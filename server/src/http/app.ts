import cors from "cors";
import express from "express";

import type { HealthReporter } from "../health/health_reporter";
import { Logger } from "../logging/logger";
import { streamResult } from "../streaming/response_streamer";
import { newRequestId } from "../tts/request_id";
import type { TtsService } from "../tts/tts_service";
import { errorHandler, notFound, requestLogger } from "./middleware";
import { buildRequestSchema, parseSynthesisRequest, type RequestLimits } from "./schema";

type AppDeps = {
  service: TtsService;
  health: HealthReporter;
  limits: RequestLimits;
  corsOrigins: string[];
  streamChunkBytes?: number;
};

// headers a cross-origin caller needs to read off the audio response
const EXPOSED_HEADERS = [
  "Content-Disposition",
  "Retry-After",
  "X-Request-ID",
  "X-Sampling-Rate",
  "X-Inference-Mode",
  "X-Audio-Duration",
  "X-Chunk-Count",
];

const log = new Logger("http");

export function createApp(deps: AppDeps): express.Express {
  const { service, health } = deps;
  const schema = buildRequestSchema(deps.limits);

  const app = express();
  app.disable("x-powered-by");
  app.use(requestLogger);
  app.use(
    cors({
      origin: deps.corsOrigins.includes("*") ? true : deps.corsOrigins,
      credentials: true,
      exposedHeaders: EXPOSED_HEADERS,
    }),
  );
  app.use(express.json({ limit: "1mb" }));

  app.get("/healthz", (_req, res) => res.status(200).send("ok"));

  app.get(["/health", "/readyz"], (_req, res) => {
    const report = health.report();
    res.status(report.status === "healthy" ? 200 : 503).json(report);
  });

  app.post(["/tts", "/v1/tts"], async (req, res, next) => {
    const requestId = newRequestId();
    res.locals.requestId = requestId;

    // fires on normal completion too; only an unfinished response means the client left
    const controller = new AbortController();
    const onClose = () => {
      if (!res.writableFinished) controller.abort();
    };
    res.on("close", onClose);

    try {
      const request = parseSynthesisRequest(req.body, schema);
      log.info(`[${requestId}] TTS request - text length ${request.text.length}, mode ${request.mode}`);

      const result = await service.synthesize(request, { requestId, signal: controller.signal });

      if (controller.signal.aborted) {
        result.take();
        log.warn(`[${requestId}] client disconnected before streaming, result dropped`);
        return;
      }

      const outcome = await streamResult(res, result, deps.streamChunkBytes);
      if (outcome === "client_closed") {
        log.warn(`[${requestId}] client disconnected mid-stream`);
      } else {
        log.info(`[${requestId}] streamed ${result.durationSec.toFixed(2)}s of audio at ${result.sampleRate}Hz`);
      }
    } catch (e) {
      next(e);
    } finally {
      res.off("close", onClose);
    }
  });

  app.use(notFound);
  app.use(errorHandler);

  return app;
}
