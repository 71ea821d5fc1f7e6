import type { ErrorRequestHandler, RequestHandler, Response } from "express";

import { OverloadedError, ServiceError, ValidationError, toServiceError } from "../errors";
import { Logger } from "../logging/logger";

const log = new Logger("http");

export function requestIdOf(res: Response): string | undefined {
  const id: unknown = res.locals.requestId;
  return typeof id === "string" ? id : undefined;
}

export const requestLogger: RequestHandler = (req, res, next) => {
  const started = process.hrtime.bigint();
  const clientIp = req.ip ?? "unknown";
  const userAgent = req.get("user-agent") ?? "unknown";

  log.info(`request start - ${req.method} ${req.path} - client ${clientIp} - user-agent ${userAgent}`);

  res.on("close", () => {
    const seconds = Number(process.hrtime.bigint() - started) / 1e9;
    const id = requestIdOf(res);
    const line = `request done - ${req.method} ${req.path} - status ${res.statusCode} - ${seconds.toFixed(3)}s${id ? ` - ${id}` : ""}${res.writableFinished ? "" : " - client closed"}`;
    if (res.statusCode >= 500) log.error(line);
    else if (res.statusCode >= 400) log.warn(line);
    else log.info(line);
  });

  next();
};

// body-parser marks its errors with a `type`
function bodyParserError(err: unknown): ServiceError | null {
  if (typeof err !== "object" || err === null || !("type" in err)) return null;
  if (err.type === "entity.parse.failed") return new ValidationError("body", "malformed JSON body");
  if (err.type === "entity.too.large") {
    return new ServiceError("ValidationError", 413, "request body too large", { field: "body" });
  }
  return null;
}

export const notFound: RequestHandler = (req, res) => {
  res.status(404).json(new ServiceError("NotFound", 404, `no route for ${req.method} ${req.path}`).toBody());
};

export const errorHandler: ErrorRequestHandler = (err, _req, res, _next) => {
  const requestId = requestIdOf(res);
  const se = bodyParserError(err) ?? toServiceError(err);
  const prefix = requestId ? `[${requestId}] ` : "";

  if (res.headersSent) {
    log.error(`${prefix}error after response started: ${se.message}`, err);
    res.destroy();
    return;
  }

  if (se.kind === "Cancelled") {
    log.info(`${prefix}${se.message}`);
  } else if (se.status >= 500) {
    log.error(`${prefix}${se.kind}: ${se.message}`, err);
  } else {
    log.warn(`${prefix}${se.kind}: ${se.message}`);
  }

  if (se instanceof OverloadedError) res.set("Retry-After", String(se.retryAfterSec));
  if (requestId) res.set("X-Request-ID", requestId);
  res.status(se.status).json(se.toBody(requestId));
};
