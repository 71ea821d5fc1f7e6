export type ErrorKind =
  | "ValidationError"
  | "FetchError"
  | "InvalidAudioError"
  | "PayloadTooLargeError"
  | "Overloaded"
  | "TextTooLongError"
  | "SynthesisError"
  | "Cancelled"
  | "NotReady"
  | "NotFound"
  | "Internal";

export type ErrorBody = {
  ok: false;
  error: {
    kind: ErrorKind;
    message: string;
    field?: string;
    requestId?: string;
  };
};

type ServiceErrorOptions = {
  retryable?: boolean;
  field?: string;
  cause?: unknown;
};

export class ServiceError extends Error {
  readonly kind: ErrorKind;
  readonly status: number;
  readonly retryable: boolean;
  readonly field?: string;

  constructor(kind: ErrorKind, status: number, message: string, opts: ServiceErrorOptions = {}) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = kind;
    this.kind = kind;
    this.status = status;
    this.retryable = opts.retryable ?? false;
    this.field = opts.field;
  }

  toBody(requestId?: string): ErrorBody {
    return {
      ok: false,
      error: {
        kind: this.kind,
        message: this.message,
        ...(this.field ? { field: this.field } : {}),
        ...(requestId ? { requestId } : {}),
      },
    };
  }
}

export class ValidationError extends ServiceError {
  constructor(field: string, message: string) {
    super("ValidationError", 400, message, { field });
  }
}

export class FetchError extends ServiceError {
  readonly upstreamStatus?: number;

  constructor(message: string, opts: { retryable: boolean; upstreamStatus?: number; cause?: unknown }) {
    super("FetchError", 502, message, { retryable: opts.retryable, field: "reference_source", cause: opts.cause });
    this.upstreamStatus = opts.upstreamStatus;
  }
}

export class InvalidAudioError extends ServiceError {
  constructor(message: string, cause?: unknown) {
    super("InvalidAudioError", 422, message, { field: "reference_source", cause });
  }
}

export class PayloadTooLargeError extends ServiceError {
  constructor(limitBytes: number) {
    super("PayloadTooLargeError", 413, `reference audio exceeds ${limitBytes} bytes`, { field: "reference_source" });
  }
}

export class OverloadedError extends ServiceError {
  readonly retryAfterSec: number;

  constructor(waitedMs: number, retryAfterSec = 1) {
    super("Overloaded", 429, `no inference slot became free within ${waitedMs}ms`, { retryable: true });
    this.retryAfterSec = retryAfterSec;
  }
}

export class TextTooLongError extends ServiceError {
  constructor(length: number, limit: number, what = "text segment") {
    super("TextTooLongError", 422, `${what} of ${length} chars exceeds the ${limit} char ceiling`, {
      field: "text",
    });
  }
}

export class SynthesisError extends ServiceError {
  constructor(message: string, cause?: unknown) {
    super("SynthesisError", 500, message, { cause });
  }
}

export class CancelledError extends ServiceError {
  constructor(message = "request cancelled by client") {
    super("Cancelled", 499, message);
  }
}

export class NotReadyError extends ServiceError {
  constructor(message = "model is not loaded") {
    super("NotReady", 503, message);
  }
}

export function describeError(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}

export function toServiceError(e: unknown): ServiceError {
  if (e instanceof ServiceError) return e;
  return new ServiceError("Internal", 500, describeError(e), { cause: e });
}
