/**
 * Error taxonomy shared by every localpilot package.
 *
 * Anything that fails before the first response byte is written maps to
 * an HTTP status via `httpStatusFor()`. Anything after that point can
 * only be reported in-band, so the stream errors below are used as
 * AbortSignal reasons rather than thrown to the HTTP layer.
 */

export type ErrorCode =
  | "decode_error"
  | "template_error"
  | "backend_init_error"
  | "backend_error"
  | "stream_timeout"
  | "stream_cancelled"
  | "certificate_generation_error"
  | "listener_bind_error"
  | "config_error";

export class LocalpilotError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Request body is not a valid completion request. */
export class DecodeError extends LocalpilotError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("decode_error", message, options);
  }
}

/** Prompt template failed to parse or to render. */
export class TemplateError extends LocalpilotError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("template_error", message, options);
  }
}

/** The generation backend could not be set up. */
export class BackendInitError extends LocalpilotError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("backend_init_error", message, options);
  }
}

/** The backend rejected or broke a generate call. */
export class BackendError extends LocalpilotError {
  /** Upstream HTTP status, or null when the failure was below HTTP. */
  readonly status: number | null;

  constructor(
    message: string,
    status: number | null = null,
    options?: { cause?: unknown },
  ) {
    super("backend_error", message, options);
    this.status = status;
  }
}

export class StreamTimeoutError extends LocalpilotError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super("stream_timeout", `Completion stream exceeded ${timeoutMs}ms`);
    this.timeoutMs = timeoutMs;
  }
}

export class StreamCancelledError extends LocalpilotError {
  constructor(message = "Client disconnected before the completion finished") {
    super("stream_cancelled", message);
  }
}

export class CertificateGenerationError extends LocalpilotError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("certificate_generation_error", message, options);
  }
}

export class ListenerBindError extends LocalpilotError {
  /** The `host:port` that could not be bound. */
  readonly address: string;

  constructor(address: string, options?: { cause?: unknown }) {
    const detail =
      options?.cause instanceof Error ? `: ${options.cause.message}` : "";
    super("listener_bind_error", `Failed to listen on ${address}${detail}`, options);
    this.address = address;
  }
}

export class ConfigError extends LocalpilotError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("config_error", message, options);
  }
}

/**
 * Status code for an error raised before any response body was written.
 * Unknown errors are server errors.
 */
export function httpStatusFor(err: unknown): number {
  if (err instanceof DecodeError) return 400;
  return 500;
}

/** `{ error: { code, message } }` body for a pre-stream failure. */
export function errorBody(err: unknown): {
  error: { code: string; message: string };
} {
  if (err instanceof LocalpilotError) {
    return { error: { code: err.code, message: err.message } };
  }
  return {
    error: {
      code: "internal_error",
      message: err instanceof Error ? err.message : String(err),
    },
  };
}
