/**
 * CompletionRelay: turns one inbound completion request into one backend
 * generate call and streams the result back as SSE records.
 *
 * Request lifecycle:
 * 1. Received: only POST; buffer and decode the JSON body (400 on error)
 * 2. Building: windowed prompt, system prompt, generation options
 *    (TemplateError is a 500, out-of-range sampling values a 400)
 * 3. Streaming: headers are committed, then exactly one backend call runs
 *    under a deadline and the client's disconnect. Each fragment passes
 *    through the per-request filter and becomes one record
 * 4. Completed when the backend's final flag fires the one-shot gate;
 *    Cancelled when the deadline, a disconnect, or a backend failure gets
 *    there first. A cancelled stream that can still be written to gets one
 *    synthetic terminal record.
 *
 * Nothing is retried. The relay keeps no state between requests.
 */

import { randomUUID } from "node:crypto";
import type http from "node:http";

import {
  BackendError,
  DecodeError,
  StreamCancelledError,
  StreamTimeoutError,
  buildGenerationOptions,
  buildSystemPrompt,
  buildTaskPrompt,
  decodeCompletionRequest,
  errorBody,
  httpStatusFor,
  passthroughFilterFactory,
  silentLogger,
} from "@localpilot/core";
import type {
  ChunkFilterFactory,
  CompletionChoice,
  CompletionEnvelope,
  CompletionRequest,
  GenerateRequest,
  GenerationBackend,
  Logger,
  PromptTemplate,
  PromptWindow,
  StreamChunk,
  TerminalRecord,
} from "@localpilot/core";

export const SSE_HEADERS = {
  "content-type": "text/event-stream",
  "cache-control": "no-cache",
} as const;

export type RelayState =
  | "received"
  | "building"
  | "streaming"
  | "completed"
  | "cancelled"
  | "failed";

export interface RelayOutcome {
  state: Extract<RelayState, "completed" | "cancelled" | "failed">;
  /** HTTP status that was sent. */
  status: number;
  /** Why the request did not complete. */
  reason?: unknown;
  /** Records written, not counting the terminal record. */
  records: number;
  durationMs: number;
}

export interface CompletionRelayOptions {
  backend: GenerationBackend;
  model: string;
  /** Ceiling for num_predict. */
  numPredict: number;
  template: PromptTemplate;
  /** Wall-clock deadline for the whole stream. */
  timeoutMs: number;
  window?: PromptWindow;
  /** Builds the fragment filter for each request. Defaults to passthrough. */
  createFilter?: ChunkFilterFactory;
  logger?: Logger;
}

export interface CompletionRelay {
  handle(req: http.IncomingMessage, res: http.ServerResponse): Promise<RelayOutcome>;
}

// --- Completion gate ---

/** One-shot latch: only the first `fire()` counts. */
export interface CompletionGate {
  readonly fired: boolean;
  /** Returns true for the call that fired the gate, false afterwards. */
  fire(): boolean;
  /** Resolves once the gate has fired. */
  readonly done: Promise<void>;
}

export function createCompletionGate(): CompletionGate {
  let fired = false;
  let release: () => void = () => {};
  const done = new Promise<void>((resolve) => {
    release = resolve;
  });
  return {
    get fired() {
      return fired;
    },
    fire() {
      if (fired) return false;
      fired = true;
      release();
      return true;
    },
    done,
  };
}

// --- Records ---

export function buildEnvelope(text: string, finishReason?: string): CompletionEnvelope {
  const choice: CompletionChoice = { text, index: 0 };
  if (finishReason !== undefined) choice.finish_reason = finishReason;
  return {
    id: randomUUID(),
    created: Math.floor(Date.now() / 1000),
    choices: [choice],
  };
}

/**
 * The record closing a stream that never saw the backend's final flag.
 * Only the elapsed time is real; engine counters are zero.
 */
export function buildTerminalRecord(model: string, elapsedMs: number): TerminalRecord {
  return {
    chunk: {
      model,
      created_at: new Date().toISOString(),
      response: "",
      done: true,
      context: [],
      total_duration: Math.round(elapsedMs * 1e6),
      load_duration: 0,
      prompt_eval_count: 0,
      prompt_eval_duration: 0,
      eval_count: 0,
      eval_duration: 0,
    },
  };
}

export function formatRecord(record: CompletionEnvelope | TerminalRecord): string {
  return `data: ${JSON.stringify(record)}\n\n`;
}

// --- Helpers ---

function readBody(req: http.IncomingMessage): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    req.on("data", (chunk: Buffer) => chunks.push(chunk));
    req.on("end", () => resolve(Buffer.concat(chunks)));
    req.on("error", reject);
  });
}

function sendJson(res: http.ServerResponse, status: number, body: unknown): void {
  if (res.headersSent || res.destroyed) return;
  const payload = JSON.stringify(body);
  res.writeHead(status, {
    "content-type": "application/json",
    "content-length": Buffer.byteLength(payload),
  });
  res.end(payload);
}

type StreamResult =
  | { kind: "gate" }
  | { kind: "aborted"; reason: unknown }
  | { kind: "settled" }
  | { kind: "rejected"; err: unknown };

// --- Relay ---

export function createCompletionRelay(options: CompletionRelayOptions): CompletionRelay {
  const logger = options.logger ?? silentLogger;
  const createFilter = options.createFilter ?? passthroughFilterFactory;
  const { backend, model, numPredict, template, timeoutMs, window } = options;

  function fail(
    res: http.ServerResponse,
    err: unknown,
    startedAt: number,
  ): RelayOutcome {
    const status = httpStatusFor(err);
    if (status >= 500) {
      logger.error("completion request failed", { status, err });
    } else {
      logger.warn("completion request rejected", { status, err });
    }
    sendJson(res, status, errorBody(err));
    return {
      state: "failed",
      status,
      reason: err,
      records: 0,
      durationMs: performance.now() - startedAt,
    };
  }

  function build(request: CompletionRequest): GenerateRequest {
    const language = request.language;
    return {
      model,
      prompt: buildTaskPrompt(request.prefix, request.suffix, template, {
        language,
        window,
      }),
      system: buildSystemPrompt(language),
      options: buildGenerationOptions(request, numPredict),
    };
  }

  async function stream(
    res: http.ServerResponse,
    request: CompletionRequest,
    generateRequest: GenerateRequest,
    startedAt: number,
  ): Promise<RelayOutcome> {
    const gate = createCompletionGate();
    const filter = createFilter({ language: request.language });
    let records = 0;

    res.writeHead(200, SSE_HEADERS);
    res.flushHeaders();

    const controller = new AbortController();
    const { signal } = controller;
    const timer = setTimeout(() => controller.abort(new StreamTimeoutError(timeoutMs)), timeoutMs);
    const onClose = (): void => {
      if (!res.writableFinished) controller.abort(new StreamCancelledError());
    };
    res.on("close", onClose);

    const onChunk = (chunk: StreamChunk): void => {
      if (gate.fired || signal.aborted) return;
      const text = filter.apply(chunk.text);
      if (text !== null && !res.destroyed) {
        const finishReason = chunk.final ? (chunk.doneReason ?? "stop") : undefined;
        res.write(formatRecord(buildEnvelope(text, finishReason)));
        records++;
      }
      if (chunk.final) gate.fire();
    };

    let result: StreamResult;
    try {
      const aborted = new Promise<StreamResult>((resolve) => {
        signal.addEventListener("abort", () => resolve({ kind: "aborted", reason: signal.reason }), {
          once: true,
        });
      });
      // A synchronous throw from generate() lands in the rejection branch.
      const generation = Promise.resolve()
        .then(() => backend.generate(generateRequest, onChunk, signal))
        .then(
          (): StreamResult => ({ kind: "settled" }),
          (err: unknown): StreamResult => ({ kind: "rejected", err }),
        );
      const gated = gate.done.then((): StreamResult => ({ kind: "gate" }));
      result = await Promise.race([gated, aborted, generation]);
    } finally {
      clearTimeout(timer);
      res.off("close", onClose);
    }

    const durationMs = performance.now() - startedAt;

    if (gate.fired) {
      // Release the backend call; anything it sends from here on is ignored.
      controller.abort();
      res.end();
      logger.debug("completion finished", { records, durationMs: Math.round(durationMs) });
      return { state: "completed", status: 200, records, durationMs };
    }

    let reason: unknown;
    switch (result.kind) {
      case "aborted":
        reason = result.reason;
        break;
      case "rejected":
        reason = signal.aborted ? signal.reason : result.err;
        break;
      default:
        reason = new BackendError("Backend stream ended before its final fragment");
    }
    // Stop the backend call if it is still running.
    if (!signal.aborted) controller.abort(reason);

    logger.warn("generator ended with error", { reason, records });
    if (!res.destroyed && res.writable) {
      res.write(formatRecord(buildTerminalRecord(model, durationMs)));
    }
    res.end();
    return { state: "cancelled", status: 200, reason, records, durationMs };
  }

  return {
    async handle(req, res) {
      const startedAt = performance.now();

      // Received
      if (req.method !== "POST") {
        res.setHeader("allow", "POST");
        sendJson(res, 405, {
          error: { code: "method_not_allowed", message: `Method ${req.method} not allowed` },
        });
        req.resume();
        return {
          state: "failed",
          status: 405,
          records: 0,
          durationMs: performance.now() - startedAt,
        };
      }

      let request: CompletionRequest;
      try {
        request = decodeCompletionRequest(await readBody(req));
      } catch (err: unknown) {
        if (!(err instanceof DecodeError)) {
          // The client went away while sending the body.
          logger.debug("request body aborted", { err });
          return {
            state: "failed",
            status: 0,
            reason: err,
            records: 0,
            durationMs: performance.now() - startedAt,
          };
        }
        return fail(res, err, startedAt);
      }

      logger.debug("incoming completion request", {
        language: request.language,
        prefixChars: request.prefix.length,
        suffixChars: request.suffix.length,
        maxTokens: request.maxTokens,
      });

      // Building
      let generateRequest: GenerateRequest;
      try {
        generateRequest = build(request);
      } catch (err: unknown) {
        return fail(res, err, startedAt);
      }

      // Streaming
      return stream(res, request, generateRequest, startedAt);
    },
  };
}
