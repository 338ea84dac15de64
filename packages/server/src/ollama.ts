/**
 * Ollama generation backend.
 *
 * Calls `POST /api/generate` with `stream: true` and turns the NDJSON
 * response into StreamChunks as lines arrive. Uses node:http/node:https
 * directly; the request is torn down when the caller's signal aborts.
 */

import http from "node:http";
import https from "node:https";

import { BackendError, BackendInitError, silentLogger } from "@localpilot/core";
import type {
  GenerateRequest,
  GenerationBackend,
  Logger,
  StreamChunk,
} from "@localpilot/core";

const DEFAULT_PORT = "11434";

export interface OllamaBackendOptions {
  /** `OLLAMA_HOST`-style address: "host", "host:port", or a full URL. */
  host: string;
  logger?: Logger;
}

/** One line of the `/api/generate` NDJSON stream (fields we read). */
interface GenerateLine {
  response?: string;
  done?: boolean;
  done_reason?: string;
  error?: string;
}

function hasOptional(value: object, key: string, type: "string" | "boolean"): boolean {
  const field: unknown = Reflect.get(value, key);
  return field === undefined || typeof field === type;
}

function isGenerateLine(value: unknown): value is GenerateLine {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return false;
  return (
    hasOptional(value, "response", "string") &&
    hasOptional(value, "done", "boolean") &&
    hasOptional(value, "done_reason", "string") &&
    hasOptional(value, "error", "string")
  );
}

/**
 * Parse an Ollama host setting the way the Ollama CLI does: the scheme
 * is optional (http), and a bare host gets port 11434. A bare IPv6
 * address is bracketed and also gets port 11434. An explicit
 * http/https scheme without a port uses 80/443.
 *
 * @throws BackendInitError for an unsupported scheme or unparsable host.
 */
export function resolveOllamaHost(raw: string): URL {
  const value = raw.trim();
  let candidate: string;
  if (value === "") {
    candidate = `http://127.0.0.1:${DEFAULT_PORT}`;
  } else if (value.includes("://")) {
    candidate = value;
  } else {
    const [hostport, ...rest] = value.split("/");
    let withPort: string;
    if (!hostport.startsWith("[") && hostport.split(":").length > 2) {
      // Unbracketed IPv6 literal; it carries no port.
      withPort = `[${hostport}]:${DEFAULT_PORT}`;
    } else if (/:\d+$/.test(hostport) && !/^\[[^\]]*\]$/.test(hostport)) {
      withPort = hostport;
    } else {
      withPort = `${hostport}:${DEFAULT_PORT}`;
    }
    candidate = `http://${[withPort, ...rest].join("/")}`;
  }

  let url: URL;
  try {
    url = new URL(candidate);
  } catch (err: unknown) {
    throw new BackendInitError(`Invalid Ollama host "${raw}"`, { cause: err });
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new BackendInitError(
      `Unsupported Ollama host scheme "${url.protocol}" in "${raw}"`,
    );
  }
  return url;
}

/** Request body for `/api/generate`. Undefined sampling fields are left out. */
export function toGenerateBody(request: GenerateRequest): Record<string, unknown> {
  const { options } = request;
  return {
    model: request.model,
    prompt: request.prompt,
    system: request.system,
    stream: true,
    options: {
      temperature: options.temperature,
      top_p: options.topP,
      stop: [...options.stop],
      num_predict: options.numPredict,
    },
  };
}

function errorMessageFrom(body: string): string {
  try {
    const parsed: unknown = JSON.parse(body);
    if (isGenerateLine(parsed) && parsed.error) return parsed.error;
  } catch {
    // not JSON; fall through to the raw text
  }
  return body.trim() || "no response body";
}

export function createOllamaBackend(options: OllamaBackendOptions): GenerationBackend {
  const base = resolveOllamaHost(options.host);
  const logger = options.logger ?? silentLogger;
  const transport = base.protocol === "https:" ? https : http;
  const hostname = base.hostname.replace(/^\[(.*)\]$/, "$1");
  const path = `${base.pathname.replace(/\/+$/, "")}/api/generate`;

  logger.debug("ollama backend configured", { url: `${base.origin}${path}` });

  return {
    name: "ollama",

    generate(
      request: GenerateRequest,
      onChunk: (chunk: StreamChunk) => void,
      signal: AbortSignal,
    ): Promise<void> {
      return new Promise<void>((resolve, reject) => {
        if (signal.aborted) {
          reject(signal.reason);
          return;
        }

        let settled = false;
        const fail = (err: unknown): void => {
          if (settled) return;
          settled = true;
          reject(signal.aborted ? signal.reason : err);
          if (!req.destroyed) req.destroy();
        };
        const succeed = (): void => {
          if (settled) return;
          settled = true;
          resolve();
        };

        const body = Buffer.from(JSON.stringify(toGenerateBody(request)), "utf8");

        const req = transport.request(
          {
            hostname,
            port: base.port,
            path,
            method: "POST",
            headers: {
              "content-type": "application/json",
              "content-length": body.length,
              accept: "application/x-ndjson",
            },
            signal,
          },
          (res) => {
            res.setEncoding("utf8");
            const status = res.statusCode ?? 0;

            if (status !== 200) {
              let errorText = "";
              res.on("data", (chunk: string) => {
                errorText += chunk;
              });
              res.on("end", () => {
                fail(
                  new BackendError(
                    `Ollama returned ${status}: ${errorMessageFrom(errorText)}`,
                    status,
                  ),
                );
              });
              res.on("error", fail);
              return;
            }

            let pending = "";
            const handleLine = (line: string): void => {
              const trimmed = line.trim();
              if (!trimmed) return;
              let parsed: unknown;
              try {
                parsed = JSON.parse(trimmed);
              } catch (err: unknown) {
                throw new BackendError(`Malformed stream line from Ollama: ${trimmed}`, status, {
                  cause: err,
                });
              }
              if (!isGenerateLine(parsed)) {
                throw new BackendError(`Unexpected stream line from Ollama: ${trimmed}`, status);
              }
              if (parsed.error) {
                throw new BackendError(`Ollama stream error: ${parsed.error}`, status);
              }
              onChunk({
                text: parsed.response ?? "",
                final: parsed.done === true,
                doneReason: parsed.done_reason,
              });
            };

            res.on("data", (chunk: string) => {
              if (settled) return;
              pending += chunk;
              let newline = pending.indexOf("\n");
              try {
                while (newline !== -1) {
                  const line = pending.slice(0, newline);
                  pending = pending.slice(newline + 1);
                  handleLine(line);
                  if (settled) return;
                  newline = pending.indexOf("\n");
                }
              } catch (err: unknown) {
                fail(err);
              }
            });

            res.on("end", () => {
              if (settled) return;
              try {
                handleLine(pending);
                pending = "";
                succeed();
              } catch (err: unknown) {
                fail(err);
              }
            });

            res.on("error", fail);
            res.on("close", () => {
              if (!res.complete) {
                fail(new BackendError("Ollama stream closed before it completed", status));
              }
            });
          },
        );

        req.on("error", (err) =>
          fail(new BackendError(`Ollama request failed: ${err.message}`, null, { cause: err })),
        );
        req.end(body);
      });
    },
  };
}
