/**
 * Decoding of the inbound completion request body.
 *
 * The body shape is fixed by the IDE integrations:
 *
 *   {extra:{language, next_indent, prompt_tokens, suffix_tokens,
 *           trim_by_indentation}, max_tokens, n, prompt, stop, stream,
 *    suffix, temperature, top_p}
 *
 * Every field is optional; `null` counts as absent. A field that is
 * present with the wrong type is a DecodeError, as is a body that is not
 * a JSON object.
 */

import { DecodeError } from "./errors.js";
import type { CompletionExtra, CompletionRequest } from "./types.js";

type Fields = Record<string, unknown>;

function isObject(value: unknown): value is Fields {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optional(obj: Fields, key: string): unknown {
  const value = obj[key];
  return value === null ? undefined : value;
}

function readString(obj: Fields, key: string, path: string): string | undefined {
  const value = optional(obj, key);
  if (value === undefined) return undefined;
  if (typeof value !== "string") {
    throw new DecodeError(`${path} must be a string`);
  }
  return value;
}

function readNumber(obj: Fields, key: string, path: string): number | undefined {
  const value = optional(obj, key);
  if (value === undefined) return undefined;
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new DecodeError(`${path} must be a finite number`);
  }
  return value;
}

function readInteger(obj: Fields, key: string, path: string): number | undefined {
  const value = readNumber(obj, key, path);
  if (value === undefined) return undefined;
  if (!Number.isInteger(value) || value < 0) {
    throw new DecodeError(`${path} must be a non-negative integer`);
  }
  return value;
}

function readBoolean(obj: Fields, key: string, path: string): boolean | undefined {
  const value = optional(obj, key);
  if (value === undefined) return undefined;
  if (typeof value !== "boolean") {
    throw new DecodeError(`${path} must be a boolean`);
  }
  return value;
}

function readStop(obj: Fields): string[] {
  const value = optional(obj, "stop");
  if (value === undefined) return [];
  // Some clients send a single stop sequence as a bare string
  if (typeof value === "string") return [value];
  if (!Array.isArray(value)) {
    throw new DecodeError("stop must be an array of strings");
  }
  const stop: string[] = [];
  for (const [i, item] of value.entries()) {
    if (typeof item !== "string") {
      throw new DecodeError(`stop[${i}] must be a string`);
    }
    stop.push(item);
  }
  return stop;
}

function readExtra(obj: Fields): CompletionExtra {
  const value = optional(obj, "extra");
  let extra: Fields = {};
  if (value !== undefined) {
    if (!isObject(value)) throw new DecodeError("extra must be an object");
    extra = value;
  }
  return {
    language: readString(extra, "language", "extra.language") ?? "",
    nextIndent: readNumber(extra, "next_indent", "extra.next_indent") ?? 0,
    promptTokens: readNumber(extra, "prompt_tokens", "extra.prompt_tokens") ?? 0,
    suffixTokens: readNumber(extra, "suffix_tokens", "extra.suffix_tokens") ?? 0,
    trimByIndentation:
      readBoolean(extra, "trim_by_indentation", "extra.trim_by_indentation") ?? false,
  };
}

/**
 * Decode a raw request body.
 *
 * @throws DecodeError when the body is not JSON, not an object, or has a
 *   field of the wrong type.
 */
export function decodeCompletionRequest(body: string | Buffer): CompletionRequest {
  const text = typeof body === "string" ? body : body.toString("utf8");

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err: unknown) {
    throw new DecodeError(
      `Request body is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err },
    );
  }

  if (!isObject(parsed)) {
    throw new DecodeError("Request body must be a JSON object");
  }

  const extra = readExtra(parsed);

  return {
    prefix: readString(parsed, "prompt", "prompt") ?? "",
    suffix: readString(parsed, "suffix", "suffix") ?? "",
    language: extra.language,
    maxTokens: readInteger(parsed, "max_tokens", "max_tokens"),
    temperature: readNumber(parsed, "temperature", "temperature"),
    topP: readNumber(parsed, "top_p", "top_p"),
    stop: readStop(parsed),
    stream: readBoolean(parsed, "stream", "stream") ?? false,
    n: readInteger(parsed, "n", "n"),
    extra,
  };
}
