/**
 * Generation options sent to the backend.
 *
 * Built once per request from the client's sampling fields and the
 * server-side ceiling. Ranges are checked here, not left to the backend.
 */

import { DecodeError } from "./errors.js";
import type { CompletionRequest, GenerationOptions } from "./types.js";

/** Stop marker that ends a chat turn for the default FIM models. */
export const END_OF_TURN = "<|im_end|>";

export const TEMPERATURE_RANGE = { min: 0, max: 2 } as const;
export const TOP_P_RANGE = { min: 0, max: 1 } as const;

function checkRange(
  name: string,
  value: number | undefined,
  range: { min: number; max: number },
): void {
  if (value === undefined) return;
  if (!Number.isFinite(value) || value < range.min || value > range.max) {
    throw new DecodeError(
      `${name} must be between ${range.min} and ${range.max}, got ${value}`,
    );
  }
}

/**
 * Deduplicate `stop` and make sure `marker` appears exactly once.
 * Order of first occurrence is kept; the marker goes last if it was absent.
 */
export function withEndOfTurn(
  stop: readonly string[],
  marker: string = END_OF_TURN,
): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const s of stop) {
    if (seen.has(s)) continue;
    seen.add(s);
    out.push(s);
  }
  if (!seen.has(marker)) out.push(marker);
  return out;
}

/**
 * Validated, immutable generation options.
 *
 * `numPredict` is the requested token count clamped to `ceiling`; a
 * missing or zero request means "up to the ceiling".
 *
 * @throws DecodeError when temperature or top_p is out of range.
 */
export function buildGenerationOptions(
  request: Pick<CompletionRequest, "maxTokens" | "temperature" | "topP" | "stop">,
  ceiling: number,
): GenerationOptions {
  if (!Number.isInteger(ceiling) || ceiling < 1) {
    throw new RangeError(`num_predict ceiling must be a positive integer, got ${ceiling}`);
  }
  checkRange("temperature", request.temperature, TEMPERATURE_RANGE);
  checkRange("top_p", request.topP, TOP_P_RANGE);

  const requested = request.maxTokens;
  const numPredict =
    requested === undefined || requested <= 0
      ? ceiling
      : Math.min(requested, ceiling);

  return Object.freeze({
    temperature: request.temperature,
    topP: request.topP,
    stop: Object.freeze(withEndOfTurn(request.stop)),
    numPredict,
  });
}
