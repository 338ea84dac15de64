/**
 * Prompt construction for fill-in-the-middle completion.
 *
 * The task prompt only sees a window around the cursor (the last N prefix
 * lines and the first M suffix lines) so prompt size, and with it
 * latency, does not grow with file length.
 */

import type { PromptTemplate } from "./template.js";
import type { PromptContext } from "./types.js";

export interface PromptWindow {
  prefixLines: number;
  suffixLines: number;
}

export const DEFAULT_WINDOW: PromptWindow = { prefixLines: 60, suffixLines: 60 };

export const DEFAULT_FIM_TEMPLATE =
  "<|fim_prefix|> {{.Prefix}} <|fim_suffix|>{{.Suffix}} <|fim_middle|>";

/** Last `count` lines of `text`, joined back with "\n". */
export function lastLines(text: string, count: number): string {
  const lines = text.split("\n");
  if (lines.length <= count) return text;
  return lines.slice(lines.length - count).join("\n");
}

/** First `count` lines of `text`, joined back with "\n". */
export function firstLines(text: string, count: number): string {
  const lines = text.split("\n");
  if (lines.length <= count) return text;
  return lines.slice(0, count).join("\n");
}

export function buildPromptContext(
  prefix: string,
  suffix: string,
  language: string,
  window: PromptWindow = DEFAULT_WINDOW,
): PromptContext {
  return Object.freeze({
    prefix: lastLines(prefix, window.prefixLines),
    suffix: firstLines(suffix, window.suffixLines),
    language,
  });
}

export function buildSystemPrompt(language: string): string {
  const name = language.trim() || "the given language";
  return [
    `You are an expert AI programming assistant for ${name}.`,
    "Your goal is to perform Fill-in-the-Middle (FIM) code completion. Complete only the code that fits between the given prefix and suffix.",
    "Do not add explanations, comments, or markdown. Do not change code outside the specified boundaries.",
  ].join("\n");
}

/**
 * Window the prefix/suffix pair and render it through `template`.
 *
 * @throws TemplateError when rendering fails.
 */
export function buildTaskPrompt(
  prefix: string,
  suffix: string,
  template: PromptTemplate,
  options: { language?: string; window?: PromptWindow } = {},
): string {
  const ctx = buildPromptContext(
    prefix,
    suffix,
    options.language ?? "",
    options.window,
  );
  return template.render({
    Prefix: ctx.prefix,
    Suffix: ctx.suffix,
    Language: ctx.language,
  });
}
