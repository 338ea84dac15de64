/**
 * Fill-in-the-middle prompt templates.
 *
 * Templates use the `{{.Field}}` action syntax, which is what FIM
 * template strings for local models are usually written in:
 *
 *   <|fim_prefix|> {{.Prefix}} <|fim_suffix|>{{.Suffix}} <|fim_middle|>
 *
 * Supported inside `{{ }}`: a single field reference (`.Prefix`,
 * `.Suffix`, `.Language`), a comment (`/* ... *\/`), and the `-` trim
 * markers that eat whitespace next to the action. Anything else is a
 * TemplateError at compile time.
 */

import { TemplateError } from "./errors.js";

export const TEMPLATE_FIELDS = ["Prefix", "Suffix", "Language"] as const;

export type TemplateField = (typeof TEMPLATE_FIELDS)[number];

export type TemplateValues = Partial<Record<TemplateField, string>>;

type Segment =
  | { kind: "text"; value: string }
  | { kind: "field"; name: TemplateField };

export interface PromptTemplate {
  readonly source: string;
  /** Fields referenced by the template, in order of first use. */
  readonly fields: readonly TemplateField[];
  /** @throws TemplateError when a referenced field has no value. */
  render(values: TemplateValues): string;
}

function isTemplateField(name: string): name is TemplateField {
  return TEMPLATE_FIELDS.some((field) => field === name);
}

function isSpace(ch: string | undefined): boolean {
  return ch === " " || ch === "\t" || ch === "\n" || ch === "\r";
}

function lineOf(source: string, offset: number): number {
  return source.slice(0, offset).split("\n").length;
}

function parse(source: string): Segment[] {
  const segments: Segment[] = [];
  let pos = 0;
  let trimNext = false;

  const pushText = (text: string): void => {
    const value = trimNext ? text.replace(/^\s+/, "") : text;
    trimNext = false;
    if (value) segments.push({ kind: "text", value });
  };

  while (pos < source.length) {
    const open = source.indexOf("{{", pos);
    if (open === -1) {
      pushText(source.slice(pos));
      break;
    }

    const close = source.indexOf("}}", open + 2);
    if (close === -1) {
      throw new TemplateError(
        `template: line ${lineOf(source, open)}: unclosed action`,
      );
    }

    let inner = source.slice(open + 2, close);
    let text = source.slice(pos, open);

    if (inner.startsWith("-") && isSpace(inner[1])) {
      text = text.replace(/\s+$/, "");
      inner = inner.slice(1);
    }
    pushText(text);

    if (inner.endsWith("-") && isSpace(inner[inner.length - 2])) {
      trimNext = true;
      inner = inner.slice(0, -1);
    }

    const action = inner.trim();
    const line = lineOf(source, open);

    if (action.startsWith("/*")) {
      if (!action.endsWith("*/")) {
        throw new TemplateError(`template: line ${line}: unclosed comment`);
      }
    } else if (action === "") {
      throw new TemplateError(`template: line ${line}: missing value for command`);
    } else {
      const match = /^\.([A-Za-z_][A-Za-z0-9_]*)$/.exec(action);
      if (!match) {
        throw new TemplateError(
          `template: line ${line}: unsupported action "${action}"`,
        );
      }
      const name = match[1];
      if (!isTemplateField(name)) {
        throw new TemplateError(
          `template: line ${line}: can't evaluate field ${name}; expected one of ${TEMPLATE_FIELDS.join(", ")}`,
        );
      }
      segments.push({ kind: "field", name });
    }

    pos = close + 2;
  }

  return segments;
}

/**
 * Parse a template once so it can be rendered per request.
 *
 * @throws TemplateError on syntax errors or unknown fields.
 */
export function compileTemplate(source: string): PromptTemplate {
  const segments = parse(source);
  const fields: TemplateField[] = [];
  for (const seg of segments) {
    if (seg.kind === "field" && !fields.includes(seg.name)) fields.push(seg.name);
  }

  return {
    source,
    fields,
    render(values: TemplateValues): string {
      let out = "";
      for (const seg of segments) {
        if (seg.kind === "text") {
          out += seg.value;
          continue;
        }
        const value = values[seg.name];
        if (value === undefined) {
          throw new TemplateError(
            `template: executing: no value for field ${seg.name}`,
          );
        }
        out += value;
      }
      return out;
    },
  };
}
