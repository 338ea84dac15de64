/**
 * Argument parser for the localpilot CLI.
 *
 * Hand-rolled, no dependencies. Accepts `--flag value` and `--flag=value`.
 * Only flags that were given end up in `overrides`, so environment
 * variables and defaults still apply to the rest.
 */

import type { ServerConfig } from "@localpilot/server";

export interface ServeArgs {
  command: "serve";
  overrides: ServerConfig;
  verbose: boolean;
}

export interface HelpArgs {
  command: "help";
}

export interface VersionArgs {
  command: "version";
}

export type ParsedArgs = ServeArgs | HelpArgs | VersionArgs;

export interface ParseError {
  error: string;
}

export type ParseResult = ParsedArgs | ParseError;

export function isError(result: ParseResult): result is ParseError {
  return "error" in result;
}

export const HELP = `
localpilot [options]

Serve IDE code completions from a local Ollama model. Two listeners
(plaintext and TLS) answer the completion API; two relays forward the
fixed public ports the IDE talks to onto those listeners.

Options:
  --port <port>             Plaintext listener (default: 11437, env: LOCALPILOT_PORT)
  --port-ssl <port>         TLS listener (default: 11436, env: LOCALPILOT_TLS_PORT)
  --proxy-port <port>       Public plaintext relay (default: 11438, env: LOCALPILOT_PROXY_PORT)
  --proxy-port-ssl <port>   Public TLS relay (default: 11435, env: LOCALPILOT_PROXY_TLS_PORT)
  --bind <host>             Bind address (default: 127.0.0.1, env: LOCALPILOT_BIND_HOST)
  --cert <path>             Certificate file (PEM); needs --key
  --key <path>              Private key file (PEM); needs --cert
  --model <name>            Ollama model (default: qwen3-coder:30b, env: LOCALPILOT_MODEL)
  --num-predict <n>         Token ceiling per completion (default: 200)
  --prompt-template <tmpl>  Fill-in-the-middle template
                            (default: "<|fim_prefix|> {{.Prefix}} <|fim_suffix|>{{.Suffix}} <|fim_middle|>")
  --timeout <ms>            Stream deadline in milliseconds (default: 60000)
  --artifact <text>         Fragment to drop from the stream; repeatable
                            (default: "\`\`\`" and "python")
  --verbose                 Debug logging
  -h, --help                Show this help
  -v, --version             Show version

Ports may be written as "11437" or ":11437".
The backend address comes from OLLAMA_HOST (default: http://127.0.0.1:11434).
`.trim();

/** "11437" or ":11437" (the host part is not accepted here; use --bind). */
export function parsePort(raw: string): number | null {
  const digits = raw.startsWith(":") ? raw.slice(1) : raw;
  if (!/^\d+$/.test(digits)) return null;
  const port = parseInt(digits, 10);
  return port <= 65535 ? port : null;
}

function parsePositive(raw: string): number | null {
  if (!/^\d+$/.test(raw)) return null;
  const n = parseInt(raw, 10);
  return n > 0 ? n : null;
}

type PortKey = "port" | "tlsPort" | "proxyPort" | "proxyTlsPort";
type StringKey = "bindHost" | "certPath" | "keyPath" | "model" | "promptTemplate";
type CountKey = "numPredict" | "timeoutMs";

const PORT_FLAGS: Record<string, PortKey> = {
  "--port": "port",
  "--port-ssl": "tlsPort",
  "--proxy-port": "proxyPort",
  "--proxy-port-ssl": "proxyTlsPort",
};

const STRING_FLAGS: Record<string, StringKey> = {
  "--bind": "bindHost",
  "--cert": "certPath",
  "--key": "keyPath",
  "--model": "model",
  "--prompt-template": "promptTemplate",
};

const COUNT_FLAGS: Record<string, CountKey> = {
  "--num-predict": "numPredict",
  "--timeout": "timeoutMs",
};

function takesValue(flag: string): boolean {
  return (
    Object.hasOwn(PORT_FLAGS, flag) ||
    Object.hasOwn(STRING_FLAGS, flag) ||
    Object.hasOwn(COUNT_FLAGS, flag) ||
    flag === "--artifact"
  );
}

export function parseArgs(argv: string[]): ParseResult {
  // Strip node and script path
  const args = argv.slice(2);

  const overrides: ServerConfig = {};
  const artifacts: string[] = [];
  let verbose = false;

  let i = 0;
  while (i < args.length) {
    const arg = args[i];

    if (arg === "--help" || arg === "-h" || arg === "help") {
      return { command: "help" };
    }
    if (arg === "--version" || arg === "-v" || arg === "version") {
      return { command: "version" };
    }
    if (arg === "--verbose") {
      verbose = true;
      i++;
      continue;
    }

    const eq = arg.indexOf("=");
    const flag = arg.startsWith("--") && eq !== -1 ? arg.slice(0, eq) : arg;

    if (!takesValue(flag)) {
      if (arg.startsWith("-")) return { error: `Unknown option: ${arg}\n\n${HELP}` };
      return { error: `Unexpected argument: ${arg}\n\n${HELP}` };
    }

    let value: string;
    if (flag !== arg) {
      value = arg.slice(eq + 1);
    } else {
      i++;
      if (i >= args.length) return { error: `${flag} requires a value` };
      value = args[i];
    }

    const portKey = PORT_FLAGS[flag];
    const stringKey = STRING_FLAGS[flag];
    const countKey = COUNT_FLAGS[flag];

    if (portKey) {
      const port = parsePort(value);
      if (port === null) return { error: `Invalid port for ${flag}: ${value}` };
      overrides[portKey] = port;
    } else if (stringKey) {
      if (value === "") return { error: `${flag} requires a value` };
      overrides[stringKey] = value;
    } else if (countKey) {
      const n = parsePositive(value);
      if (n === null) return { error: `Invalid value for ${flag}: ${value}` };
      overrides[countKey] = n;
    } else {
      if (value.trim() === "") return { error: "--artifact must not be blank" };
      artifacts.push(value);
    }

    i++;
  }

  if (artifacts.length > 0) overrides.artifacts = artifacts;
  return { command: "serve", overrides, verbose };
}
