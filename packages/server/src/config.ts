/**
 * Server configuration resolution.
 *
 * Merges programmatic overrides with environment variables and applies
 * defaults, then validates the result. Ports, model, token ceiling,
 * templates and the stream deadline are all fixed here before anything
 * starts listening.
 */

import {
  ConfigError,
  DEFAULT_ARTIFACTS,
  DEFAULT_FIM_TEMPLATE,
  DEFAULT_WINDOW,
  TemplateError,
  compileTemplate,
} from "@localpilot/core";
import type { PromptTemplate } from "@localpilot/core";

export interface ServerConfig {
  bindHost?: string;
  /** Internal plaintext listener. */
  port?: number;
  /** Internal TLS listener. */
  tlsPort?: number;
  /** Public plaintext relay port. */
  proxyPort?: number;
  /** Public TLS relay port. */
  proxyTlsPort?: number;
  certPath?: string;
  keyPath?: string;
  model?: string;
  numPredict?: number;
  promptTemplate?: string;
  timeoutMs?: number;
  prefixLines?: number;
  suffixLines?: number;
  artifacts?: string[];
  ollamaHost?: string;
}

/**
 * Fully resolved config with all defaults applied.
 */
export interface ResolvedServerConfig {
  bindHost: string;
  port: number;
  tlsPort: number;
  proxyPort: number;
  proxyTlsPort: number;
  certPath: string | null;
  keyPath: string | null;
  model: string;
  numPredict: number;
  promptTemplate: PromptTemplate;
  timeoutMs: number;
  prefixLines: number;
  suffixLines: number;
  artifacts: string[];
  /** Raw backend host; parsed by the backend factory. */
  ollamaHost: string;
}

export const DEFAULTS = {
  bindHost: "127.0.0.1",
  port: 11437,
  tlsPort: 11436,
  proxyPort: 11438,
  proxyTlsPort: 11435,
  model: "qwen3-coder:30b",
  numPredict: 200,
  timeoutMs: 60_000,
  ollamaHost: "http://127.0.0.1:11434",
} as const;

type Env = Record<string, string | undefined>;

function envInt(env: Env, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw === "") return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new ConfigError(`${name} must be an integer, got "${raw}"`);
  }
  return value;
}

function envString(env: Env, name: string): string | undefined {
  const raw = env[name];
  return raw === undefined || raw === "" ? undefined : raw;
}

function checkPort(name: string, value: number): number {
  if (!Number.isInteger(value) || value < 0 || value > 65535) {
    throw new ConfigError(`${name} must be a port number between 0 and 65535, got ${value}`);
  }
  return value;
}

function checkPositive(name: string, value: number): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigError(`${name} must be a positive integer, got ${value}`);
  }
  return value;
}

/**
 * Resolve final server config from environment variables and overrides.
 *
 * Priority: programmatic overrides > environment variables > defaults.
 *
 * Environment variables:
 * - `LOCALPILOT_BIND_HOST` bind address for every listener (default: "127.0.0.1")
 * - `LOCALPILOT_PORT`, `LOCALPILOT_TLS_PORT` internal listeners (11437, 11436)
 * - `LOCALPILOT_PROXY_PORT`, `LOCALPILOT_PROXY_TLS_PORT` public relays (11438, 11435)
 * - `LOCALPILOT_CERT`, `LOCALPILOT_KEY` PEM files; both or neither
 * - `LOCALPILOT_MODEL`, `LOCALPILOT_NUM_PREDICT`, `LOCALPILOT_PROMPT_TEMPLATE`
 * - `LOCALPILOT_TIMEOUT_MS` stream deadline (default: 60000)
 * - `LOCALPILOT_PREFIX_LINES`, `LOCALPILOT_SUFFIX_LINES` prompt window (60/60)
 * - `LOCALPILOT_ARTIFACTS` comma-separated fragments to suppress
 * - `OLLAMA_HOST` backend address (default: "http://127.0.0.1:11434")
 *
 * @throws ConfigError on any invalid value, including a template that
 *   does not compile.
 */
export function resolveConfig(
  overrides?: ServerConfig,
  env: Env = process.env,
): ResolvedServerConfig {
  const bindHost =
    overrides?.bindHost || envString(env, "LOCALPILOT_BIND_HOST") || DEFAULTS.bindHost;

  const port = checkPort(
    "port",
    overrides?.port ?? envInt(env, "LOCALPILOT_PORT") ?? DEFAULTS.port,
  );
  const tlsPort = checkPort(
    "tlsPort",
    overrides?.tlsPort ?? envInt(env, "LOCALPILOT_TLS_PORT") ?? DEFAULTS.tlsPort,
  );
  const proxyPort = checkPort(
    "proxyPort",
    overrides?.proxyPort ?? envInt(env, "LOCALPILOT_PROXY_PORT") ?? DEFAULTS.proxyPort,
  );
  const proxyTlsPort = checkPort(
    "proxyTlsPort",
    overrides?.proxyTlsPort ??
      envInt(env, "LOCALPILOT_PROXY_TLS_PORT") ??
      DEFAULTS.proxyTlsPort,
  );

  const certPath = overrides?.certPath || envString(env, "LOCALPILOT_CERT") || null;
  const keyPath = overrides?.keyPath || envString(env, "LOCALPILOT_KEY") || null;
  if ((certPath === null) !== (keyPath === null)) {
    throw new ConfigError("Certificate and key must be configured together");
  }

  const model = overrides?.model || envString(env, "LOCALPILOT_MODEL") || DEFAULTS.model;

  const numPredict = checkPositive(
    "numPredict",
    overrides?.numPredict ?? envInt(env, "LOCALPILOT_NUM_PREDICT") ?? DEFAULTS.numPredict,
  );
  const timeoutMs = checkPositive(
    "timeoutMs",
    overrides?.timeoutMs ?? envInt(env, "LOCALPILOT_TIMEOUT_MS") ?? DEFAULTS.timeoutMs,
  );
  const prefixLines = checkPositive(
    "prefixLines",
    overrides?.prefixLines ??
      envInt(env, "LOCALPILOT_PREFIX_LINES") ??
      DEFAULT_WINDOW.prefixLines,
  );
  const suffixLines = checkPositive(
    "suffixLines",
    overrides?.suffixLines ??
      envInt(env, "LOCALPILOT_SUFFIX_LINES") ??
      DEFAULT_WINDOW.suffixLines,
  );

  const templateSource =
    overrides?.promptTemplate ??
    envString(env, "LOCALPILOT_PROMPT_TEMPLATE") ??
    DEFAULT_FIM_TEMPLATE;
  let promptTemplate: PromptTemplate;
  try {
    promptTemplate = compileTemplate(templateSource);
  } catch (err: unknown) {
    if (err instanceof TemplateError) {
      throw new ConfigError(`Invalid prompt template: ${err.message}`, { cause: err });
    }
    throw err;
  }

  const envArtifacts = envString(env, "LOCALPILOT_ARTIFACTS")
    ?.split(",")
    .map((s) => s.trim())
    .filter(Boolean);
  const artifacts = [...(overrides?.artifacts ?? envArtifacts ?? DEFAULT_ARTIFACTS)];
  if (artifacts.some((a) => a.trim() === "")) {
    throw new ConfigError("Suppressed artifacts must not be blank");
  }

  const ollamaHost =
    overrides?.ollamaHost || envString(env, "OLLAMA_HOST") || DEFAULTS.ollamaHost;

  return {
    bindHost,
    port,
    tlsPort,
    proxyPort,
    proxyTlsPort,
    certPath,
    keyPath,
    model,
    numPredict,
    promptTemplate,
    timeoutMs,
    prefixLines,
    suffixLines,
    artifacts,
    ollamaHost,
  };
}
