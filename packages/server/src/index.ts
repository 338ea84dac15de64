/**
 * @localpilot/server
 *
 * The application listeners: Ollama backend client, CompletionRelay,
 * route table and the plaintext/TLS servers.
 *
 * @packageDocumentation
 */

export { createServer } from "./server.js";
export type { ServerInstance, ServerOptions } from "./server.js";

export { DEFAULTS, resolveConfig } from "./config.js";
export type { ResolvedServerConfig, ServerConfig } from "./config.js";

export {
  SSE_HEADERS,
  buildEnvelope,
  buildTerminalRecord,
  createCompletionGate,
  createCompletionRelay,
  formatRecord,
} from "./completion.js";
export type {
  CompletionGate,
  CompletionRelay,
  CompletionRelayOptions,
  RelayOutcome,
  RelayState,
} from "./completion.js";

export { createOllamaBackend, resolveOllamaHost, toGenerateBody } from "./ollama.js";
export type { OllamaBackendOptions } from "./ollama.js";

export {
  COMPLETION_PATHS,
  HEALTH_PATH,
  TOKEN_PATH,
  TOKEN_TTL_SECONDS,
  createRouter,
  tokenStub,
} from "./routes.js";
export type { RouterOptions } from "./routes.js";

export { REQUEST_ID_HEADER, withRequestId, withRequestLog } from "./middleware.js";
export type { Handler } from "./middleware.js";
