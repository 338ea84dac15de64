/**
 * @localpilot/core
 *
 * Shared types, errors, logging and prompt construction for localpilot.
 * Every other `@localpilot/*` package depends on it.
 *
 * Zero npm dependencies. No servers, no sockets. Just types and pure
 * functions.
 *
 * @packageDocumentation
 */

// Error taxonomy and pre-stream HTTP mapping
export {
  BackendError,
  BackendInitError,
  CertificateGenerationError,
  ConfigError,
  DecodeError,
  ListenerBindError,
  LocalpilotError,
  StreamCancelledError,
  StreamTimeoutError,
  TemplateError,
  errorBody,
  httpStatusFor,
  type ErrorCode,
} from "./errors.js";

// Logger handed to every component
export {
  createLogger,
  formatLine,
  silentLogger,
  type LogFields,
  type LogLevel,
  type Logger,
  type LoggerOptions,
} from "./log.js";

// Inbound request decoding
export { decodeCompletionRequest } from "./request.js";

// Backend generation options
export {
  END_OF_TURN,
  TEMPERATURE_RANGE,
  TOP_P_RANGE,
  buildGenerationOptions,
  withEndOfTurn,
} from "./options.js";

// FIM templates and prompts
export {
  TEMPLATE_FIELDS,
  compileTemplate,
  type PromptTemplate,
  type TemplateField,
  type TemplateValues,
} from "./template.js";
export {
  DEFAULT_FIM_TEMPLATE,
  DEFAULT_WINDOW,
  buildPromptContext,
  buildSystemPrompt,
  buildTaskPrompt,
  firstLines,
  lastLines,
  type PromptWindow,
} from "./prompt.js";

// Stream fragment filtering
export {
  DEFAULT_ARTIFACTS,
  artifactFilterFactory,
  createArtifactFilter,
  passthroughFilterFactory,
  type ChunkFilter,
  type ChunkFilterContext,
  type ChunkFilterFactory,
} from "./filter.js";

export type {
  CompletionChoice,
  CompletionEnvelope,
  CompletionExtra,
  CompletionRequest,
  GenerateRequest,
  GenerationBackend,
  GenerationOptions,
  PromptContext,
  StreamChunk,
  TerminalRecord,
} from "./types.js";
