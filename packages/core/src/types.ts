/**
 * Core types for localpilot.
 *
 * Two wire shapes meet here: the hosted completion API the IDE speaks
 * (snake_case, inbound request and outbound SSE records) and the local
 * generation backend the relay drives.
 */

// --- Inbound request ---

/** Windowing hints sent by the IDE. Accepted, not used for windowing. */
export interface CompletionExtra {
  language: string;
  nextIndent: number;
  promptTokens: number;
  suffixTokens: number;
  trimByIndentation: boolean;
}

/**
 * A decoded completion request.
 *
 * Absent numeric fields stay `undefined` so the backend's own defaults
 * apply; `maxTokens` falls back to the server ceiling.
 */
export interface CompletionRequest {
  /** Text before the cursor (`prompt` on the wire). */
  prefix: string;
  /** Text after the cursor. */
  suffix: string;
  language: string;
  maxTokens?: number;
  temperature?: number;
  topP?: number;
  stop: string[];
  stream: boolean;
  /** Number of completions asked for. Accepted; one stream is produced. */
  n?: number;
  extra: CompletionExtra;
}

// --- Prompt / generation ---

/** Windowed view of the request that the prompt is rendered from. */
export interface PromptContext {
  readonly prefix: string;
  readonly suffix: string;
  readonly language: string;
}

export interface GenerationOptions {
  readonly temperature?: number;
  readonly topP?: number;
  /** Request stops plus the end-of-turn marker, deduplicated. */
  readonly stop: readonly string[];
  /** min(requested, ceiling). */
  readonly numPredict: number;
}

export interface GenerateRequest {
  model: string;
  prompt: string;
  system: string;
  options: GenerationOptions;
}

/** One fragment of backend output. */
export interface StreamChunk {
  text: string;
  final: boolean;
  /** Why the backend stopped, present on the final chunk when known. */
  doneReason?: string;
}

/**
 * A streaming text generator.
 *
 * `generate` calls `onChunk` once per fragment, in order, and settles when
 * the backend stream ends. Aborting `signal` tears the call down and
 * rejects the promise.
 */
export interface GenerationBackend {
  readonly name: string;
  generate(
    request: GenerateRequest,
    onChunk: (chunk: StreamChunk) => void,
    signal: AbortSignal,
  ): Promise<void>;
}

// --- Outbound stream ---

export interface CompletionChoice {
  text: string;
  index: number;
  finish_reason?: string;
}

/** One SSE record per accepted fragment. */
export interface CompletionEnvelope {
  id: string;
  /** Unix seconds. */
  created: number;
  choices: CompletionChoice[];
}

/**
 * Record appended when a stream ends without the backend's final flag
 * (deadline, disconnect, backend failure). Mirrors the backend's own
 * final generate response with every engine counter zeroed.
 */
export interface TerminalRecord {
  chunk: {
    model: string;
    created_at: string;
    response: "";
    done: true;
    context: [];
    /** Elapsed wall-clock time in nanoseconds. */
    total_duration: number;
    load_duration: 0;
    prompt_eval_count: 0;
    prompt_eval_duration: 0;
    eval_count: 0;
    eval_duration: 0;
  };
}
