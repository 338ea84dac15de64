import { afterEach, describe, it } from "node:test";
import assert from "node:assert/strict";
import http from "node:http";

import {
  BackendError,
  DEFAULT_FIM_TEMPLATE,
  END_OF_TURN,
  StreamCancelledError,
  StreamTimeoutError,
  TemplateError,
  artifactFilterFactory,
  compileTemplate,
} from "@localpilot/core";
import type {
  GenerateRequest,
  GenerationBackend,
  PromptTemplate,
  StreamChunk,
  TerminalRecord,
} from "@localpilot/core";

import {
  buildEnvelope,
  buildTerminalRecord,
  createCompletionGate,
  createCompletionRelay,
  formatRecord,
} from "../src/completion.js";
import type { CompletionRelay, CompletionRelayOptions, RelayOutcome } from "../src/completion.js";

// --- Fake backend ---

type Emit = (chunk: StreamChunk) => void;

interface FakeBackend extends GenerationBackend {
  calls: GenerateRequest[];
  signals: AbortSignal[];
}

function fakeBackend(run: (emit: Emit, signal: AbortSignal) => Promise<void>): FakeBackend {
  const calls: GenerateRequest[] = [];
  const signals: AbortSignal[] = [];
  return {
    name: "fake",
    calls,
    signals,
    generate(request, onChunk, signal) {
      calls.push(request);
      signals.push(signal);
      return run(onChunk, signal);
    },
  };
}

function untilAborted(signal: AbortSignal): Promise<never> {
  return new Promise((_resolve, reject) => {
    if (signal.aborted) reject(signal.reason);
    signal.addEventListener("abort", () => reject(signal.reason), { once: true });
  });
}

const finalChunk: StreamChunk = { text: "", final: true, doneReason: "stop" };

// --- HTTP harness ---

interface Harness {
  port: number;
  outcome: Promise<RelayOutcome>;
}

const servers: http.Server[] = [];

afterEach(async () => {
  for (const server of servers.splice(0)) {
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  }
});

function relayWith(
  backend: GenerationBackend,
  overrides: Partial<CompletionRelayOptions> = {},
): CompletionRelay {
  return createCompletionRelay({
    backend,
    model: "test-model",
    numPredict: 200,
    template: compileTemplate(DEFAULT_FIM_TEMPLATE),
    timeoutMs: 5000,
    createFilter: artifactFilterFactory(),
    ...overrides,
  });
}

async function serve(relay: CompletionRelay): Promise<Harness> {
  let settle: (outcome: RelayOutcome) => void = () => {};
  let fail: (err: unknown) => void = () => {};
  const outcome = new Promise<RelayOutcome>((resolve, reject) => {
    settle = resolve;
    fail = reject;
  });
  const server = http.createServer((req, res) => {
    relay.handle(req, res).then(settle, fail);
  });
  servers.push(server);
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", () => resolve()));
  const addr = server.address();
  if (!addr || typeof addr === "string") throw new Error("not a TCP server");
  return { port: addr.port, outcome };
}

interface Reply {
  status: number;
  headers: http.IncomingHttpHeaders;
  body: string;
}

function send(port: number, body: string | null, method = "POST"): Promise<Reply> {
  return new Promise((resolve, reject) => {
    const req = http.request(
      { hostname: "127.0.0.1", port, method, path: "/v1/engines/copilot-codex/completions" },
      (res) => {
        const chunks: Buffer[] = [];
        res.on("data", (c: Buffer) => chunks.push(c));
        res.on("end", () =>
          resolve({
            status: res.statusCode ?? 0,
            headers: res.headers,
            body: Buffer.concat(chunks).toString("utf8"),
          }),
        );
      },
    );
    req.on("error", reject);
    req.end(body ?? undefined);
  });
}

interface SseRecord {
  choices?: Array<{ text: string; index: number; finish_reason?: string }>;
  chunk?: TerminalRecord["chunk"];
}

function records(body: string): SseRecord[] {
  return body
    .split("\n\n")
    .filter((r) => r !== "")
    .map((r) => {
      assert.ok(r.startsWith("data: "), `bad record framing: ${r}`);
      return JSON.parse(r.slice("data: ".length));
    });
}

function texts(body: string): string[] {
  return records(body).map((r) => {
    assert.ok(r.choices, "not a completion envelope");
    return r.choices[0].text;
  });
}

const pythonRequest = JSON.stringify({
  prompt: "def foo",
  suffix: "\n\nprint(foo())",
  extra: { language: "python" },
  max_tokens: 64,
  stream: true,
});

// --- Unit pieces ---

describe("createCompletionGate", () => {
  it("fires exactly once", async () => {
    const gate = createCompletionGate();
    assert.equal(gate.fired, false);
    assert.equal(gate.fire(), true);
    assert.equal(gate.fire(), false);
    assert.equal(gate.fire(), false);
    assert.equal(gate.fired, true);
    await gate.done;
  });
});

describe("records", () => {
  it("builds an envelope with a single choice at index 0", () => {
    const env = buildEnvelope("x = 1");
    assert.match(env.id, /^[0-9a-f-]{36}$/);
    assert.ok(Math.abs(env.created - Date.now() / 1000) < 5);
    assert.deepEqual(env.choices, [{ text: "x = 1", index: 0 }]);
    assert.notEqual(buildEnvelope("x").id, env.id);
  });

  it("adds finish_reason only when given", () => {
    assert.deepEqual(buildEnvelope("", "length").choices, [
      { text: "", index: 0, finish_reason: "length" },
    ]);
  });

  it("builds a terminal record with zeroed counters", () => {
    const record = buildTerminalRecord("test-model", 1.5);
    assert.equal(record.chunk.model, "test-model");
    assert.equal(record.chunk.total_duration, 1_500_000);
    assert.equal(record.chunk.response, "");
    assert.equal(record.chunk.done, true);
    assert.deepEqual(record.chunk.context, []);
    assert.equal(record.chunk.load_duration, 0);
    assert.equal(record.chunk.prompt_eval_count, 0);
    assert.equal(record.chunk.prompt_eval_duration, 0);
    assert.equal(record.chunk.eval_count, 0);
    assert.equal(record.chunk.eval_duration, 0);
    assert.ok(!Number.isNaN(Date.parse(record.chunk.created_at)));
  });

  it("frames a record as one SSE data event", () => {
    const env = { id: "a", created: 1, choices: [{ text: "t", index: 0 }] };
    assert.equal(
      formatRecord(env),
      'data: {"id":"a","created":1,"choices":[{"text":"t","index":0}]}\n\n',
    );
  });
});

// --- Relay over HTTP ---

describe("createCompletionRelay", () => {
  it("streams filtered fragments as SSE records and completes", async () => {
    const backend = fakeBackend(async (emit) => {
      emit({ text: "```", final: false });
      emit({ text: "\ndef foo():", final: false });
      emit({ text: " pass", final: false });
      emit(finalChunk);
    });
    const h = await serve(relayWith(backend));

    const reply = await send(h.port, pythonRequest);
    assert.equal(reply.status, 200);
    assert.equal(reply.headers["content-type"], "text/event-stream");
    assert.equal(reply.headers["cache-control"], "no-cache");
    assert.deepEqual(texts(reply.body), ["def foo():", " pass", ""]);

    const recs = records(reply.body);
    assert.deepEqual(recs[2].choices, [{ text: "", index: 0, finish_reason: "stop" }]);
    assert.deepEqual(recs[0].choices, [{ text: "def foo():", index: 0 }]);

    const outcome = await h.outcome;
    assert.equal(outcome.state, "completed");
    assert.equal(outcome.records, 3);
  });

  it("drops the fence tag of the request's own language", async () => {
    const backend = fakeBackend(async (emit) => {
      emit({ text: "typescript", final: false });
      emit({ text: "\nconst x = 1;", final: false });
      emit(finalChunk);
    });
    const h = await serve(relayWith(backend));

    const reply = await send(
      h.port,
      JSON.stringify({ prompt: "", suffix: "", extra: { language: "typescript" } }),
    );
    assert.deepEqual(texts(reply.body), ["const x = 1;", ""]);
  });

  it("uses 'stop' as finish_reason when the backend gives none", async () => {
    const backend = fakeBackend(async (emit) => {
      emit({ text: "x", final: true });
    });
    const h = await serve(relayWith(backend));
    const recs = records((await send(h.port, pythonRequest)).body);
    assert.deepEqual(recs[0].choices, [{ text: "x", index: 0, finish_reason: "stop" }]);
  });

  it("sends the backend a clamped token count and one end-of-turn marker", async () => {
    const backend = fakeBackend(async (emit) => emit(finalChunk));
    const h = await serve(relayWith(backend));

    await send(
      h.port,
      JSON.stringify({
        prompt: "a",
        suffix: "b",
        max_tokens: 5000,
        temperature: 0.2,
        stop: [END_OF_TURN, "\n\n", "\n\n"],
        extra: { language: "go" },
      }),
    );

    assert.equal(backend.calls.length, 1);
    const call = backend.calls[0];
    assert.equal(call.model, "test-model");
    assert.equal(call.options.numPredict, 200);
    assert.equal(call.options.temperature, 0.2);
    assert.equal(call.options.topP, undefined);
    assert.deepEqual(call.options.stop, [END_OF_TURN, "\n\n"]);
    assert.equal(call.prompt, "<|fim_prefix|> a <|fim_suffix|>b <|fim_middle|>");
    assert.ok(call.system.startsWith("You are an expert AI programming assistant for go."));
  });

  it("ignores callbacks after the final flag", async () => {
    const backend = fakeBackend(async (emit) => {
      emit({ text: "a", final: true });
      emit({ text: "b", final: true });
      emit({ text: "c", final: false });
    });
    const h = await serve(relayWith(backend));
    const reply = await send(h.port, pythonRequest);
    assert.deepEqual(texts(reply.body), ["a"]);
    const outcome = await h.outcome;
    assert.equal(outcome.state, "completed");
    assert.equal(outcome.records, 1);
  });

  it("fires the gate on a suppressed final fragment", async () => {
    const backend = fakeBackend(async (emit) => {
      emit({ text: "x", final: false });
      emit({ text: "```", final: true });
    });
    const h = await serve(relayWith(backend));
    const reply = await send(h.port, pythonRequest);
    assert.deepEqual(texts(reply.body), ["x"]);
    assert.equal((await h.outcome).state, "completed");
  });

  it("appends one terminal record when the deadline passes first", async () => {
    const backend = fakeBackend(async (emit, signal) => {
      emit({ text: "partial", final: false });
      await untilAborted(signal);
    });
    const h = await serve(relayWith(backend, { timeoutMs: 50 }));

    const reply = await send(h.port, pythonRequest);
    assert.equal(reply.status, 200);
    const recs = records(reply.body);
    assert.equal(recs.length, 2);
    assert.deepEqual(recs[0].choices, [{ text: "partial", index: 0 }]);

    const terminal = recs[1].chunk;
    assert.ok(terminal);
    assert.equal(terminal.model, "test-model");
    assert.equal(terminal.response, "");
    assert.equal(terminal.done, true);
    assert.equal(terminal.eval_count, 0);
    assert.equal(terminal.prompt_eval_count, 0);
    assert.equal(terminal.load_duration, 0);
    assert.ok(terminal.total_duration >= 40_000_000);

    const outcome = await h.outcome;
    assert.equal(outcome.state, "cancelled");
    assert.ok(outcome.reason instanceof StreamTimeoutError);
    assert.equal(outcome.records, 1);
    assert.equal(backend.signals[0].aborted, true);
  });

  it("closes with a terminal record when the backend fails mid-stream", async () => {
    const backend = fakeBackend(async (emit) => {
      emit({ text: "a", final: false });
      throw new BackendError("Ollama stream error: out of memory", 200);
    });
    const h = await serve(relayWith(backend));
    const recs = records((await send(h.port, pythonRequest)).body);
    assert.equal(recs.length, 2);
    assert.ok("chunk" in recs[1]);
    const outcome = await h.outcome;
    assert.equal(outcome.state, "cancelled");
    assert.ok(outcome.reason instanceof BackendError);
  });

  it("closes with a terminal record when the backend ends without a final flag", async () => {
    const backend = fakeBackend(async (emit) => {
      emit({ text: "a", final: false });
    });
    const h = await serve(relayWith(backend));
    const recs = records((await send(h.port, pythonRequest)).body);
    assert.equal(recs.length, 2);
    assert.ok("chunk" in recs[1]);
    const outcome = await h.outcome;
    assert.equal(outcome.state, "cancelled");
    assert.ok(outcome.reason instanceof BackendError);
    assert.equal(
      outcome.reason.message,
      "Backend stream ended before its final fragment",
    );
  });

  it("closes with a terminal record when the backend throws before returning", async () => {
    const backend: GenerationBackend = {
      name: "throwing",
      generate(): Promise<void> {
        throw new Error("backend exploded");
      },
    };
    const h = await serve(relayWith(backend, { timeoutMs: 60_000 }));

    const reply = await send(h.port, pythonRequest);
    assert.equal(reply.status, 200);
    const recs = records(reply.body);
    assert.equal(recs.length, 1);
    assert.equal(recs[0].chunk?.done, true);

    const outcome = await h.outcome;
    assert.equal(outcome.state, "cancelled");
    assert.ok(outcome.reason instanceof Error);
    assert.equal(outcome.reason.message, "backend exploded");
    assert.equal(outcome.records, 0);
  });

  it("releases the backend call once the final fragment is written", async () => {
    const backend = fakeBackend(async (emit, signal) => {
      emit({ text: "done", final: true, doneReason: "stop" });
      await untilAborted(signal);
    });
    const h = await serve(relayWith(backend, { timeoutMs: 60_000 }));

    const reply = await send(h.port, pythonRequest);
    assert.deepEqual(texts(reply.body), ["done"]);
    assert.equal((await h.outcome).state, "completed");
    assert.equal(backend.signals[0].aborted, true);
  });

  it("aborts the backend call when the client disconnects", async () => {
    const backend = fakeBackend(async (emit, signal) => {
      emit({ text: "first", final: false });
      await untilAborted(signal);
    });
    const h = await serve(relayWith(backend));

    await new Promise<void>((resolve) => {
      const req = http.request(
        { hostname: "127.0.0.1", port: h.port, method: "POST", path: "/" },
        (res) => {
          res.once("data", () => {
            req.destroy();
            resolve();
          });
        },
      );
      req.on("error", () => {});
      req.end(pythonRequest);
    });

    const outcome = await h.outcome;
    assert.equal(outcome.state, "cancelled");
    assert.ok(outcome.reason instanceof StreamCancelledError);
    assert.equal(backend.signals[0].aborted, true);
  });

  it("rejects a malformed body with 400 and no backend call", async () => {
    const backend = fakeBackend(async (emit) => emit(finalChunk));
    const h = await serve(relayWith(backend));

    const reply = await send(h.port, "{not json");
    assert.equal(reply.status, 400);
    assert.equal(reply.headers["content-type"], "application/json");
    assert.equal(JSON.parse(reply.body).error.code, "decode_error");
    assert.equal(backend.calls.length, 0);

    const outcome = await h.outcome;
    assert.equal(outcome.state, "failed");
    assert.equal(outcome.status, 400);
  });

  it("rejects a wrongly typed field with 400", async () => {
    const backend = fakeBackend(async (emit) => emit(finalChunk));
    const h = await serve(relayWith(backend));
    const reply = await send(h.port, JSON.stringify({ prompt: 42 }));
    assert.equal(reply.status, 400);
    assert.deepEqual(JSON.parse(reply.body), {
      error: { code: "decode_error", message: "prompt must be a string" },
    });
  });

  it("rejects an out-of-range temperature with 400", async () => {
    const backend = fakeBackend(async (emit) => emit(finalChunk));
    const h = await serve(relayWith(backend));
    const reply = await send(h.port, JSON.stringify({ prompt: "a", temperature: 5 }));
    assert.equal(reply.status, 400);
    assert.equal(
      JSON.parse(reply.body).error.message,
      "temperature must be between 0 and 2, got 5",
    );
    assert.equal(backend.calls.length, 0);
  });

  it("answers 405 to anything but POST", async () => {
    const backend = fakeBackend(async (emit) => emit(finalChunk));
    const h = await serve(relayWith(backend));
    const reply = await send(h.port, null, "GET");
    assert.equal(reply.status, 405);
    assert.equal(reply.headers.allow, "POST");
    assert.equal(backend.calls.length, 0);
  });

  it("reports a prompt build failure as 500 before streaming", async () => {
    const broken: PromptTemplate = {
      source: "{{.Prefix}}",
      fields: ["Prefix"],
      render() {
        throw new TemplateError("template: executing: no value for field Prefix");
      },
    };
    const backend = fakeBackend(async (emit) => emit(finalChunk));
    const h = await serve(relayWith(backend, { template: broken }));

    const reply = await send(h.port, pythonRequest);
    assert.equal(reply.status, 500);
    assert.deepEqual(JSON.parse(reply.body), {
      error: {
        code: "template_error",
        message: "template: executing: no value for field Prefix",
      },
    });
    assert.equal(backend.calls.length, 0);
    assert.equal((await h.outcome).state, "failed");
  });

  it("passes fragments through unchanged without a filter factory", async () => {
    const backend = fakeBackend(async (emit) => {
      emit({ text: "```", final: false });
      emit(finalChunk);
    });
    const h = await serve(
      createCompletionRelay({
        backend,
        model: "m",
        numPredict: 10,
        template: compileTemplate(DEFAULT_FIM_TEMPLATE),
        timeoutMs: 1000,
      }),
    );
    assert.deepEqual(texts((await send(h.port, pythonRequest)).body), ["```", ""]);
  });
});
