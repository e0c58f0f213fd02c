import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { ResponseCache } from "../src/services/response-cache.js";
import { StreamingSession, type SessionRequest } from "../src/services/streaming-session.js";
import { BackendError } from "../src/shared/errors.js";
import { CancellationToken } from "../src/shared/cancellation.js";
import { MemoryLogger, ScriptedBackend, silentLogger, type Step } from "./helpers/fakes.js";

const KEY = "cache-key";

function makeRequest(chunks: string[], cacheKey: string | null = KEY): SessionRequest {
  return {
    query: { id: "q1", kind: "text", prompt: "hello", submittedAt: 0 },
    cacheKey,
    messages: [{ role: "user", content: "hello" }],
    sink: (chunk) => chunks.push(chunk),
  };
}

function setup(steps: Step[], timeoutMs: number = 1000) {
  const backend = new ScriptedBackend([steps]);
  const cache = new ResponseCache(10, silentLogger);
  const chunks: string[] = [];
  const token = new CancellationToken();
  const session = new StreamingSession(makeRequest(chunks), backend, cache, { timeoutMs }, token, silentLogger);
  return { backend, cache, chunks, token, session };
}

describe("StreamingSession", () => {
  it("forwards chunks in order and caches the final answer", async () => {
    const { cache, chunks, session } = setup(["The ", "time ", "is noon."]);

    const outcome = await session.run();

    assert.deepEqual(outcome, { status: "completed", text: "The time is noon.", chunks: 3 });
    assert.deepEqual(chunks, ["The ", "time ", "is noon."]);
    assert.equal(cache.get(KEY)?.answer, "The time is noon.");
    assert.equal(session.state, "completed");
    assert.equal(session.isTerminal, true);
    assert.equal(session.chunksEmitted, 3);
  });

  it("skips empty chunks", async () => {
    const { chunks, session } = setup(["a", "", "b"]);
    const outcome = await session.run();
    assert.deepEqual(outcome, { status: "completed", text: "ab", chunks: 2 });
    assert.deepEqual(chunks, ["a", "b"]);
  });

  it("does not cache an empty answer", async () => {
    const { cache, session } = setup([]);
    const outcome = await session.run();
    assert.deepEqual(outcome, { status: "completed", text: "", chunks: 0 });
    assert.equal(cache.size, 0);
  });

  it("does not cache when the request has no key", async () => {
    const backend = new ScriptedBackend([["answer"]]);
    const cache = new ResponseCache(10, silentLogger);
    const session = new StreamingSession(makeRequest([], null), backend, cache, { timeoutMs: 1000 }, undefined, silentLogger);
    await session.run();
    assert.equal(cache.size, 0);
  });

  it("fails with BackendTimeout when no chunk arrives in time", async () => {
    const { backend, cache, session } = setup(["partial ", { hang: true }], 30);

    const outcome = await session.run();

    assert.equal(outcome.status, "failed");
    assert.ok(outcome.status === "failed");
    assert.equal(outcome.error.code, "BACKEND_TIMEOUT");
    assert.equal(outcome.error.message, "No response chunk within 30ms");
    assert.equal(outcome.partialChunks, 1);
    assert.equal(cache.size, 0);
    assert.equal(backend.requests[0].signal.aborted, true);
  });

  it("times out a stream that only sends empty chunks", async () => {
    const idle: Step[] = [];
    for (let i = 0; i < 6; i++) {
      idle.push("", { delayMs: 15 });
    }
    const { session } = setup([...idle, "late"], 30);

    const outcome = await session.run();

    assert.ok(outcome.status === "failed");
    assert.equal(outcome.error.code, "BACKEND_TIMEOUT");
    assert.equal(outcome.partialChunks, 0);
  });

  it("restarts the timeout on every non-empty chunk", async () => {
    const { session } = setup(["a", { delayMs: 20 }, "b", { delayMs: 20 }, "c", { delayMs: 20 }, "d"], 60);
    const outcome = await session.run();
    assert.deepEqual(outcome, { status: "completed", text: "abcd", chunks: 4 });
  });

  it("never touches the backend when cancelled before it starts", async () => {
    const { backend, session, token } = setup(["never"]);
    token.cancel("user");

    const outcome = await session.run();

    assert.deepEqual(outcome, { status: "cancelled", reason: "user" });
    assert.equal(backend.streamsStarted, 0);
  });

  it("honors cancellation at the next chunk boundary and discards the partial answer", async () => {
    const backend = new ScriptedBackend([["one ", "two ", "three"]]);
    const cache = new ResponseCache(10, silentLogger);
    const chunks: string[] = [];
    const token = new CancellationToken();
    const request: SessionRequest = {
      ...makeRequest(chunks),
      sink: (chunk) => {
        chunks.push(chunk);
        token.cancel("stop");
      },
    };
    const session = new StreamingSession(request, backend, cache, { timeoutMs: 1000 }, token, silentLogger);

    const outcome = await session.run();

    assert.deepEqual(outcome, { status: "cancelled", reason: "stop" });
    assert.deepEqual(chunks, ["one "]);
    assert.equal(session.accumulatedText, "");
    assert.equal(session.cancelRequested, true);
    assert.equal(cache.size, 0);
  });

  it("resolves cancelled when the watchdog fires after a cancel request", async () => {
    const { cache, session, token } = setup(["a", { hang: true }], 30);

    const running = session.run();
    setTimeout(() => token.cancel("user"), 5);
    const outcome = await running;

    assert.deepEqual(outcome, { status: "cancelled", reason: "user" });
    assert.equal(cache.size, 0);
  });

  it("surfaces backend errors immediately", async () => {
    const { session } = setup(["a", { error: new BackendError("Ollama error: model not found") }]);

    const outcome = await session.run();

    assert.ok(outcome.status === "failed");
    assert.equal(outcome.error.code, "BACKEND_ERROR");
    assert.equal(outcome.error.message, "Ollama error: model not found");
    assert.equal(outcome.partialChunks, 1);
  });

  it("wraps unknown backend failures as BackendError", async () => {
    const { session } = setup([{ error: new Error("socket hang up") }]);
    const outcome = await session.run();
    assert.ok(outcome.status === "failed");
    assert.equal(outcome.error.code, "BACKEND_ERROR");
    assert.equal(outcome.error.message, "socket hang up");
  });

  it("keeps streaming when the chunk sink throws", async () => {
    const backend = new ScriptedBackend([["a", "b"]]);
    const logger = new MemoryLogger();
    const request: SessionRequest = {
      ...makeRequest([]),
      sink: () => {
        throw new Error("display gone");
      },
    };
    const session = new StreamingSession(request, backend, null, { timeoutMs: 1000 }, undefined, logger);

    const outcome = await session.run();

    assert.deepEqual(outcome, { status: "completed", text: "ab", chunks: 2 });
    assert.equal(logger.lines.filter((l) => l === "error [Session] q1 chunk sink failed: display gone").length, 2);
  });

  it("runs only once", async () => {
    const { session } = setup(["a"]);
    await session.run();
    await assert.rejects(session.run(), /already started/);
  });
});
