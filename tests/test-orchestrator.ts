import assert from "node:assert/strict";
import { describe, it } from "node:test";
import type { AnswerStream, StreamEvent } from "../src/services/answer-stream.js";
import { NotificationQueue } from "../src/services/notification-queue.js";
import { Orchestrator, describeAlert, type OrchestratorOptions } from "../src/services/orchestrator.js";
import { Preloader } from "../src/services/preloader.js";
import { ResourceMonitor } from "../src/services/resource-monitor.js";
import { ResponseCache } from "../src/services/response-cache.js";
import { SceneAnswerSchema, scenePrompt } from "../src/services/scene.js";
import { BackendError } from "../src/shared/errors.js";
import type { CaptureSource, PressureLevel } from "../src/types.js";
import {
  FakeProbe,
  Gate,
  RecordingDisplay,
  ScriptedBackend,
  flush,
  silentLogger,
  type Step,
} from "./helpers/fakes.js";

const IMAGE = "data:image/png;base64,aGVsbG8=";

interface SetupOptions {
  scripts?: Step[][];
  options?: OrchestratorOptions;
  capture?: CaptureSource;
  display?: RecordingDisplay;
}

function setup({ scripts = [], options = {}, capture, display }: SetupOptions = {}) {
  const backend = new ScriptedBackend(scripts);
  const probe = new FakeProbe();
  const monitor = new ResourceMonitor(probe, {}, silentLogger);
  const cache = new ResponseCache(10, silentLogger);
  const notifications = new NotificationQueue({}, silentLogger);
  const orchestrator = new Orchestrator(
    { backend, monitor, cache, notifications, capture, display, logger: silentLogger },
    { sessionTimeoutMs: 1000, ...options }
  );
  return { backend, probe, monitor, cache, notifications, orchestrator };
}

async function collect(stream: AnswerStream): Promise<StreamEvent[]> {
  const events: StreamEvent[] = [];
  for await (const event of stream) {
    events.push(event);
  }
  return events;
}

function drainTexts(queue: NotificationQueue): string[] {
  const texts: string[] = [];
  for (let item = queue.drainNext(); item; item = queue.drainNext()) {
    texts.push(`${item.priority}: ${item.text}`);
  }
  return texts;
}

describe("Orchestrator.ask", () => {
  it("streams a fresh answer, then replays it from cache as one chunk", async () => {
    const { backend, orchestrator, notifications } = setup({ scripts: [["It is ", "noon."]] });
    const firstChunks: string[] = [];
    const replayChunks: string[] = [];

    const first = orchestrator.ask("What time is it?", { onChunk: (c) => firstChunks.push(c) });
    assert.equal(first.admission, "started");
    const firstEvents = await collect(first);

    const second = orchestrator.ask("  what time is IT? ", { onChunk: (c) => replayChunks.push(c) });
    assert.equal(second.admission, "cached");
    const secondEvents = await collect(second);

    assert.deepEqual(firstEvents, [
      { type: "chunk", text: "It is " },
      { type: "chunk", text: "noon." },
      {
        type: "done",
        result: { status: "completed", queryId: first.queryId, text: "It is noon.", cached: false, attempts: 1 },
      },
    ]);
    assert.deepEqual(secondEvents, [
      { type: "chunk", text: "It is noon." },
      {
        type: "done",
        result: { status: "completed", queryId: second.queryId, text: "It is noon.", cached: true, attempts: 0 },
      },
    ]);
    assert.deepEqual(firstChunks, ["It is ", "noon."]);
    assert.deepEqual(replayChunks, ["It is noon."]);
    assert.equal(backend.streamsStarted, 1);
    assert.deepEqual(drainTexts(notifications), ["info: It is noon.", "info: Cached: It is noon."]);

    const metrics = orchestrator.metrics();
    assert.equal(metrics.totalRequests, 2);
    assert.equal(metrics.cacheHits, 1);
    assert.equal(metrics.cacheHitRate, 50);
    assert.equal(metrics.streamingResponses, 1);
    assert.equal(metrics.cache.hits, 1);
    assert.equal(metrics.cache.misses, 1);
  });

  it("skips the cache when asked to", async () => {
    const { backend, orchestrator } = setup({ scripts: [["one"], ["two"]] });
    await orchestrator.ask("hi").result;
    const result = await orchestrator.ask("hi", { useCache: false }).result;

    assert.equal(backend.streamsStarted, 2);
    assert.ok(result.status === "completed");
    assert.equal(result.text, "two");
  });

  it("rejects ordinary work at critical pressure and shows why", async () => {
    const { backend, probe, monitor, orchestrator, notifications } = setup();
    probe.set({ batteryPct: 5 });
    await monitor.sample();

    const stream = orchestrator.ask("hi");
    assert.equal(stream.admission, "rejected");
    const result = await stream.result;

    assert.ok(result.status === "rejected");
    assert.equal(result.error.code, "RESOURCE_EXHAUSTED");
    assert.equal(result.error.message, "Inference suspended at critical pressure");
    assert.equal(backend.streamsStarted, 0);
    assert.deepEqual(drainTexts(notifications), [
      "critical: Power critical: AI paused (battery 5%)",
      "warning: Low power: request not started",
    ]);
    assert.equal(orchestrator.metrics().rejections, 1);
  });

  it("queues an emergency at critical pressure and runs it on recovery", async () => {
    const { probe, monitor, orchestrator } = setup({ scripts: [["Calling for help."]] });
    probe.set({ batteryPct: 5 });
    await monitor.sample();

    const stream = orchestrator.ask("help", { kind: "emergency" });
    assert.equal(stream.admission, "queued");

    probe.set({ batteryPct: 80 });
    await monitor.sample();

    assert.deepEqual(await collect(stream), [
      { type: "queued", position: 1 },
      { type: "chunk", text: "Calling for help." },
      {
        type: "done",
        result: { status: "completed", queryId: stream.queryId, text: "Calling for help.", cached: false, attempts: 1 },
      },
    ]);
  });

  it("retries once after a timeout", async () => {
    const { backend, orchestrator } = setup({
      scripts: [[{ hang: true }], ["second try"]],
      options: { sessionTimeoutMs: 30 },
    });

    const stream = orchestrator.ask("hi");
    const events = await collect(stream);

    assert.deepEqual(events, [
      { type: "retrying", attempt: 2, reason: "No response chunk within 30ms" },
      { type: "chunk", text: "second try" },
      {
        type: "done",
        result: { status: "completed", queryId: stream.queryId, text: "second try", cached: false, attempts: 2 },
      },
    ]);
    assert.equal(backend.streamsStarted, 2);
    assert.equal(orchestrator.metrics().retries, 1);
    assert.equal(orchestrator.isCached("hi"), true);
  });

  it("tells chunk callers to start over when a retry follows partial output", async () => {
    const { orchestrator } = setup({
      scripts: [["partial ", { hang: true }], ["full answer"]],
      options: { sessionTimeoutMs: 30 },
    });
    let spoken: string[] = [];
    const retries: Array<[number, string]> = [];

    const result = await orchestrator.ask("hi", {
      onChunk: (chunk) => spoken.push(chunk),
      onRetry: (attempt, reason) => {
        retries.push([attempt, reason]);
        spoken = [];
      },
    }).result;

    assert.ok(result.status === "completed");
    assert.equal(result.text, "full answer");
    assert.equal(spoken.join(""), result.text);
    assert.deepEqual(retries, [[2, "No response chunk within 30ms"]]);
  });

  it("surfaces the second timeout without a third attempt", async () => {
    const { backend, orchestrator } = setup({
      scripts: [[{ hang: true }], [{ hang: true }]],
      options: { sessionTimeoutMs: 20 },
    });

    const result = await orchestrator.ask("hi").result;

    assert.ok(result.status === "failed");
    assert.equal(result.error.code, "BACKEND_TIMEOUT");
    assert.equal(result.attempts, 2);
    assert.equal(backend.streamsStarted, 2);
  });

  it("does not retry non-idempotent kinds", async () => {
    const { backend, orchestrator } = setup({ scripts: [[{ hang: true }]], options: { sessionTimeoutMs: 20 } });

    const result = await orchestrator.ask("turn on the lights", { kind: "action" }).result;

    assert.ok(result.status === "failed");
    assert.equal(result.error.code, "BACKEND_TIMEOUT");
    assert.equal(result.attempts, 1);
    assert.equal(backend.streamsStarted, 1);
    assert.equal(orchestrator.metrics().failures, 1);
  });

  it("does not retry when auto-retry is off", async () => {
    const { backend, orchestrator } = setup({
      scripts: [[{ hang: true }]],
      options: { sessionTimeoutMs: 20, autoRetry: false },
    });

    const result = await orchestrator.ask("hi").result;

    assert.equal(result.status, "failed");
    assert.equal(backend.streamsStarted, 1);
  });

  it("reports the first timeout when the retry is refused", async () => {
    const { backend, probe, monitor, orchestrator } = setup({
      scripts: [[{ hang: true }]],
      options: { sessionTimeoutMs: 50, scheduler: { shedOnPressure: false } },
    });

    const stream = orchestrator.ask("hi");
    probe.set({ batteryPct: 5 });
    await monitor.sample();
    const events = await collect(stream);

    assert.equal(events.length, 1);
    const [done] = events;
    assert.ok(done.type === "done" && done.result.status === "failed");
    assert.equal(done.result.error.code, "BACKEND_TIMEOUT");
    assert.equal(done.result.attempts, 1);
    assert.equal(backend.streamsStarted, 1);
  });

  it("surfaces backend errors without retrying", async () => {
    const { backend, orchestrator, notifications } = setup({
      scripts: [[{ error: new BackendError("Ollama error: model not found") }]],
    });

    const result = await orchestrator.ask("hi").result;

    assert.ok(result.status === "failed");
    assert.equal(result.error.code, "BACKEND_ERROR");
    assert.equal(backend.streamsStarted, 1);
    assert.deepEqual(drainTexts(notifications), ["warning: Request failed: Ollama error: model not found"]);
  });

  it("cancels at the next chunk and caches nothing", async () => {
    const gate = new Gate();
    const { orchestrator, notifications } = setup({ scripts: [["one ", { gate }, "two"]] });

    const stream = orchestrator.ask("count");
    const events: StreamEvent[] = [];
    for await (const event of stream) {
      events.push(event);
      if (event.type === "chunk") {
        stream.cancel();
        gate.open();
      }
    }

    assert.deepEqual(events, [
      { type: "chunk", text: "one " },
      { type: "done", result: { status: "cancelled", queryId: stream.queryId, reason: "requested" } },
    ]);
    assert.equal(orchestrator.isCached("count"), false);
    assert.equal(orchestrator.metrics().cancellations, 1);
    assert.deepEqual(drainTexts(notifications), ["info: Request cancelled"]);
  });

  it("cancels a queued ask without starting it", async () => {
    const gate = new Gate();
    const { backend, orchestrator } = setup({
      scripts: [[{ gate }, "first"]],
      options: { scheduler: { maxConcurrentByPressure: { normal: 1, elevated: 1, low: 1, critical: 0 } } },
    });

    const running = orchestrator.ask("first question");
    const waiting = orchestrator.ask("second question");
    assert.equal(waiting.admission, "queued");

    waiting.cancel("no longer needed");
    assert.deepEqual(await waiting.result, {
      status: "cancelled",
      queryId: waiting.queryId,
      reason: "no longer needed",
    });

    gate.open();
    assert.equal((await running.result).status, "completed");
    assert.equal(backend.streamsStarted, 1);
  });

  it("sends conversation history for context-bearing asks and bypasses the cache", async () => {
    const { backend, cache, orchestrator } = setup({
      scripts: [["Nice to meet you, Sam."], ["Your name is Sam."]],
    });

    await orchestrator.ask("My name is Sam", { useContext: true }).result;
    const result = await orchestrator.ask("What is my name?", { useContext: true }).result;

    assert.ok(result.status === "completed");
    assert.equal(result.text, "Your name is Sam.");
    assert.deepEqual(backend.requests[0].messages, [{ role: "user", content: "My name is Sam" }]);
    assert.deepEqual(backend.requests[1].messages, [
      { role: "user", content: "My name is Sam" },
      { role: "assistant", content: "Nice to meet you, Sam." },
      { role: "user", content: "What is my name?" },
    ]);
    assert.equal(cache.size, 0);
    assert.equal(orchestrator.status().contextMessages, 4);

    orchestrator.clearContext();
    assert.equal(orchestrator.status().contextMessages, 0);
  });

  it("rejects an empty prompt", async () => {
    const { backend, orchestrator } = setup();

    const stream = orchestrator.ask("   ");
    const result = await stream.result;

    assert.equal(stream.admission, "rejected");
    assert.ok(result.status === "rejected");
    assert.equal(result.error.code, "INVALID_QUERY");
    assert.equal(backend.streamsStarted, 0);
  });

  it("clearCache() forgets answers", async () => {
    const { orchestrator } = setup();
    await orchestrator.ask("hi").result;
    assert.equal(orchestrator.isCached("hi"), true);

    orchestrator.clearCache();
    assert.equal(orchestrator.isCached("hi"), false);
  });
});

describe("Orchestrator.analyzeScene", () => {
  it("parses a structured answer and caches it per image", async () => {
    const answer = ['{"summary": "A desk", ', '"objects": ["laptop", "mug"], "text": "EXIT"}'];
    const { backend, orchestrator } = setup({ scripts: [answer] });

    const first = await orchestrator.analyzeScene(IMAGE);
    const second = await orchestrator.analyzeScene(IMAGE);

    assert.deepEqual(first, {
      ok: true,
      mode: "describe",
      summary: "A desk",
      objects: ["laptop", "mug"],
      visibleText: "EXIT",
      found: null,
      cached: false,
      raw: answer.join(""),
    });
    assert.ok(second.ok);
    assert.equal(second.cached, true);
    assert.equal(backend.streamsStarted, 1);

    const request = backend.requests[0];
    assert.equal(request.kind, "vision");
    assert.equal(request.image, "aGVsbG8=");
    assert.deepEqual(request.messages, [{ role: "user", content: scenePrompt("describe") }]);
    assert.equal(request.format, SceneAnswerSchema);
  });

  it("finds a target from the listed objects", async () => {
    const { orchestrator } = setup({
      scripts: [['Sure! {"summary": "A mug on a table", "objects": ["coffee mug"], "text": ""}']],
    });

    const analysis = await orchestrator.analyzeScene(IMAGE, { mode: "find", target: "mug" });

    assert.ok(analysis.ok);
    assert.equal(analysis.found, true);
    assert.equal(analysis.summary, "A mug on a table");
    assert.equal(analysis.visibleText, null);
  });

  it("keeps a free-text answer as the summary", async () => {
    const { orchestrator } = setup({ scripts: [["A quiet street at night."]] });
    const analysis = await orchestrator.analyzeScene(IMAGE, { mode: "read" });

    assert.ok(analysis.ok);
    assert.equal(analysis.summary, "A quiet street at night.");
    assert.deepEqual(analysis.objects, []);
  });

  it("rejects an unreadable image reference", async () => {
    const { backend, orchestrator } = setup();

    const analysis = await orchestrator.analyzeScene("not an image!!");

    assert.ok(!analysis.ok);
    assert.equal(analysis.status, "rejected");
    assert.equal(analysis.error?.code, "INVALID_QUERY");
    assert.equal(backend.streamsStarted, 0);
  });

  it("analyzeCurrentView captures a frame first", async () => {
    const { backend, orchestrator } = setup({
      scripts: [['{"summary": "A door", "objects": [], "text": ""}']],
      capture: { captureFrame: async () => IMAGE },
    });

    const analysis = await orchestrator.analyzeCurrentView();

    assert.ok(analysis.ok);
    assert.equal(analysis.summary, "A door");
    assert.equal(backend.requests[0].image, "aGVsbG8=");
  });

  it("analyzeCurrentView without a camera is rejected", async () => {
    const { orchestrator } = setup();

    const analysis = await orchestrator.analyzeCurrentView();

    assert.ok(!analysis.ok);
    assert.equal(analysis.error?.code, "CAPTURE_FAILURE");
    assert.equal(analysis.error?.message, "No camera available");
  });
});

describe("Orchestrator.askByVoice", () => {
  it("asks the captured utterance as a voice query", async () => {
    const { backend, orchestrator } = setup({ capture: { captureUtterance: async () => "what time is it" } });

    const stream = await orchestrator.askByVoice();
    assert.ok(stream);
    const result = await stream.result;

    assert.equal(result.status, "completed");
    assert.equal(backend.requests[0].kind, "voice");
    assert.equal(backend.requests[0].prompt, "what time is it");
  });

  it("resolves null when nothing was heard", async () => {
    const { orchestrator } = setup({ capture: { captureUtterance: async () => null } });
    assert.equal(await orchestrator.askByVoice(), null);
  });

  it("turns a capture failure into a rejected answer", async () => {
    const { orchestrator } = setup({
      capture: {
        captureUtterance: async () => {
          throw new Error("mic busy");
        },
      },
    });

    const stream = await orchestrator.askByVoice();
    assert.ok(stream);
    const result = await stream.result;

    assert.ok(result.status === "rejected");
    assert.equal(result.error.code, "CAPTURE_FAILURE");
    assert.equal(result.error.message, "Voice capture failed: mic busy");
  });
});

describe("Orchestrator lifecycle", () => {
  it("delivers notifications to the display once started", async () => {
    const display = new RecordingDisplay();
    const { orchestrator } = setup({ display });

    orchestrator.start();
    assert.equal(orchestrator.status().running, true);
    await orchestrator.ask("hi").result;
    await flush();
    orchestrator.stop();

    assert.deepEqual(
      display.items.map((i) => i.text),
      ["ok"]
    );
  });

  it("stop() cancels outstanding work", async () => {
    const { orchestrator } = setup({ scripts: [[{ hang: true }]], options: { sessionTimeoutMs: 30 } });

    const stream = orchestrator.ask("hi");
    orchestrator.stop();
    const result = await stream.result;

    assert.deepEqual(result, { status: "cancelled", queryId: stream.queryId, reason: "shutdown" });
    assert.equal(orchestrator.status().running, false);
  });

  it("warms the cache with preload queries", async () => {
    const { backend, orchestrator, notifications } = setup({ options: { preloadQueries: ["What time is it?", "Help"] } });

    orchestrator.start();
    await new Promise((resolve) => setTimeout(resolve, 20));
    orchestrator.stop();

    assert.equal(orchestrator.isCached("What time is it?"), true);
    assert.equal(orchestrator.isCached("Help"), true);
    assert.equal(backend.streamsStarted, 2);
    assert.equal(notifications.size, 0);
  });

  it("describes pressure alerts for the display", () => {
    const at = 0;
    const reading = { batteryPct: 18.4, voltage: 3.7, cpuPct: 10, tempC: 30, timestamp: 0 };
    assert.equal(describeAlert({ from: "normal", to: "low", reason: "threshold", reading, at }), "Power low: AI limited (battery 18%)");
    assert.equal(
      describeAlert({ from: "normal", to: "critical", reason: "probe_failure", reading: null, at }),
      "Power monitor not responding: AI limited"
    );
  });
});

describe("Preloader", () => {
  it("skips cached prompts and prompts met under pressure", async () => {
    let pressure: PressureLevel = "normal";
    const warmed: string[] = [];
    const { orchestrator } = setup();

    const preloader = new Preloader(
      ["a", "b", "c"],
      {
        isCached: (prompt) => prompt === "a",
        currentPressure: () => pressure,
        warm: (prompt) => {
          warmed.push(prompt);
          pressure = "elevated";
          return orchestrator.ask(prompt, { silent: true });
        },
      },
      silentLogger
    );

    assert.equal(await preloader.run(), 1);
    assert.deepEqual(warmed, ["b"]);
  });
});
