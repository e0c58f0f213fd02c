/**
 * Interactive shell over the orchestrator
 *
 * Commands:
 *   ask <question>        one-off question (cached)
 *   chat <message>        question with conversation history
 *   scene <image> [mode] [target]   describe | read | find
 *   stats                 metrics, pressure and battery health
 *   clear                 empty cache and conversation
 *   quit
 *
 * Usage: npx tsx scripts/interactive.ts
 */

import { createInterface } from "node:readline/promises";
import { loadConfig, printConfig, validateConfig } from "../src/config.js";
import { createOrchestrator } from "../src/index.js";
import type { Orchestrator } from "../src/services/orchestrator.js";
import { OllamaBackend } from "../src/services/ollama-backend.js";
import { detectProbe } from "../src/services/resource-probe.js";
import type { SceneMode } from "../src/services/scene.js";
import { ConsoleDisplaySink } from "../src/sinks/console-display.js";

const SCENE_MODES: readonly SceneMode[] = ["describe", "read", "find"];

async function streamAnswer(orchestrator: Orchestrator, prompt: string, useContext: boolean): Promise<void> {
  const stream = orchestrator.ask(prompt, { useContext, silent: true });

  for await (const event of stream) {
    switch (event.type) {
      case "chunk":
        process.stdout.write(event.text);
        break;
      case "queued":
        console.log(`(waiting, position ${event.position})`);
        break;
      case "retrying":
        console.log(`\n(retrying: ${event.reason})`);
        break;
      case "done": {
        const { result } = event;
        if (result.status === "completed") {
          console.log(result.cached ? "\n(cached)" : "");
        } else if (result.status === "cancelled") {
          console.log(`\n(cancelled: ${result.reason})`);
        } else {
          console.log(`\n❌ ${result.error.message}`);
        }
        break;
      }
    }
  }
}

async function analyze(orchestrator: Orchestrator, args: string[]): Promise<void> {
  const [imageRef, rawMode, ...rest] = args;
  if (!imageRef) {
    console.log("Usage: scene <image> [describe|read|find] [target]");
    return;
  }
  const mode = SCENE_MODES.find((m) => m === rawMode) ?? "describe";
  const target = rest.join(" ") || undefined;

  const analysis = await orchestrator.analyzeScene(imageRef, { mode, target, silent: true });
  if (!analysis.ok) {
    console.log(`❌ Scene analysis ${analysis.status}: ${analysis.error?.message ?? "no reason"}`);
    return;
  }
  console.log(`Summary: ${analysis.summary}`);
  if (analysis.objects.length > 0) console.log(`Objects: ${analysis.objects.join(", ")}`);
  if (analysis.visibleText) console.log(`Text: ${analysis.visibleText}`);
  if (analysis.found !== null) console.log(`Found ${target ?? "target"}: ${analysis.found ? "yes" : "no"}`);
  if (analysis.cached) console.log("(cached)");
}

function printStats(orchestrator: Orchestrator): void {
  const metrics = orchestrator.metrics();
  const status = orchestrator.status();
  const reading = status.monitor.reading;

  console.log("\n📊 Metrics");
  console.log(`  Requests: ${metrics.totalRequests} (cache hits ${metrics.cacheHits}, ${metrics.cacheHitRate}%)`);
  console.log(`  Average response: ${metrics.averageResponseTimeMs}ms`);
  console.log(`  Retries: ${metrics.retries}, failures: ${metrics.failures}, rejections: ${metrics.rejections}`);
  console.log(`  Cache: ${metrics.cache.size}/${metrics.cache.capacity} entries, ${metrics.cache.evictions} evictions`);
  console.log(`  Pressure: ${status.monitor.pressure}${status.monitor.stale ? " (stale)" : ""}`);
  if (reading) {
    const temp = reading.tempC !== null ? `${reading.tempC.toFixed(1)}°C` : "n/a";
    console.log(`  Battery: ${reading.batteryPct}% at ${reading.voltage.toFixed(2)}V, CPU ${reading.cpuPct.toFixed(0)}%, ${temp}`);
  }
  console.log(
    `  Scheduler: ${status.scheduler.inFlight}/${status.scheduler.maxConcurrent} in flight, ${status.scheduler.queued} queued`
  );
  console.log(`  Conversation: ${status.contextMessages} messages\n`);
}

async function main(): Promise<void> {
  const config = loadConfig();
  printConfig(config);

  const { ollama } = await validateConfig(config);
  if (!ollama) {
    console.log(`⚠️  Ollama is not reachable at ${config.ollama.baseUrl}; answers will fail until it is up`);
  }

  const probe = await detectProbe(config.monitor);
  const orchestrator = createOrchestrator(config, {
    backend: new OllamaBackend(config.ollama),
    probe,
    display: new ConsoleDisplaySink(),
  });
  orchestrator.start();

  const rl = createInterface({ input: process.stdin, output: process.stdout });
  console.log("\nType a question, or: ask | chat | scene | stats | clear | quit\n");

  try {
    while (true) {
      const line = (await rl.question("> ")).trim();
      if (!line) continue;

      const [command, ...args] = line.split(/\s+/);
      const rest = line.slice(command.length).trim();

      switch (command.toLowerCase()) {
        case "quit":
        case "exit":
          return;
        case "ask":
          await streamAnswer(orchestrator, rest, false);
          break;
        case "chat":
          await streamAnswer(orchestrator, rest, true);
          break;
        case "scene":
          await analyze(orchestrator, args);
          break;
        case "stats":
          printStats(orchestrator);
          break;
        case "clear":
          orchestrator.clearCache();
          orchestrator.clearContext();
          console.log("Cache and conversation cleared");
          break;
        default:
          await streamAnswer(orchestrator, line, false);
      }
    }
  } finally {
    rl.close();
    orchestrator.stop();
  }
}

main().catch((error: unknown) => {
  console.error("Interactive shell failed:", error);
  process.exit(1);
});
