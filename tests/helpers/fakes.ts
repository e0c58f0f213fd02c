/**
 * In-process stand-ins for the orchestrator's collaborators
 */

import type {
  AlertListener,
  DisplaySink,
  InferenceBackend,
  InferenceRequest,
  Logger,
  NotificationItem,
  PressureLevel,
  PressureSource,
  ProbeReading,
  QueryKind,
  ResourceProbe,
} from "../../src/types.js";

/** A latch the test opens to let a scripted stream continue */
export class Gate {
  readonly opened: Promise<void>;
  private release: () => void = () => undefined;

  constructor() {
    this.opened = new Promise((resolve) => {
      this.release = resolve;
    });
  }

  open(): void {
    this.release();
  }
}

/**
 * One scripted stream:
 * - string: yield it as a chunk
 * - { delayMs }: wait (cut short by abort)
 * - { gate }: wait for the gate (or abort)
 * - { error }: throw it
 * - { hang: true }: never produce anything more until aborted
 */
export type Step = string | { delayMs: number } | { gate: Gate } | { error: Error } | { hang: true };

function untilAborted(signal: AbortSignal, other?: Promise<void>): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    signal.addEventListener("abort", () => resolve(), { once: true });
    other?.then(resolve, resolve);
  });
}

function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const timer = setTimeout(resolve, ms);
    signal.addEventListener(
      "abort",
      () => {
        clearTimeout(timer);
        resolve();
      },
      { once: true }
    );
  });
}

async function* play(steps: Step[], signal: AbortSignal): AsyncGenerator<string> {
  for (const step of steps) {
    if (typeof step === "string") {
      yield step;
    } else if ("delayMs" in step) {
      await sleep(step.delayMs, signal);
    } else if ("gate" in step) {
      await untilAborted(signal, step.gate.opened);
    } else if ("error" in step) {
      throw step.error;
    } else {
      await untilAborted(signal);
      return;
    }
  }
}

export class ScriptedBackend implements InferenceBackend {
  readonly requests: InferenceRequest[] = [];
  private readonly scripts: Step[][];

  constructor(scripts: Step[][] = [], private readonly fallback: Step[] = ["ok"]) {
    this.scripts = [...scripts];
  }

  /** Script for the next stream that starts */
  enqueue(...steps: Step[]): void {
    this.scripts.push(steps);
  }

  get streamsStarted(): number {
    return this.requests.length;
  }

  modelFor(kind: QueryKind): string {
    return kind === "vision" ? "test-vision" : "test-model";
  }

  startStream(request: InferenceRequest): AsyncIterable<string> {
    this.requests.push(request);
    const [steps] = this.scripts.splice(0, 1);
    return play(steps ?? this.fallback, request.signal);
  }
}

export const NORMAL_READING: ProbeReading = { batteryPct: 80, voltage: 3.9, cpuPct: 20, tempC: 40 };

/**
 * Probe that returns whatever the test set last; `fail()` makes reads throw
 */
export class FakeProbe implements ResourceProbe {
  readonly name = "fake";
  reads = 0;
  private reading: ProbeReading = NORMAL_READING;
  private failure: Error | null = null;

  set(reading: Partial<ProbeReading>): void {
    this.reading = { ...this.reading, ...reading };
    this.failure = null;
  }

  fail(message: string = "sensor offline"): void {
    this.failure = new Error(message);
  }

  read(): ProbeReading {
    this.reads++;
    if (this.failure) {
      throw this.failure;
    }
    return { ...this.reading };
  }
}

/** Pressure the test moves by hand; every change raises an alert */
export class FakePressure implements PressureSource {
  private readonly listeners = new Set<AlertListener>();

  constructor(private level: PressureLevel = "normal") {}

  currentPressure(): PressureLevel {
    return this.level;
  }

  onAlert(listener: AlertListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  set(level: PressureLevel): void {
    const from = this.level;
    if (from === level) {
      return;
    }
    this.level = level;
    for (const listener of [...this.listeners]) {
      listener({ from, to: level, reason: "threshold", reading: null, at: Date.now() });
    }
  }
}

export class RecordingDisplay implements DisplaySink {
  readonly items: NotificationItem[] = [];

  render(item: NotificationItem): void {
    this.items.push(item);
  }
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

/** Logger that keeps every line, prefixed with its level */
export class MemoryLogger implements Logger {
  readonly lines: string[] = [];
  debug(message: string): void {
    this.lines.push(`debug ${message}`);
  }
  info(message: string): void {
    this.lines.push(`info ${message}`);
  }
  warn(message: string): void {
    this.lines.push(`warn ${message}`);
  }
  error(message: string): void {
    this.lines.push(`error ${message}`);
  }
}

/** Manually advanced clock */
export class FakeClock {
  constructor(public current: number = 1_000_000) {}
  now = (): number => this.current;
  advance(ms: number): void {
    this.current += ms;
  }
}

/** Let pending promise callbacks and immediates run */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

export async function waitFor(condition: () => boolean, timeoutMs: number = 1000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) {
      throw new Error("waitFor: condition not met in time");
    }
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
}

export interface FetchCall {
  url: string;
  init?: RequestInit;
}

/**
 * fetch stand-in that answers from a queue of responders
 */
export class FakeFetch {
  readonly calls: FetchCall[] = [];
  private readonly responders: Array<() => Response | Promise<Response>> = [];

  reply(responder: () => Response | Promise<Response>): this {
    this.responders.push(responder);
    return this;
  }

  fn = (url: string, init?: RequestInit): Promise<Response> => {
    this.calls.push({ url, init });
    const [responder] = this.responders.splice(0, 1);
    if (!responder) {
      return Promise.reject(new Error("fetch failed: no scripted response"));
    }
    return Promise.resolve().then(responder);
  };
}

/** A streaming NDJSON body delivered in the given byte pieces */
export function ndjsonResponse(pieces: string[], status: number = 200): Response {
  const encoder = new TextEncoder();
  const body = new ReadableStream<Uint8Array>({
    start(controller) {
      for (const piece of pieces) {
        controller.enqueue(encoder.encode(piece));
      }
      controller.close();
    },
  });
  return new Response(body, { status });
}
