import { EventChannel } from "../shared/event-channel.js";
import type { OrchestratorError } from "../shared/errors.js";
import type { SessionHandle } from "./request-scheduler.js";

export type AskResult =
  | { status: "completed"; queryId: string; text: string; cached: boolean; attempts: number }
  | { status: "failed"; queryId: string; error: OrchestratorError; attempts: number }
  | { status: "cancelled"; queryId: string; reason: string }
  | { status: "rejected"; queryId: string; error: OrchestratorError };

export type StreamEvent =
  | { type: "chunk"; text: string }
  | { type: "queued"; position: number }
  | { type: "retrying"; attempt: number; reason: string }
  | { type: "done"; result: AskResult };

export interface StreamCallbacks {
  /** Chunks of the current attempt */
  onChunk?: (chunk: string) => void;
  /** A new attempt starts from scratch: drop the chunks received so far */
  onRetry?: (attempt: number, reason: string) => void;
}

/** How the request got in: known as soon as ask() returns */
export type Admission = "pending" | "cached" | "started" | "queued" | "rejected";

/**
 * One answer, consumable either by pulling events (for await) or by
 * awaiting `result`. A cache hit and a fresh inference look the same:
 * chunks, then a single `done` event.
 */
export class AnswerStream implements AsyncIterable<StreamEvent> {
  readonly queryId: string;
  readonly result: Promise<AskResult>;
  private readonly channel = new EventChannel<StreamEvent>();
  private readonly callbacks: StreamCallbacks;
  private readonly resolveResult: (result: AskResult) => void;
  private handle: SessionHandle | null = null;
  private cancelReason: string | null = null;
  admission: Admission = "pending";

  constructor(queryId: string, callbacks: StreamCallbacks = {}) {
    this.queryId = queryId;
    this.callbacks = callbacks;
    let resolveResult: (result: AskResult) => void = () => undefined;
    this.result = new Promise((resolve) => {
      resolveResult = resolve;
    });
    this.resolveResult = resolveResult;
  }

  get done(): boolean {
    return this.channel.isClosed;
  }

  get cancelRequested(): boolean {
    return this.cancelReason !== null;
  }

  /** Follow a (new) scheduler handle; a pending cancel is forwarded at once */
  attach(handle: SessionHandle): void {
    this.handle = handle;
    if (this.cancelReason !== null) {
      handle.cancel(this.cancelReason);
    }
  }

  cancel(reason: string = "requested"): void {
    if (this.cancelReason !== null || this.done) {
      return;
    }
    this.cancelReason = reason;
    this.handle?.cancel(reason);
  }

  emitChunk(text: string): void {
    if (this.done) {
      return;
    }
    this.channel.push({ type: "chunk", text });
    this.callbacks.onChunk?.(text);
  }

  emit(event: Exclude<StreamEvent, { type: "chunk" } | { type: "done" }>): void {
    if (this.done) {
      return;
    }
    this.channel.push(event);
    if (event.type === "retrying") {
      this.callbacks.onRetry?.(event.attempt, event.reason);
    }
  }

  finish(result: AskResult): void {
    if (this.done) {
      return;
    }
    this.channel.push({ type: "done", result });
    this.channel.close();
    this.resolveResult(result);
  }

  [Symbol.asyncIterator](): AsyncIterator<StreamEvent> {
    return this.channel[Symbol.asyncIterator]();
  }
}
