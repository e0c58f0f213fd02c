/**
 * StreamingSession - one query's trip through the inference backend
 *
 * Pending -> Streaming -> Completed | Failed | Cancelled
 *
 * - Chunks are appended and forwarded strictly in arrival order
 * - A watchdog fails the session when no chunk arrives within the timeout
 * - Cancellation is cooperative: the token is checked at chunk boundaries
 * - Only a completed, non-empty answer is written to the cache
 */

import { CancellationToken } from "../shared/cancellation.js";
import {
  BackendTimeoutError,
  errorMessage,
  toOrchestratorError,
  type OrchestratorError,
} from "../shared/errors.js";
import type { ChatMessage, InferenceBackend, Logger, Query } from "../types.js";
import type { ResponseCache } from "./response-cache.js";

export type SessionState = "pending" | "streaming" | "completed" | "failed" | "cancelled";

export type SessionOutcome =
  | { status: "completed"; text: string; chunks: number }
  | { status: "failed"; error: OrchestratorError; partialChunks: number }
  | { status: "cancelled"; reason: string };

export type ChunkSink = (chunk: string) => void;

export interface SessionRequest {
  query: Query;
  /** null disables caching for this query */
  cacheKey: string | null;
  messages: ChatMessage[];
  image?: string;
  format?: object;
  sink: ChunkSink;
}

export interface SessionOptions {
  timeoutMs: number;
}

const TRANSITIONS: Record<SessionState, SessionState[]> = {
  pending: ["streaming", "cancelled"],
  streaming: ["completed", "failed", "cancelled"],
  completed: [],
  failed: [],
  cancelled: [],
};

type NextStep<T> = { kind: "value"; result: IteratorResult<T> } | { kind: "timeout" };

export class StreamingSession {
  readonly query: Query;
  private _state: SessionState = "pending";
  private _chunksEmitted = 0;
  private _accumulatedText = "";
  private running = false;

  constructor(
    private readonly request: SessionRequest,
    private readonly backend: InferenceBackend,
    private readonly cache: ResponseCache | null,
    private readonly options: SessionOptions,
    private readonly token: CancellationToken = new CancellationToken(),
    private readonly logger: Logger = console
  ) {
    this.query = request.query;
  }

  get state(): SessionState {
    return this._state;
  }

  get chunksEmitted(): number {
    return this._chunksEmitted;
  }

  get accumulatedText(): string {
    return this._accumulatedText;
  }

  get cancelRequested(): boolean {
    return this.token.cancelled;
  }

  get isTerminal(): boolean {
    return TRANSITIONS[this._state].length === 0;
  }

  cancel(reason?: string): void {
    this.token.cancel(reason);
  }

  private transition(next: SessionState): void {
    if (!TRANSITIONS[this._state].includes(next)) {
      throw new Error(`[Session] Illegal transition ${this._state} -> ${next}`);
    }
    this.logger.debug(`[Session] ${this.query.id} ${this._state} -> ${next}`);
    this._state = next;
  }

  /**
   * Drive the backend until a terminal state. Resolves, never rejects.
   */
  async run(): Promise<SessionOutcome> {
    if (this.running || this._state !== "pending") {
      throw new Error(`[Session] ${this.query.id} already started`);
    }
    this.running = true;

    if (this.token.cancelled) {
      return this.finishCancelled();
    }

    this.transition("streaming");
    const controller = new AbortController();
    let iterator: AsyncIterator<string>;

    try {
      iterator = this.backend
        .startStream({
          kind: this.query.kind,
          prompt: this.query.prompt,
          messages: this.request.messages,
          image: this.request.image,
          format: this.request.format,
          signal: controller.signal,
        })
        [Symbol.asyncIterator]();
    } catch (error) {
      return this.finishFailed(toOrchestratorError(error));
    }

    // Only non-empty chunks count as progress
    let deadline = Date.now() + this.options.timeoutMs;

    try {
      while (true) {
        const step = await this.nextWithTimeout(iterator, deadline);

        if (step.kind === "timeout") {
          this.close(iterator, controller);
          if (this.token.cancelled) {
            return this.finishCancelled();
          }
          return this.finishFailed(new BackendTimeoutError(this.options.timeoutMs));
        }

        if (step.result.done) {
          break;
        }

        // Chunk boundary
        if (this.token.cancelled) {
          this.close(iterator, controller);
          return this.finishCancelled();
        }

        const chunk = step.result.value;
        if (chunk.length === 0) {
          continue;
        }
        deadline = Date.now() + this.options.timeoutMs;
        this._accumulatedText += chunk;
        this._chunksEmitted++;
        this.deliver(chunk);
      }
    } catch (error) {
      controller.abort();
      if (this.token.cancelled) {
        return this.finishCancelled();
      }
      return this.finishFailed(toOrchestratorError(error));
    }

    if (this.token.cancelled) {
      return this.finishCancelled();
    }
    return this.finishCompleted();
  }

  private nextWithTimeout(iterator: AsyncIterator<string>, deadline: number): Promise<NextStep<string>> {
    return new Promise((resolve, reject) => {
      let timedOut = false;
      const timer = setTimeout(() => {
        timedOut = true;
        resolve({ kind: "timeout" });
      }, Math.max(0, deadline - Date.now()));

      iterator.next().then(
        (result) => {
          clearTimeout(timer);
          resolve({ kind: "value", result });
        },
        (error: unknown) => {
          clearTimeout(timer);
          if (timedOut) {
            this.logger.debug(`[Session] ${this.query.id} late backend error: ${errorMessage(error)}`);
            return;
          }
          reject(error);
        }
      );
    });
  }

  private deliver(chunk: string): void {
    try {
      this.request.sink(chunk);
    } catch (error) {
      this.logger.error(`[Session] ${this.query.id} chunk sink failed: ${errorMessage(error)}`);
    }
  }

  /** Close the backend connection without waiting on it */
  private close(iterator: AsyncIterator<string>, controller: AbortController): void {
    controller.abort();
    iterator.return?.().catch((error: unknown) => {
      this.logger.debug(`[Session] ${this.query.id} close failed: ${errorMessage(error)}`);
    });
  }

  private finishCompleted(): SessionOutcome {
    this.transition("completed");
    const text = this._accumulatedText;

    if (this.cache && this.request.cacheKey && text.length > 0) {
      this.cache.put(this.request.cacheKey, text);
    }

    this.logger.debug(`[Session] ${this.query.id} completed (${this._chunksEmitted} chunks)`);
    return { status: "completed", text, chunks: this._chunksEmitted };
  }

  private finishFailed(error: OrchestratorError): SessionOutcome {
    this.transition("failed");
    this.logger.warn(`[Session] ${this.query.id} failed: ${error.message}`);
    return { status: "failed", error, partialChunks: this._chunksEmitted };
  }

  private finishCancelled(): SessionOutcome {
    this.transition("cancelled");
    const reason = this.token.reason ?? "requested";
    this._accumulatedText = "";
    this.logger.debug(`[Session] ${this.query.id} cancelled (${reason})`);
    return { status: "cancelled", reason };
  }
}
