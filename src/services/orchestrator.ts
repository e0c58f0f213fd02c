/**
 * Orchestrator - the public face of the response pipeline
 *
 * ask(prompt) -> cache -> scheduler -> streaming session -> cache
 * Every terminal outcome is mirrored into the notification queue.
 */

import { randomUUID } from "node:crypto";
import {
  CaptureError,
  InvalidQueryError,
  errorMessage,
  toOrchestratorError,
  type OrchestratorError,
} from "../shared/errors.js";
import { ALERT_PRIORITY } from "../shared/pressure-config.js";
import type {
  CacheStats,
  CaptureSource,
  ChatMessage,
  DisplaySink,
  InferenceBackend,
  Logger,
  MonitorSnapshot,
  PressureAlert,
  Query,
  QueryKind,
} from "../types.js";
import { AnswerStream, type AskResult, type StreamCallbacks } from "./answer-stream.js";
import { ConversationContext, DEFAULT_CONTEXT_WINDOW, type ContextWindowConfig } from "./conversation-context.js";
import { loadImage, type LoadedImage } from "./image-ref.js";
import { NotificationPump, type NotificationQueue } from "./notification-queue.js";
import { Preloader } from "./preloader.js";
import { RequestScheduler, type SchedulerOptions, type SchedulerSnapshot } from "./request-scheduler.js";
import type { ResourceMonitor } from "./resource-monitor.js";
import { computeCacheKey, type ResponseCache } from "./response-cache.js";
import { SceneAnswerSchema, scenePrompt, toSceneAnalysis, type SceneAnalysis, type SceneMode } from "./scene.js";
import { StreamingSession, type SessionOutcome } from "./streaming-session.js";

export interface AskOptions {
  kind?: QueryKind;
  /** Send prior turns and record this one; bypasses the cache */
  useContext?: boolean;
  useCache?: boolean;
  onChunk?: (chunk: string) => void;
  /** After an automatic retry starts, onChunk restarts with the new attempt's chunks */
  onRetry?: (attempt: number, reason: string) => void;
  /** No display notifications for this query */
  silent?: boolean;
}

export interface SceneOptions {
  mode?: SceneMode;
  /** What to look for in mode "find" */
  target?: string;
  onChunk?: (chunk: string) => void;
  /** After an automatic retry starts, onChunk restarts with the new attempt's chunks */
  onRetry?: (attempt: number, reason: string) => void;
  silent?: boolean;
}

export interface OrchestratorParts {
  backend: InferenceBackend;
  monitor: ResourceMonitor;
  cache: ResponseCache;
  notifications: NotificationQueue;
  display?: DisplaySink;
  capture?: CaptureSource;
  logger?: Logger;
  now?: () => number;
}

export interface OrchestratorOptions {
  cacheEnabled?: boolean;
  scheduler?: SchedulerOptions;
  sessionTimeoutMs?: number;
  autoRetry?: boolean;
  nonIdempotentKinds?: QueryKind[];
  context?: ContextWindowConfig;
  /** Empty disables preloading */
  preloadQueries?: string[];
}

export interface OrchestratorMetrics {
  totalRequests: number;
  cacheHits: number;
  /** Percent of all requests answered from cache */
  cacheHitRate: number;
  averageResponseTimeMs: number;
  streamingResponses: number;
  retries: number;
  failures: number;
  cancellations: number;
  rejections: number;
  cache: CacheStats;
}

export interface OrchestratorStatus {
  running: boolean;
  monitor: MonitorSnapshot;
  scheduler: SchedulerSnapshot;
  notificationsQueued: number;
  contextMessages: number;
}

/** Everything needed to (re)submit one query */
interface PendingAsk {
  query: Query;
  cacheKey: string | null;
  messages: ChatMessage[];
  image?: string;
  format?: object;
  useContext: boolean;
  silent: boolean;
  startedAt: number;
}

const PREVIEW_LENGTH = 80;

export function createQuery(kind: QueryKind, prompt: string, imageRef?: string, now: number = Date.now()): Query {
  return Object.freeze({ id: randomUUID(), kind, prompt, imageRef, submittedAt: now });
}

function preview(text: string): string {
  const flat = text.replace(/\s+/g, " ").trim();
  return flat.length > PREVIEW_LENGTH ? `${flat.slice(0, PREVIEW_LENGTH - 3)}...` : flat;
}

export function describeAlert(alert: PressureAlert): string {
  if (alert.reason === "probe_failure") {
    return "Power monitor not responding: AI limited";
  }
  const battery = alert.reading ? ` (battery ${Math.round(alert.reading.batteryPct)}%)` : "";
  switch (alert.to) {
    case "normal":
      return `Power normal${battery}`;
    case "elevated":
      return `System busy: AI slowed${battery}`;
    case "low":
      return `Power low: AI limited${battery}`;
    case "critical":
      return `Power critical: AI paused${battery}`;
  }
}

function describeRejection(error: OrchestratorError): string {
  switch (error.code) {
    case "RESOURCE_EXHAUSTED":
      return "Low power: request not started";
    case "OVERLOADED":
      return "Busy: try again shortly";
    case "CAPTURE_FAILURE":
      return `Capture failed: ${error.message}`;
    default:
      return `Invalid request: ${error.message}`;
  }
}

export class Orchestrator {
  readonly scheduler: RequestScheduler;
  private readonly backend: InferenceBackend;
  private readonly monitor: ResourceMonitor;
  private readonly cache: ResponseCache;
  private readonly notifications: NotificationQueue;
  private readonly capture: CaptureSource | null;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly context: ConversationContext;
  private readonly pump: NotificationPump | null;
  private readonly preloader: Preloader | null;

  private readonly cacheEnabled: boolean;
  private readonly autoRetry: boolean;
  private readonly nonIdempotentKinds: QueryKind[];
  private readonly unsubscribeAlerts: () => void;
  private running = false;
  private stopped = false;

  private counters = {
    totalRequests: 0,
    cacheHits: 0,
    streamingResponses: 0,
    retries: 0,
    failures: 0,
    cancellations: 0,
    rejections: 0,
    completed: 0,
    responseTimeTotalMs: 0,
  };

  constructor(parts: OrchestratorParts, options: OrchestratorOptions = {}) {
    this.backend = parts.backend;
    this.monitor = parts.monitor;
    this.cache = parts.cache;
    this.notifications = parts.notifications;
    this.capture = parts.capture ?? null;
    this.logger = parts.logger || console;
    this.now = parts.now || Date.now;

    this.cacheEnabled = options.cacheEnabled ?? true;
    this.autoRetry = options.autoRetry ?? true;
    this.nonIdempotentKinds = options.nonIdempotentKinds ?? ["action"];
    this.context = new ConversationContext(options.context ?? DEFAULT_CONTEXT_WINDOW);

    const timeoutMs = options.sessionTimeoutMs ?? 30_000;
    this.scheduler = new RequestScheduler(
      this.monitor,
      (request, token) =>
        new StreamingSession(
          request,
          this.backend,
          this.cacheEnabled ? this.cache : null,
          { timeoutMs },
          token,
          this.logger
        ),
      options.scheduler,
      this.logger
    );

    this.pump = parts.display ? new NotificationPump(this.notifications, parts.display, this.logger) : null;

    const preloadQueries = options.preloadQueries ?? [];
    this.preloader =
      preloadQueries.length > 0 && this.cacheEnabled
        ? new Preloader(
            preloadQueries,
            {
              isCached: (prompt) => this.isCached(prompt),
              currentPressure: () => this.monitor.currentPressure(),
              warm: (prompt) => this.ask(prompt, { silent: true }),
            },
            this.logger
          )
        : null;

    this.unsubscribeAlerts = this.monitor.onAlert((alert) => this.onPressureAlert(alert));
  }

  /** Start monitoring, notification delivery and preloading */
  start(): void {
    if (this.running) {
      return;
    }
    if (this.stopped) {
      this.logger.warn("[Orchestrator] Already stopped; create a new instance to restart");
      return;
    }
    this.running = true;
    this.monitor.start();
    this.pump?.start();
    this.preloader?.start();
    this.logger.info("[Orchestrator] Started");
  }

  /** Stop background work and cancel everything outstanding */
  stop(): void {
    this.preloader?.stop();
    this.monitor.stop();
    this.unsubscribeAlerts();
    this.scheduler.dispose("shutdown");
    this.pump?.flush();
    this.pump?.stop();
    this.running = false;
    this.stopped = true;
    this.logger.info("[Orchestrator] Stopped");
  }

  /**
   * Ask a question. Returns at once with the answer stream; the admission
   * decision (cached, started, queued, rejected) is already known.
   */
  ask(prompt: string, options: AskOptions = {}): AnswerStream {
    const query = createQuery(options.kind ?? "text", prompt, undefined, this.now());
    return this.dispatch(query, null, options);
  }

  /**
   * Analyze an image: a file path, a data URI or raw base64
   */
  async analyzeScene(imageRef: string, options: SceneOptions = {}): Promise<SceneAnalysis> {
    const mode = options.mode ?? "describe";
    const query = createQuery("vision", scenePrompt(mode, options.target), imageRef, this.now());

    let image: LoadedImage;
    try {
      image = await loadImage(imageRef);
    } catch (error) {
      const stream = this.rejectUpfront(query, toOrchestratorError(error), options.silent === true);
      return toSceneAnalysis(mode, await stream.result, options.target);
    }

    const stream = this.dispatch(
      query,
      image,
      { onChunk: options.onChunk, onRetry: options.onRetry, silent: options.silent },
      SceneAnswerSchema
    );
    return toSceneAnalysis(mode, await stream.result, options.target);
  }

  /** Capture a frame from the camera and analyze it */
  async analyzeCurrentView(options: SceneOptions = {}): Promise<SceneAnalysis> {
    const mode = options.mode ?? "describe";
    const query = createQuery("vision", scenePrompt(mode, options.target), undefined, this.now());

    if (!this.capture?.captureFrame) {
      const stream = this.rejectUpfront(query, new CaptureError("No camera available"), options.silent === true);
      return toSceneAnalysis(mode, await stream.result, options.target);
    }

    let frame: string;
    try {
      frame = await this.capture.captureFrame();
    } catch (error) {
      const failure = new CaptureError(`Frame capture failed: ${errorMessage(error)}`, { cause: error });
      const stream = this.rejectUpfront(query, failure, options.silent === true);
      return toSceneAnalysis(mode, await stream.result, options.target);
    }
    return this.analyzeScene(frame, options);
  }

  /**
   * Capture one utterance and ask it. Resolves null when nothing was said.
   */
  async askByVoice(options: Omit<AskOptions, "kind"> = {}): Promise<AnswerStream | null> {
    if (!this.capture?.captureUtterance) {
      const query = createQuery("voice", "", undefined, this.now());
      return this.rejectUpfront(query, new CaptureError("No microphone available"), options.silent === true);
    }

    let utterance: string | null;
    try {
      utterance = await this.capture.captureUtterance();
    } catch (error) {
      const query = createQuery("voice", "", undefined, this.now());
      const failure = new CaptureError(`Voice capture failed: ${errorMessage(error)}`, { cause: error });
      return this.rejectUpfront(query, failure, options.silent === true);
    }

    if (utterance === null || utterance.trim().length === 0) {
      this.logger.debug("[Orchestrator] No speech captured");
      return null;
    }
    return this.ask(utterance, { ...options, kind: "voice" });
  }

  isCached(prompt: string, kind: QueryKind = "text"): boolean {
    if (!this.cacheEnabled) {
      return false;
    }
    return this.cache.has(computeCacheKey({ kind, prompt, modelId: this.backend.modelFor(kind) }));
  }

  clearCache(): void {
    this.cache.clear();
    this.logger.info("[Orchestrator] Cache cleared");
  }

  clearContext(): void {
    this.context.clear();
  }

  metrics(): OrchestratorMetrics {
    const c = this.counters;
    return {
      totalRequests: c.totalRequests,
      cacheHits: c.cacheHits,
      cacheHitRate: c.totalRequests > 0 ? Math.round((c.cacheHits / c.totalRequests) * 10_000) / 100 : 0,
      averageResponseTimeMs: c.completed > 0 ? Math.round(c.responseTimeTotalMs / c.completed) : 0,
      streamingResponses: c.streamingResponses,
      retries: c.retries,
      failures: c.failures,
      cancellations: c.cancellations,
      rejections: c.rejections,
      cache: this.cache.stats(),
    };
  }

  status(): OrchestratorStatus {
    return {
      running: this.running,
      monitor: this.monitor.snapshot(),
      scheduler: this.scheduler.snapshot(),
      notificationsQueued: this.notifications.size,
      contextMessages: this.context.length,
    };
  }

  private dispatch(query: Query, image: LoadedImage | null, options: AskOptions, format?: object): AnswerStream {
    const silent = options.silent === true;
    if (query.prompt.trim().length === 0) {
      return this.rejectUpfront(query, new InvalidQueryError("Prompt is empty"), silent, options);
    }

    const stream = new AnswerStream(query.id, { onChunk: options.onChunk, onRetry: options.onRetry });
    this.counters.totalRequests++;

    const useContext = options.useContext === true;
    const useCache = this.cacheEnabled && options.useCache !== false && !useContext;
    const cacheKey = useCache
      ? computeCacheKey({
          kind: query.kind,
          prompt: query.prompt,
          imageDigest: image?.digest ?? null,
          modelId: this.backend.modelFor(query.kind),
        })
      : null;

    if (cacheKey) {
      const entry = this.cache.get(cacheKey);
      if (entry) {
        this.replay(stream, query, entry.answer, silent);
        return stream;
      }
    }

    const pending: PendingAsk = {
      query,
      cacheKey,
      messages: this.context.build(query.prompt, useContext),
      image: image?.base64,
      format,
      useContext,
      silent,
      startedAt: this.now(),
    };
    this.submit(stream, pending, 1, null);
    return stream;
  }

  /** Cache hit: the whole answer as one chunk, then done */
  private replay(stream: AnswerStream, query: Query, answer: string, silent: boolean): void {
    this.counters.cacheHits++;
    this.counters.completed++;
    stream.admission = "cached";
    this.logger.debug(`[Orchestrator] Cache hit for ${query.id}`);
    try {
      stream.emitChunk(answer);
    } catch (error) {
      this.logger.error(`[Orchestrator] Chunk callback failed: ${errorMessage(error)}`);
    }
    this.finish(stream, query, { status: "completed", queryId: query.id, text: answer, cached: true, attempts: 0 }, silent);
  }

  private rejectUpfront(
    query: Query,
    error: OrchestratorError,
    silent: boolean,
    callbacks: StreamCallbacks = {}
  ): AnswerStream {
    const stream = new AnswerStream(query.id, { onChunk: callbacks.onChunk, onRetry: callbacks.onRetry });
    this.counters.totalRequests++;
    stream.admission = "rejected";
    this.finish(stream, query, { status: "rejected", queryId: query.id, error }, silent);
    return stream;
  }

  /**
   * Hand a query to the scheduler. `previous` is the failure that
   * triggered this attempt, surfaced instead if the retry is refused.
   */
  private submit(stream: AnswerStream, pending: PendingAsk, attempt: number, previous: OrchestratorError | null): void {
    const { query } = pending;
    const admission = this.scheduler.submit({
      query,
      cacheKey: pending.cacheKey,
      messages: pending.messages,
      image: pending.image,
      format: pending.format,
      sink: (chunk) => stream.emitChunk(chunk),
    });

    if (!admission.admitted) {
      const result: AskResult = previous
        ? { status: "failed", queryId: query.id, error: previous, attempts: attempt - 1 }
        : { status: "rejected", queryId: query.id, error: admission.error };
      if (!previous) {
        stream.admission = "rejected";
      }
      this.finish(stream, query, result, pending.silent);
      return;
    }

    stream.attach(admission.handle);
    if (previous) {
      this.counters.retries++;
      try {
        stream.emit({ type: "retrying", attempt, reason: previous.message });
      } catch (error) {
        this.logger.error(`[Orchestrator] Retry callback failed: ${errorMessage(error)}`);
      }
    }
    if (attempt === 1) {
      stream.admission = admission.queued ? "queued" : "started";
    }
    if (admission.queued) {
      stream.emit({ type: "queued", position: admission.position });
    }
    if (!pending.silent) {
      this.notifications.push({
        text: admission.queued ? `Waiting (#${admission.position}): ${preview(query.prompt)}` : "Thinking...",
        priority: "info",
        dedupeKey: `query:${query.id}`,
      });
    }

    admission.handle.outcome
      .then((outcome) => this.settle(stream, pending, attempt, outcome))
      .catch((error: unknown) => {
        this.logger.error(`[Orchestrator] Settling ${query.id} failed: ${errorMessage(error)}`);
        this.finish(
          stream,
          query,
          { status: "failed", queryId: query.id, error: toOrchestratorError(error), attempts: attempt },
          pending.silent
        );
      });
  }

  private settle(stream: AnswerStream, pending: PendingAsk, attempt: number, outcome: SessionOutcome): void {
    const { query } = pending;
    switch (outcome.status) {
      case "completed":
        if (pending.useContext) {
          this.context.record(query.prompt, outcome.text);
        }
        this.counters.streamingResponses++;
        this.counters.completed++;
        this.counters.responseTimeTotalMs += this.now() - pending.startedAt;
        this.finish(
          stream,
          query,
          { status: "completed", queryId: query.id, text: outcome.text, cached: false, attempts: attempt },
          pending.silent
        );
        return;

      case "cancelled":
        this.finish(stream, query, { status: "cancelled", queryId: query.id, reason: outcome.reason }, pending.silent);
        return;

      case "failed":
        if (this.shouldRetry(query, outcome.error, attempt) && !stream.cancelRequested) {
          this.logger.warn(`[Orchestrator] Retrying ${query.id} after ${outcome.error.message}`);
          this.submit(stream, pending, attempt + 1, outcome.error);
          return;
        }
        this.finish(
          stream,
          query,
          { status: "failed", queryId: query.id, error: outcome.error, attempts: attempt },
          pending.silent
        );
        return;
    }
  }

  private shouldRetry(query: Query, error: OrchestratorError, attempt: number): boolean {
    return (
      this.autoRetry &&
      attempt === 1 &&
      error.code === "BACKEND_TIMEOUT" &&
      !this.nonIdempotentKinds.includes(query.kind)
    );
  }

  private finish(stream: AnswerStream, query: Query, result: AskResult, silent: boolean): void {
    switch (result.status) {
      case "failed":
        this.counters.failures++;
        break;
      case "cancelled":
        this.counters.cancellations++;
        break;
      case "rejected":
        this.counters.rejections++;
        break;
      case "completed":
        break;
    }

    if (!silent) {
      this.notifyOutcome(query, result);
    }
    stream.finish(result);
  }

  private notifyOutcome(query: Query, result: AskResult): void {
    const dedupeKey = `query:${query.id}`;
    switch (result.status) {
      case "completed":
        this.notifications.push({
          text: result.cached ? `Cached: ${preview(result.text)}` : preview(result.text),
          priority: "info",
          dedupeKey,
        });
        return;
      case "cancelled":
        this.notifications.push({ text: "Request cancelled", priority: "info", dedupeKey });
        return;
      case "failed":
        this.notifications.push({ text: `Request failed: ${result.error.message}`, priority: "warning", dedupeKey });
        return;
      case "rejected":
        this.notifications.push({ text: describeRejection(result.error), priority: "warning", dedupeKey });
        return;
    }
  }

  private onPressureAlert(alert: PressureAlert): void {
    this.logger.info(`[Orchestrator] Pressure ${alert.from} -> ${alert.to}`);
    this.notifications.push({
      text: describeAlert(alert),
      priority: ALERT_PRIORITY[alert.to],
      dedupeKey: "pressure",
    });
  }
}
