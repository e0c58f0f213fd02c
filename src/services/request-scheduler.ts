import { CancellationToken } from "../shared/cancellation.js";
import {
  OverloadedError,
  ResourceExhaustedError,
  errorMessage,
  toOrchestratorError,
} from "../shared/errors.js";
import { DEFAULT_MAX_CONCURRENT, pressureRank, type PressureLevel } from "../shared/pressure-config.js";
import type { Logger, PressureAlert, PressureSource, Query, QueryKind } from "../types.js";
import type { SessionOutcome, SessionRequest, SessionState, StreamingSession } from "./streaming-session.js";

export interface SchedulerOptions {
  maxConcurrentByPressure?: Record<PressureLevel, number>;
  queueDepth?: number;
  /** Queue depth for essential kinds while pressure is critical */
  essentialQueueDepth?: number;
  essentialKinds?: QueryKind[];
  /** Cancel the newest sessions when pressure lowers the limit below the in-flight count */
  shedOnPressure?: boolean;
}

export type SessionFactory = (request: SessionRequest, token: CancellationToken) => StreamingSession;

export type HandleState = "queued" | SessionState;

export interface SessionHandle {
  readonly query: Query;
  /** Settles once with the terminal outcome; never rejects */
  readonly outcome: Promise<SessionOutcome>;
  state(): HandleState;
  cancel(reason?: string): void;
}

export type AdmissionResult =
  | { admitted: true; queued: false; handle: SessionHandle }
  | { admitted: true; queued: true; position: number; handle: SessionHandle }
  | { admitted: false; error: OverloadedError | ResourceExhaustedError };

export interface SchedulerSnapshot {
  pressure: PressureLevel;
  maxConcurrent: number;
  inFlight: number;
  queued: number;
  admitted: number;
  rejected: number;
  shed: number;
}

/**
 * A submitted request: waits in the queue, then owns its session until terminal
 */
class Ticket implements SessionHandle {
  readonly query: Query;
  readonly outcome: Promise<SessionOutcome>;
  readonly token = new CancellationToken();
  session: StreamingSession | null = null;
  private readonly resolveOutcome: (outcome: SessionOutcome) => void;
  private settled = false;

  constructor(readonly request: SessionRequest) {
    this.query = request.query;
    let resolveOutcome: (outcome: SessionOutcome) => void = () => undefined;
    this.outcome = new Promise((resolve) => {
      resolveOutcome = resolve;
    });
    this.resolveOutcome = resolveOutcome;
  }

  state(): HandleState {
    if (this.session) {
      return this.session.state;
    }
    return this.token.cancelled ? "cancelled" : "queued";
  }

  cancel(reason: string = "requested"): void {
    this.token.cancel(reason);
  }

  settle(outcome: SessionOutcome): void {
    if (this.settled) {
      return;
    }
    this.settled = true;
    this.resolveOutcome(outcome);
  }
}

/**
 * Admission control for inference sessions.
 *
 * In-flight sessions are bounded by maxConcurrent(pressure). Work over the
 * limit waits in a strict FIFO queue; a full queue rejects with Overloaded.
 * At critical pressure only essential kinds may queue (with their own small
 * depth); everything else is refused with ResourceExhausted.
 *
 * All bookkeeping happens in synchronous methods, so each mutation is
 * atomic with respect to the event loop.
 */
export class RequestScheduler {
  private readonly options: Required<SchedulerOptions>;
  private readonly queue: Ticket[] = [];
  private readonly active = new Map<string, Ticket>();
  private readonly unsubscribe: () => void;
  private admittedCount = 0;
  private rejectedCount = 0;
  private shedCount = 0;

  constructor(
    private readonly pressure: PressureSource,
    private readonly createSession: SessionFactory,
    options: SchedulerOptions = {},
    private readonly logger: Logger = console
  ) {
    this.options = {
      maxConcurrentByPressure: options.maxConcurrentByPressure ?? DEFAULT_MAX_CONCURRENT,
      queueDepth: options.queueDepth ?? 5,
      essentialQueueDepth: options.essentialQueueDepth ?? 1,
      essentialKinds: options.essentialKinds ?? ["emergency"],
      shedOnPressure: options.shedOnPressure ?? true,
    };
    this.unsubscribe = this.pressure.onAlert((alert) => this.onPressureChange(alert));
  }

  maxConcurrent(level: PressureLevel = this.pressure.currentPressure()): number {
    return Math.max(0, this.options.maxConcurrentByPressure[level]);
  }

  isEssential(kind: QueryKind): boolean {
    return this.options.essentialKinds.includes(kind);
  }

  get inFlight(): number {
    return this.active.size;
  }

  get queued(): number {
    return this.queue.length;
  }

  /**
   * Admit, queue or reject a request. Synchronous: the caller learns
   * the admission decision before any inference starts.
   */
  submit(request: SessionRequest): AdmissionResult {
    const level = this.pressure.currentPressure();
    const { kind } = request.query;

    if (level === "critical") {
      if (!this.isEssential(kind)) {
        return this.reject(request.query, new ResourceExhaustedError(level));
      }
      const essentialWaiting = this.queue.filter((t) => this.isEssential(t.query.kind)).length;
      if (essentialWaiting >= this.options.essentialQueueDepth || this.queue.length >= this.options.queueDepth) {
        return this.reject(request.query, new OverloadedError(this.queue.length));
      }
    }

    const ticket = new Ticket(request);
    this.admittedCount++;

    if (this.queue.length === 0 && this.active.size < this.maxConcurrent(level)) {
      this.launch(ticket);
      return { admitted: true, queued: false, handle: ticket };
    }

    if (this.queue.length >= this.options.queueDepth) {
      this.admittedCount--;
      return this.reject(request.query, new OverloadedError(this.queue.length));
    }

    this.enqueue(ticket);
    return { admitted: true, queued: true, position: this.queue.length, handle: ticket };
  }

  private reject(query: Query, error: OverloadedError | ResourceExhaustedError): AdmissionResult {
    this.rejectedCount++;
    this.logger.warn(`[Scheduler] Rejected ${query.id} (${query.kind}): ${error.message}`);
    return { admitted: false, error };
  }

  private enqueue(ticket: Ticket): void {
    this.queue.push(ticket);
    this.logger.debug(`[Scheduler] Queued ${ticket.query.id} at position ${this.queue.length}`);

    ticket.token.onCancel((reason) => {
      if (ticket.session) {
        return;
      }
      const index = this.queue.indexOf(ticket);
      if (index >= 0) {
        this.queue.splice(index, 1);
      }
      ticket.settle({ status: "cancelled", reason });
    });
  }

  private launch(ticket: Ticket): void {
    let session: StreamingSession;
    try {
      session = this.createSession(ticket.request, ticket.token);
    } catch (error) {
      this.logger.error(`[Scheduler] Could not create session for ${ticket.query.id}: ${errorMessage(error)}`);
      ticket.settle({ status: "failed", error: toOrchestratorError(error), partialChunks: 0 });
      return;
    }

    ticket.session = session;
    this.active.set(ticket.query.id, ticket);
    this.logger.debug(
      `[Scheduler] Started ${ticket.query.id} (${this.active.size}/${this.maxConcurrent()} in flight)`
    );

    session
      .run()
      .catch((error: unknown): SessionOutcome => ({
        status: "failed",
        error: toOrchestratorError(error),
        partialChunks: session.chunksEmitted,
      }))
      .then((outcome) => {
        this.active.delete(ticket.query.id);
        ticket.settle(outcome);
        this.pump();
      })
      .catch((error: unknown) => {
        this.logger.error(`[Scheduler] Completion handling failed: ${errorMessage(error)}`);
      });
  }

  /**
   * Promote queued tickets, oldest first, while the limit allows.
   * The head is never skipped.
   */
  pump(): void {
    while (this.queue.length > 0 && this.active.size < this.maxConcurrent()) {
      const [next] = this.queue.splice(0, 1);
      if (next.token.cancelled) {
        continue;
      }
      this.launch(next);
    }
  }

  private onPressureChange(alert: PressureAlert): void {
    const limit = this.maxConcurrent(alert.to);

    if (pressureRank(alert.to) < pressureRank(alert.from)) {
      this.pump();
      return;
    }

    // Sessions already shed stay in flight until their next chunk boundary
    const live = [...this.active.values()].filter((ticket) => !ticket.token.cancelled);
    if (!this.options.shedOnPressure || live.length <= limit) {
      return;
    }

    // Newest first: Map iteration follows admission order
    const newest = live.reverse();
    const excess = live.length - limit;
    for (const ticket of newest.slice(0, excess)) {
      this.shedCount++;
      this.logger.warn(`[Scheduler] Shedding ${ticket.query.id} at ${alert.to} pressure`);
      ticket.cancel(`shed at ${alert.to} pressure`);
    }
  }

  snapshot(): SchedulerSnapshot {
    const pressure = this.pressure.currentPressure();
    return {
      pressure,
      maxConcurrent: this.maxConcurrent(pressure),
      inFlight: this.active.size,
      queued: this.queue.length,
      admitted: this.admittedCount,
      rejected: this.rejectedCount,
      shed: this.shedCount,
    };
  }

  /** Stop following pressure changes and cancel everything outstanding */
  dispose(reason: string = "shutdown"): void {
    this.unsubscribe();
    for (const ticket of [...this.queue]) {
      ticket.cancel(reason);
    }
    for (const ticket of this.active.values()) {
      ticket.cancel(reason);
    }
  }
}
