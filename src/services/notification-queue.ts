import { errorMessage } from "../shared/errors.js";
import type {
  DisplaySink,
  Logger,
  NotificationInput,
  NotificationItem,
  NotificationPriority,
} from "../types.js";

export const PRIORITY_RANK: Record<NotificationPriority, number> = {
  info: 0,
  warning: 1,
  critical: 2,
};

export const DEFAULT_TTL_MS: Record<NotificationPriority, number> = {
  info: 10_000,
  warning: 30_000,
  critical: 120_000,
};

export interface NotificationQueueOptions {
  maxItems?: number;
  ttlMs?: Record<NotificationPriority, number>;
  now?: () => number;
}

interface QueuedNotification {
  item: NotificationItem;
  seq: number;
}

/**
 * Priority queue feeding the display.
 *
 * critical > warning > info, FIFO within a priority. A push whose dedupeKey
 * is already queued updates that item in place (text, expiry, and the higher
 * of the two priorities) and keeps its arrival position. Expired items are
 * dropped when drained, never delivered.
 */
export class NotificationQueue {
  private items: QueuedNotification[] = [];
  private seq = 0;
  private listeners = new Set<() => void>();
  private readonly maxItems: number;
  private readonly ttlMs: Record<NotificationPriority, number>;
  private readonly now: () => number;

  constructor(options: NotificationQueueOptions = {}, private readonly logger: Logger = console) {
    this.maxItems = Math.max(1, options.maxItems ?? 50);
    this.ttlMs = options.ttlMs ?? DEFAULT_TTL_MS;
    this.now = options.now ?? Date.now;
  }

  push(input: NotificationInput): NotificationItem | null {
    const expiresAt = input.expiresAt ?? this.now() + (input.ttlMs ?? this.ttlMs[input.priority]);
    const dedupeKey = input.dedupeKey ?? `${input.priority}:${input.text}`;

    const existing = this.items.find((q) => q.item.dedupeKey === dedupeKey);
    if (existing) {
      const priority =
        PRIORITY_RANK[input.priority] > PRIORITY_RANK[existing.item.priority]
          ? input.priority
          : existing.item.priority;
      existing.item = { text: input.text, priority, expiresAt, dedupeKey };
      this.notify();
      return { ...existing.item };
    }

    const item: NotificationItem = { text: input.text, priority: input.priority, expiresAt, dedupeKey };

    if (this.items.length >= this.maxItems && !this.makeRoomFor(item)) {
      this.logger.debug(`[Notify] Queue full, dropped "${item.text}"`);
      return null;
    }

    this.items.push({ item, seq: this.seq++ });
    this.notify();
    return { ...item };
  }

  /**
   * Drop the oldest lowest-priority item if the newcomer ranks at least as high
   */
  private makeRoomFor(item: NotificationItem): boolean {
    this.dropExpired();
    if (this.items.length < this.maxItems) {
      return true;
    }

    let victim = 0;
    for (let i = 1; i < this.items.length; i++) {
      if (PRIORITY_RANK[this.items[i].item.priority] < PRIORITY_RANK[this.items[victim].item.priority]) {
        victim = i;
      }
    }

    if (PRIORITY_RANK[this.items[victim].item.priority] > PRIORITY_RANK[item.priority]) {
      return false;
    }
    this.items.splice(victim, 1);
    return true;
  }

  private dropExpired(): void {
    const now = this.now();
    this.items = this.items.filter((q) => now <= q.item.expiresAt);
  }

  /**
   * Next item to render, or null when nothing deliverable is queued
   */
  drainNext(): NotificationItem | null {
    this.dropExpired();
    if (this.items.length === 0) {
      return null;
    }

    let best = 0;
    for (let i = 1; i < this.items.length; i++) {
      const candidate = this.items[i];
      const current = this.items[best];
      const rankDiff = PRIORITY_RANK[candidate.item.priority] - PRIORITY_RANK[current.item.priority];
      if (rankDiff > 0 || (rankDiff === 0 && candidate.seq < current.seq)) {
        best = i;
      }
    }

    const [next] = this.items.splice(best, 1);
    return next.item;
  }

  get size(): number {
    return this.items.length;
  }

  clear(): void {
    this.items = [];
  }

  /** Listener runs after every push */
  subscribe(listener: () => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private notify(): void {
    for (const listener of [...this.listeners]) {
      try {
        listener();
      } catch (error) {
        this.logger.error(`[Notify] Listener failed: ${errorMessage(error)}`);
      }
    }
  }
}

/**
 * Single consumer that drains the queue into the display sink.
 * Rendering is fire-and-forget: a slow or failing sink never blocks producers.
 */
export class NotificationPump {
  private unsubscribe: (() => void) | null = null;
  private scheduled: NodeJS.Immediate | null = null;
  private rendered = 0;

  constructor(
    private readonly queue: NotificationQueue,
    private readonly sink: DisplaySink,
    private readonly logger: Logger = console
  ) {}

  start(): void {
    if (this.unsubscribe) {
      return;
    }
    this.unsubscribe = this.queue.subscribe(() => this.schedule());
    this.schedule();
  }

  stop(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
    if (this.scheduled) {
      clearImmediate(this.scheduled);
      this.scheduled = null;
    }
  }

  get renderedCount(): number {
    return this.rendered;
  }

  private schedule(): void {
    if (this.scheduled) {
      return;
    }
    this.scheduled = setImmediate(() => {
      this.scheduled = null;
      this.flush();
    });
  }

  /** Render everything deliverable right now, highest priority first */
  flush(): number {
    let count = 0;
    for (let item = this.queue.drainNext(); item; item = this.queue.drainNext()) {
      this.render(item);
      count++;
    }
    return count;
  }

  private render(item: NotificationItem): void {
    this.rendered++;
    try {
      const result = this.sink.render(item);
      if (result instanceof Promise) {
        result.catch((error: unknown) => {
          this.logger.error(`[Notify] Display render failed: ${errorMessage(error)}`);
        });
      }
    } catch (error) {
      this.logger.error(`[Notify] Display render failed: ${errorMessage(error)}`);
    }
  }
}
