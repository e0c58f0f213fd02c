// Import PressureLevel from shared config
import type { PressureLevel } from "./shared/pressure-config.js";

// Re-export for external use
export type { PressureLevel } from "./shared/pressure-config.js";

// Query Types
export type QueryKind = "text" | "vision" | "voice" | "emergency" | "action";

export interface Query {
  readonly id: string;
  readonly kind: QueryKind;
  readonly prompt: string;
  readonly imageRef?: string;
  readonly submittedAt: number;
}

export interface ChatMessage {
  role: "user" | "assistant" | "system";
  content: string;
}

// Cache Types
export interface CacheEntry {
  readonly key: string;
  readonly answer: string;
  readonly createdAt: number;
  lastAccessAt: number;
  hitCount: number;
}

export interface CacheStats {
  hits: number;
  misses: number;
  hitRate: number;
  size: number;
  capacity: number;
  evictions: number;
}

// Monitor Types
export interface ProbeReading {
  batteryPct: number;
  voltage: number;
  cpuPct: number;
  tempC: number | null;
}

export interface Reading extends ProbeReading {
  timestamp: number;
}

export interface MonitorSnapshot {
  reading: Reading | null;
  pressure: PressureLevel;
  stale: boolean;
  consecutiveFailures: number;
}

export interface PressureAlert {
  from: PressureLevel;
  to: PressureLevel;
  reason: "threshold" | "probe_failure";
  reading: Reading | null;
  at: number;
}

export type AlertListener = (alert: PressureAlert) => void;

/** Anything that reports the current pressure and announces changes to it */
export interface PressureSource {
  currentPressure(): PressureLevel;
  onAlert(listener: AlertListener): () => void;
}

// Notification Types
export type NotificationPriority = "info" | "warning" | "critical";

export interface NotificationItem {
  text: string;
  priority: NotificationPriority;
  expiresAt: number;
  dedupeKey: string;
}

export interface NotificationInput {
  text: string;
  priority: NotificationPriority;
  dedupeKey?: string;
  /** Absolute expiry; wins over ttlMs */
  expiresAt?: number;
  ttlMs?: number;
}

// Collaborators
export interface InferenceRequest {
  kind: QueryKind;
  prompt: string;
  messages: ChatMessage[];
  /** Base64-encoded image for vision queries */
  image?: string;
  /** JSON schema for structured output */
  format?: object;
  signal: AbortSignal;
}

export interface InferenceBackend {
  /** Model identifier that answers queries of this kind (part of the cache key) */
  modelFor(kind: QueryKind): string;
  startStream(request: InferenceRequest): AsyncIterable<string>;
}

export interface ResourceProbe {
  readonly name: string;
  read(): Promise<ProbeReading> | ProbeReading;
}

export interface DisplaySink {
  render(item: NotificationItem): void | Promise<void>;
}

export interface CaptureSource {
  /** Returns an image reference (file path, data URI or base64) */
  captureFrame?(): Promise<string>;
  /** Returns the transcribed utterance, or null when nothing was heard */
  captureUtterance?(): Promise<string | null>;
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}
