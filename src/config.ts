/**
 * Configuration loader for the orchestrator
 * Reads from environment variables or .env file
 */

import { config } from "dotenv";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import {
  DEFAULT_MAX_CONCURRENT,
  DEFAULT_THRESHOLDS,
  PRESSURE_LEVELS,
  isPressureLevel,
  type LevelThreshold,
  type PressureLevel,
  type PressureThresholds,
} from "./shared/pressure-config.js";
import type { Logger, NotificationPriority, QueryKind } from "./types.js";

// Load .env file from package root
config({ path: join(dirname(fileURLToPath(import.meta.url)), "../.env") });

type Env = Record<string, string | undefined>;

const QUERY_KINDS: readonly QueryKind[] = ["text", "vision", "voice", "emergency", "action"];

export const DEFAULT_PRELOAD_QUERIES = [
  "What time is it?",
  "What's the weather?",
  "Help me navigate",
  "Read this text",
  "Translate this",
];

export interface OrchestratorConfig {
  ollama: {
    baseUrl: string;
    model: string;
    visionModel: string;
    temperature: number;
    maxTokens: number;
    numCtx: number;
    maxRetries: number;
  };
  cache: {
    enabled: boolean;
    capacity: number;
  };
  scheduler: {
    maxConcurrentByPressure: Record<PressureLevel, number>;
    queueDepth: number;
    essentialQueueDepth: number;
    essentialKinds: QueryKind[];
    shedOnPressure: boolean;
  };
  session: {
    timeoutSeconds: number;
    autoRetry: boolean;
    nonIdempotentKinds: QueryKind[];
  };
  monitor: {
    pollIntervalSeconds: number;
    failSafeAfter: number;
    cpuSustainSamples: number;
    historySize: number;
    thresholds: PressureThresholds;
    batteryPath: string;
    thermalPath: string;
    simulate: boolean;
  };
  notifications: {
    maxItems: number;
    ttlSeconds: Record<NotificationPriority, number>;
  };
  context: {
    maxMessages: number;
    maxTokens: number;
    tokenEstimateDivisor: number;
  };
  preload: {
    enabled: boolean;
    queries: string[];
  };
}

function readInt(env: Env, name: string, fallback: number, min: number = 0): number {
  const value = Number.parseInt(env[name] ?? "", 10);
  return Number.isNaN(value) || value < min ? fallback : value;
}

function readFloat(env: Env, name: string, fallback: number, min: number = 0): number {
  const value = Number.parseFloat(env[name] ?? "");
  return Number.isNaN(value) || value < min ? fallback : value;
}

function readPositiveFloat(env: Env, name: string, fallback: number): number {
  const value = Number.parseFloat(env[name] ?? "");
  return Number.isNaN(value) || value <= 0 ? fallback : value;
}

function readOptionalFloat(env: Env, name: string, fallback: number | undefined): number | undefined {
  const value = Number.parseFloat(env[name] ?? "");
  return Number.isNaN(value) ? fallback : value;
}

function readBool(env: Env, name: string, fallback: boolean): boolean {
  const value = env[name]?.trim().toLowerCase();
  if (value === "true" || value === "1" || value === "yes") return true;
  if (value === "false" || value === "0" || value === "no") return false;
  return fallback;
}

function readList(env: Env, name: string, fallback: string[]): string[] {
  const raw = env[name];
  if (raw === undefined) {
    return fallback;
  }
  return raw.split(",").map((s) => s.trim()).filter(Boolean);
}

function readKinds(env: Env, name: string, fallback: QueryKind[]): QueryKind[] {
  const kinds: QueryKind[] = [];
  for (const entry of readList(env, name, fallback)) {
    const kind = QUERY_KINDS.find((k) => k === entry);
    if (kind) {
      kinds.push(kind);
    }
  }
  return kinds;
}

/**
 * Parse "normal:3,elevated:2,low:1,critical:0".
 * Unknown levels and bad numbers keep the default for that level.
 */
export function parseMaxConcurrent(raw: string | undefined): Record<PressureLevel, number> {
  const result = { ...DEFAULT_MAX_CONCURRENT };
  if (!raw) {
    return result;
  }
  for (const pair of raw.split(",")) {
    const [name, count] = pair.split(":").map((s) => s.trim().toLowerCase());
    const value = Number.parseInt(count ?? "", 10);
    if (name && isPressureLevel(name) && !Number.isNaN(value) && value >= 0) {
      result[name] = value;
    }
  }
  return result;
}

function readThresholds(env: Env): PressureThresholds {
  const thresholds: PressureThresholds = { ...DEFAULT_THRESHOLDS };
  for (const level of PRESSURE_LEVELS) {
    if (level === "normal") continue;
    const prefix = `MONITOR_${level.toUpperCase()}`;
    const defaults = DEFAULT_THRESHOLDS[level];
    const threshold: LevelThreshold = {
      batteryPct: readOptionalFloat(env, `${prefix}_BATTERY`, defaults.batteryPct),
      cpuPct: readOptionalFloat(env, `${prefix}_CPU`, defaults.cpuPct),
      tempC: readOptionalFloat(env, `${prefix}_TEMP`, defaults.tempC),
    };
    thresholds[level] = threshold;
  }
  return thresholds;
}

/**
 * Build configuration from environment variables with sensible defaults
 */
export function loadConfig(env: Env = process.env): OrchestratorConfig {
  const host = env.OLLAMA_HOST || "http://localhost";
  const port = readInt(env, "OLLAMA_PORT", 11434, 1);
  const cpuSustainSamples = readInt(env, "MONITOR_CPU_SUSTAIN_SAMPLES", 3, 1);

  return {
    ollama: {
      baseUrl: `${host}:${port}`,
      model: env.OLLAMA_MODEL || "llama3.2:1b",
      visionModel: env.OLLAMA_VISION_MODEL || "moondream",
      temperature: readFloat(env, "OLLAMA_TEMPERATURE", 0.7),
      maxTokens: readInt(env, "OLLAMA_MAX_TOKENS", 512, 1),
      numCtx: readInt(env, "OLLAMA_NUM_CTX", 2048, 1),
      maxRetries: readInt(env, "OLLAMA_MAX_RETRIES", 3, 1),
    },

    cache: {
      enabled: readBool(env, "CACHE_ENABLED", true),
      capacity: readInt(env, "CACHE_CAPACITY", 100),
    },

    scheduler: {
      maxConcurrentByPressure: parseMaxConcurrent(env.SCHEDULER_MAX_CONCURRENT),
      queueDepth: readInt(env, "SCHEDULER_QUEUE_DEPTH", 5),
      essentialQueueDepth: readInt(env, "SCHEDULER_ESSENTIAL_QUEUE_DEPTH", 1),
      essentialKinds: readKinds(env, "SCHEDULER_ESSENTIAL_KINDS", ["emergency"]),
      shedOnPressure: readBool(env, "SCHEDULER_SHED_ON_PRESSURE", true),
    },

    session: {
      timeoutSeconds: readPositiveFloat(env, "SESSION_TIMEOUT_SECONDS", 30),
      autoRetry: readBool(env, "SESSION_AUTO_RETRY", true),
      nonIdempotentKinds: readKinds(env, "SESSION_NON_IDEMPOTENT_KINDS", ["action"]),
    },

    monitor: {
      pollIntervalSeconds: readPositiveFloat(env, "MONITOR_POLL_INTERVAL_SECONDS", 5),
      failSafeAfter: readInt(env, "MONITOR_FAIL_SAFE_AFTER", 3, 1),
      cpuSustainSamples,
      // Sustained CPU needs that many readings in history
      historySize: Math.max(readInt(env, "MONITOR_HISTORY_SIZE", 1000, 1), cpuSustainSamples),
      thresholds: readThresholds(env),
      batteryPath: env.MONITOR_BATTERY_PATH || "/sys/class/power_supply/battery",
      thermalPath: env.MONITOR_THERMAL_PATH || "/sys/class/thermal/thermal_zone0/temp",
      simulate: readBool(env, "MONITOR_SIMULATE", false),
    },

    notifications: {
      maxItems: readInt(env, "NOTIFY_MAX_ITEMS", 50, 1),
      ttlSeconds: {
        info: readFloat(env, "NOTIFY_INFO_TTL_SECONDS", 10),
        warning: readFloat(env, "NOTIFY_WARNING_TTL_SECONDS", 30),
        critical: readFloat(env, "NOTIFY_CRITICAL_TTL_SECONDS", 120),
      },
    },

    context: {
      maxMessages: readInt(env, "CONTEXT_MAX_MESSAGES", 20, 2),
      maxTokens: readInt(env, "CONTEXT_MAX_TOKENS", 1500, 1),
      tokenEstimateDivisor: readInt(env, "CONTEXT_TOKEN_DIVISOR", 4, 1),
    },

    preload: {
      enabled: readBool(env, "PRELOAD_ENABLED", false),
      queries: readList(env, "PRELOAD_QUERIES", DEFAULT_PRELOAD_QUERIES),
    },
  };
}

/**
 * Validate configuration
 * Checks if the inference service is reachable
 */
export async function validateConfig(cfg: OrchestratorConfig): Promise<{ ollama: boolean }> {
  try {
    const response = await fetch(`${cfg.ollama.baseUrl}/api/tags`, {
      signal: AbortSignal.timeout(5000),
    });
    return { ollama: response.ok };
  } catch {
    return { ollama: false };
  }
}

/**
 * Print configuration (for debugging)
 */
export function printConfig(cfg: OrchestratorConfig, logger: Logger = console): void {
  const limits = PRESSURE_LEVELS.map((l) => `${l}:${cfg.scheduler.maxConcurrentByPressure[l]}`).join(", ");
  logger.info("[Orchestrator] Configuration:");
  logger.info(`  Ollama: ${cfg.ollama.baseUrl} (model: ${cfg.ollama.model}, vision: ${cfg.ollama.visionModel})`);
  logger.info(`  Cache: ${cfg.cache.enabled ? `${cfg.cache.capacity} entries` : "disabled"}`);
  logger.info(`  Scheduler: ${limits}, queue ${cfg.scheduler.queueDepth}`);
  logger.info(`  Session: timeout ${cfg.session.timeoutSeconds}s, auto-retry ${cfg.session.autoRetry ? "on" : "off"}`);
  logger.info(`  Monitor: every ${cfg.monitor.pollIntervalSeconds}s${cfg.monitor.simulate ? " (simulated)" : ""}`);
  logger.info(`  Preload: ${cfg.preload.enabled ? `${cfg.preload.queries.length} queries` : "disabled"}`);
}
