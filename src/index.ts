/**
 * Resource-aware response orchestrator
 *
 * Wires the components into one Orchestrator:
 * - ResourceMonitor: polls the probe, raises pressure alerts
 * - ResponseCache: LRU answers keyed by (kind, prompt, image, model)
 * - RequestScheduler + StreamingSession: bounded, cancellable inference
 * - NotificationQueue: priority feed for the display
 */

import type { OrchestratorConfig } from "./config.js";
import { NotificationQueue } from "./services/notification-queue.js";
import { Orchestrator } from "./services/orchestrator.js";
import { ResourceMonitor } from "./services/resource-monitor.js";
import { ResponseCache } from "./services/response-cache.js";
import type {
  CaptureSource,
  DisplaySink,
  InferenceBackend,
  Logger,
  NotificationPriority,
  ResourceProbe,
} from "./types.js";

export interface OrchestratorCollaborators {
  backend: InferenceBackend;
  probe: ResourceProbe;
  display?: DisplaySink;
  capture?: CaptureSource;
  logger?: Logger;
}

function secondsToMs(seconds: number): number {
  return Math.round(seconds * 1000);
}

export function createOrchestrator(config: OrchestratorConfig, collaborators: OrchestratorCollaborators): Orchestrator {
  const logger = collaborators.logger || console;

  // ----------------------------------------------------------------
  // Initialize components
  // ----------------------------------------------------------------
  const monitor = new ResourceMonitor(
    collaborators.probe,
    {
      pollIntervalMs: secondsToMs(config.monitor.pollIntervalSeconds),
      failSafeAfter: config.monitor.failSafeAfter,
      cpuSustainSamples: config.monitor.cpuSustainSamples,
      historySize: config.monitor.historySize,
      thresholds: config.monitor.thresholds,
    },
    logger
  );

  const cache = new ResponseCache(config.cache.capacity, logger);

  const ttl = config.notifications.ttlSeconds;
  const ttlMs: Record<NotificationPriority, number> = {
    info: secondsToMs(ttl.info),
    warning: secondsToMs(ttl.warning),
    critical: secondsToMs(ttl.critical),
  };
  const notifications = new NotificationQueue({ maxItems: config.notifications.maxItems, ttlMs }, logger);

  // ----------------------------------------------------------------
  // Orchestrator
  // ----------------------------------------------------------------
  return new Orchestrator(
    {
      backend: collaborators.backend,
      monitor,
      cache,
      notifications,
      display: collaborators.display,
      capture: collaborators.capture,
      logger,
    },
    {
      cacheEnabled: config.cache.enabled,
      scheduler: config.scheduler,
      sessionTimeoutMs: secondsToMs(config.session.timeoutSeconds),
      autoRetry: config.session.autoRetry,
      nonIdempotentKinds: config.session.nonIdempotentKinds,
      context: config.context,
      preloadQueries: config.preload.enabled ? config.preload.queries : [],
    }
  );
}
