export { createOrchestrator, type OrchestratorCollaborators } from "./src/index.js";
export { loadConfig, validateConfig, printConfig, type OrchestratorConfig } from "./src/config.js";
export {
  Orchestrator,
  createQuery,
  type AskOptions,
  type SceneOptions,
  type OrchestratorMetrics,
  type OrchestratorStatus,
} from "./src/services/orchestrator.js";
export { AnswerStream, type AskResult, type StreamEvent, type Admission, type StreamCallbacks } from "./src/services/answer-stream.js";
export { ResourceMonitor, type HealthReport, type MonitorOptions } from "./src/services/resource-monitor.js";
export { ResponseCache, computeCacheKey, normalizePrompt } from "./src/services/response-cache.js";
export {
  RequestScheduler,
  type AdmissionResult,
  type SchedulerOptions,
  type SchedulerSnapshot,
  type SessionHandle,
} from "./src/services/request-scheduler.js";
export { StreamingSession, type SessionOutcome, type SessionState } from "./src/services/streaming-session.js";
export { NotificationQueue, NotificationPump } from "./src/services/notification-queue.js";
export { ConversationContext } from "./src/services/conversation-context.js";
export { OllamaBackend, type OllamaConfig } from "./src/services/ollama-backend.js";
export { SystemResourceProbe, SimulatedResourceProbe, detectProbe } from "./src/services/resource-probe.js";
export { SceneAnswerSchema, parseSceneAnswer, scenePrompt, type SceneAnalysis, type SceneAnswer, type SceneMode } from "./src/services/scene.js";
export { ConsoleDisplaySink } from "./src/sinks/console-display.js";
export { CancellationToken } from "./src/shared/cancellation.js";
export * from "./src/shared/errors.js";
export { PRESSURE_LEVELS, DEFAULT_THRESHOLDS, DEFAULT_MAX_CONCURRENT } from "./src/shared/pressure-config.js";
export type * from "./src/types.js";
