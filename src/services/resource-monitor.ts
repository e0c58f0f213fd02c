import {
  DEFAULT_THRESHOLDS,
  classifyPressure,
  type PressureLevel,
  type PressureThresholds,
} from "../shared/pressure-config.js";
import { errorMessage } from "../shared/errors.js";
import type {
  AlertListener,
  Logger,
  MonitorSnapshot,
  PressureAlert,
  PressureSource,
  Reading,
  ResourceProbe,
} from "../types.js";

export interface MonitorOptions {
  pollIntervalMs?: number;
  /** Consecutive probe failures before assuming the worst */
  failSafeAfter?: number;
  cpuSustainSamples?: number;
  historySize?: number;
  thresholds?: PressureThresholds;
  now?: () => number;
}

export type HealthReport =
  | { status: "no_data" }
  | {
      status: "healthy" | "degraded";
      currentPercentage: number;
      averageVoltage: number;
      averageCpu: number;
      /** Percent per minute; positive while discharging */
      dischargeRate: number;
      readingsCount: number;
      healthy: boolean;
      probe: string;
    };

const HEALTH_WINDOW = 100;

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

/**
 * Polls a resource probe and derives a discrete pressure level.
 *
 * Alerts are edge-triggered: listeners hear about a level change once,
 * in either direction. A failing probe keeps the last level (marked stale)
 * until `failSafeAfter` consecutive failures, which force `critical`.
 */
export class ResourceMonitor implements PressureSource {
  private readonly probe: ResourceProbe;
  private readonly logger: Logger;
  private readonly options: Required<Omit<MonitorOptions, "now">>;
  private readonly now: () => number;

  private level: PressureLevel = "normal";
  private stale = false;
  private consecutiveFailures = 0;
  private latest: Reading | null = null;
  private history: Reading[] = [];
  private listeners = new Set<AlertListener>();
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<MonitorSnapshot> | null = null;

  constructor(probe: ResourceProbe, options: MonitorOptions = {}, logger?: Logger) {
    this.probe = probe;
    this.logger = logger || console;
    this.now = options.now || Date.now;
    const cpuSustainSamples = options.cpuSustainSamples ?? 3;
    this.options = {
      pollIntervalMs: options.pollIntervalMs ?? 5000,
      failSafeAfter: options.failSafeAfter ?? 3,
      cpuSustainSamples,
      historySize: Math.max(options.historySize ?? 1000, cpuSustainSamples),
      thresholds: options.thresholds ?? DEFAULT_THRESHOLDS,
    };
  }

  /**
   * Take one reading and re-evaluate pressure.
   * Never rejects: probe errors are counted and logged.
   */
  sample(): Promise<MonitorSnapshot> {
    // Overlapping polls share one probe read
    if (!this.inFlight) {
      this.inFlight = this.readProbe().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  private async readProbe(): Promise<MonitorSnapshot> {
    try {
      const raw = await this.probe.read();
      const reading: Reading = { ...raw, timestamp: this.now() };
      this.recordReading(reading);
    } catch (error) {
      this.recordFailure(error);
    }
    return this.snapshot();
  }

  private recordReading(reading: Reading): void {
    this.latest = reading;
    this.history.push(reading);
    if (this.history.length > this.options.historySize) {
      this.history.splice(0, this.history.length - this.options.historySize);
    }

    this.consecutiveFailures = 0;
    this.stale = false;

    const cpuHistory = this.history
      .slice(-this.options.cpuSustainSamples)
      .map((r) => r.cpuPct);
    const next = classifyPressure(reading, cpuHistory, this.options.thresholds, this.options.cpuSustainSamples);
    this.moveTo(next, "threshold");
  }

  private recordFailure(error: unknown): void {
    this.consecutiveFailures++;
    this.stale = true;
    this.logger.warn(
      `[Monitor] Probe ${this.probe.name} failed (${this.consecutiveFailures}/${this.options.failSafeAfter}): ${errorMessage(error)}`
    );

    if (this.consecutiveFailures >= this.options.failSafeAfter) {
      this.moveTo("critical", "probe_failure");
    }
  }

  private moveTo(next: PressureLevel, reason: PressureAlert["reason"]): void {
    if (next === this.level) {
      return;
    }

    const alert: PressureAlert = {
      from: this.level,
      to: next,
      reason,
      reading: this.latest,
      at: this.now(),
    };
    this.level = next;
    this.logger.info(`[Monitor] Pressure ${alert.from} -> ${alert.to} (${reason})`);

    for (const listener of [...this.listeners]) {
      try {
        listener(alert);
      } catch (error) {
        this.logger.error(`[Monitor] Alert listener failed: ${errorMessage(error)}`);
      }
    }
  }

  currentPressure(): PressureLevel {
    return this.level;
  }

  isStale(): boolean {
    return this.stale;
  }

  lastReading(): Reading | null {
    return this.latest;
  }

  snapshot(): MonitorSnapshot {
    return {
      reading: this.latest,
      pressure: this.level,
      stale: this.stale,
      consecutiveFailures: this.consecutiveFailures,
    };
  }

  /**
   * Register an alert listener. Returns an unsubscribe function.
   */
  onAlert(listener: AlertListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Start polling: one immediate sample, then one per interval
   */
  start(): void {
    if (this.timer) {
      this.logger.warn("[Monitor] Already running");
      return;
    }

    const tick = () => {
      this.sample().catch((error) => {
        this.logger.error(`[Monitor] Sample failed: ${errorMessage(error)}`);
      });
    };

    this.timer = setInterval(tick, this.options.pollIntervalMs);
    this.timer.unref();
    tick();
    this.logger.info(`[Monitor] Polling ${this.probe.name} every ${this.options.pollIntervalMs}ms`);
  }

  stop(): void {
    if (!this.timer) {
      return;
    }
    clearInterval(this.timer);
    this.timer = null;
    this.logger.info("[Monitor] Polling stopped");
  }

  get running(): boolean {
    return this.timer !== null;
  }

  recentReadings(limit: number = this.options.historySize): Reading[] {
    return this.history.slice(-limit);
  }

  /**
   * Battery health summary over the most recent readings
   */
  healthReport(): HealthReport {
    if (this.history.length === 0 || !this.latest) {
      return { status: "no_data" };
    }

    const recent = this.history.slice(-HEALTH_WINDOW);
    const averageVoltage = recent.reduce((sum, r) => sum + r.voltage, 0) / recent.length;
    const averageCpu = recent.reduce((sum, r) => sum + r.cpuPct, 0) / recent.length;

    let dischargeRate = 0;
    if (recent.length > 1) {
      const first = recent[0];
      const last = recent[recent.length - 1];
      const minutes = (last.timestamp - first.timestamp) / 60000;
      dischargeRate = minutes > 0 ? (first.batteryPct - last.batteryPct) / minutes : 0;
    }

    const latest = this.latest;
    // Li-Po safe range
    const healthy =
      latest.voltage >= 3.0 &&
      latest.voltage <= 4.3 &&
      latest.batteryPct >= 0 &&
      latest.batteryPct <= 100;

    return {
      status: healthy ? "healthy" : "degraded",
      currentPercentage: latest.batteryPct,
      averageVoltage: round(averageVoltage, 2),
      averageCpu: round(averageCpu, 1),
      dischargeRate: round(dischargeRate, 2),
      readingsCount: this.history.length,
      healthy,
      probe: this.probe.name,
    };
  }
}
