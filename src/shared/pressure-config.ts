/**
 * Shared Pressure Configuration
 * Single source of truth for pressure levels, thresholds and admission limits
 */

import type { NotificationPriority, ProbeReading } from "../types.js";

/** Pressure levels, least to most constrained */
export const PRESSURE_LEVELS = ["normal", "elevated", "low", "critical"] as const;

export type PressureLevel = (typeof PRESSURE_LEVELS)[number];

/** Thresholds that push pressure to (at least) a level. Unset metrics never trigger it. */
export interface LevelThreshold {
  /** Battery strictly below this percentage */
  batteryPct?: number;
  /** Sustained CPU strictly above this percentage */
  cpuPct?: number;
  /** Temperature strictly above this many degrees Celsius */
  tempC?: number;
}

export type PressureThresholds = Record<Exclude<PressureLevel, "normal">, LevelThreshold>;

export const DEFAULT_THRESHOLDS: PressureThresholds = {
  elevated: { batteryPct: 30, cpuPct: 85, tempC: 70 },
  low: { batteryPct: 20, tempC: 75 },
  critical: { batteryPct: 10, tempC: 80 },
};

/** In-flight inference sessions allowed per level */
export const DEFAULT_MAX_CONCURRENT: Record<PressureLevel, number> = {
  normal: 3,
  elevated: 2,
  low: 1,
  critical: 0,
};

/** Display priority used when pressure moves to a level */
export const ALERT_PRIORITY: Record<PressureLevel, NotificationPriority> = {
  normal: "info",
  elevated: "warning",
  low: "warning",
  critical: "critical",
};

export function isPressureLevel(value: string): value is PressureLevel {
  return PRESSURE_LEVELS.some((level) => level === value);
}

export function pressureRank(level: PressureLevel): number {
  return PRESSURE_LEVELS.indexOf(level);
}

export function maxPressure(a: PressureLevel, b: PressureLevel): PressureLevel {
  return pressureRank(a) >= pressureRank(b) ? a : b;
}

/**
 * CPU counts as sustained only when every one of the last `samples`
 * readings exceeds the threshold.
 */
export function isSustainedAbove(cpuHistory: number[], threshold: number, samples: number): boolean {
  if (samples <= 0 || cpuHistory.length < samples) {
    return false;
  }
  return cpuHistory.slice(-samples).every((cpu) => cpu > threshold);
}

function triggers(
  threshold: LevelThreshold,
  reading: ProbeReading,
  cpuHistory: number[],
  cpuSustainSamples: number
): boolean {
  if (threshold.batteryPct !== undefined && reading.batteryPct < threshold.batteryPct) {
    return true;
  }
  if (threshold.tempC !== undefined && reading.tempC !== null && reading.tempC > threshold.tempC) {
    return true;
  }
  if (threshold.cpuPct !== undefined && isSustainedAbove(cpuHistory, threshold.cpuPct, cpuSustainSamples)) {
    return true;
  }
  return false;
}

/**
 * Derive the pressure level for a reading.
 * The highest level any metric triggers wins.
 *
 * @param cpuHistory recent CPU percentages, oldest first, including this reading
 */
export function classifyPressure(
  reading: ProbeReading,
  cpuHistory: number[],
  thresholds: PressureThresholds = DEFAULT_THRESHOLDS,
  cpuSustainSamples: number = 3
): PressureLevel {
  for (const level of ["critical", "low", "elevated"] as const) {
    if (triggers(thresholds[level], reading, cpuHistory, cpuSustainSamples)) {
      return level;
    }
  }
  return "normal";
}
