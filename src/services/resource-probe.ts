/**
 * Battery/resource probes
 * - SystemResourceProbe: Linux power_supply + thermal zone + os.cpus()
 * - SimulatedResourceProbe: deterministic slow discharge for desks without a battery
 */

import { readFile } from "node:fs/promises";
import { cpus } from "node:os";
import { join } from "node:path";
import { ProbeFailureError, errorMessage } from "../shared/errors.js";
import type { Logger, ProbeReading, ResourceProbe } from "../types.js";

const NOMINAL_VOLTAGE = 3.7;

interface CpuTimes {
  idle: number;
  total: number;
}

function readCpuTimes(): CpuTimes {
  let idle = 0;
  let total = 0;
  for (const cpu of cpus()) {
    const { user, nice, sys, idle: cpuIdle, irq } = cpu.times;
    idle += cpuIdle;
    total += user + nice + sys + cpuIdle + irq;
  }
  return { idle, total };
}

async function readNumber(path: string): Promise<number | null> {
  try {
    const value = Number.parseInt((await readFile(path, "utf8")).trim(), 10);
    return Number.isNaN(value) ? null : value;
  } catch {
    return null;
  }
}

export interface SystemProbeOptions {
  batteryPath: string;
  thermalPath: string;
}

export class SystemResourceProbe implements ResourceProbe {
  readonly name = "system";
  private previous: CpuTimes = readCpuTimes();

  constructor(private readonly options: SystemProbeOptions) {}

  /**
   * CPU busy share since the previous read
   */
  private cpuPercent(): number {
    const current = readCpuTimes();
    const idle = current.idle - this.previous.idle;
    const total = current.total - this.previous.total;
    this.previous = current;
    if (total <= 0) {
      return 0;
    }
    return Math.max(0, Math.min(100, (1 - idle / total) * 100));
  }

  async read(): Promise<ProbeReading> {
    const capacityPath = join(this.options.batteryPath, "capacity");
    let capacity: string;
    try {
      capacity = await readFile(capacityPath, "utf8");
    } catch (error) {
      throw new ProbeFailureError(`Cannot read ${capacityPath}: ${errorMessage(error)}`, { cause: error });
    }

    const batteryPct = Number.parseInt(capacity.trim(), 10);
    if (Number.isNaN(batteryPct)) {
      throw new ProbeFailureError(`Unreadable battery capacity "${capacity.trim()}"`);
    }

    // voltage_now is in µV, thermal zone in m°C
    const microVolts = await readNumber(join(this.options.batteryPath, "voltage_now"));
    const milliCelsius = await readNumber(this.options.thermalPath);

    return {
      batteryPct,
      voltage: microVolts !== null ? microVolts / 1_000_000 : NOMINAL_VOLTAGE,
      cpuPct: this.cpuPercent(),
      tempC: milliCelsius !== null ? milliCelsius / 1000 : null,
    };
  }
}

export interface SimulatedProbeOptions {
  startPct?: number;
  drainPerRead?: number;
  cpuPct?: number;
  tempC?: number;
}

export class SimulatedResourceProbe implements ResourceProbe {
  readonly name = "simulated";
  private batteryPct: number;
  private readonly drainPerRead: number;
  private readonly cpuPct: number;
  private readonly tempC: number;
  private reads = 0;

  constructor(options: SimulatedProbeOptions = {}) {
    this.batteryPct = options.startPct ?? 85;
    this.drainPerRead = options.drainPerRead ?? 1;
    this.cpuPct = options.cpuPct ?? 20;
    this.tempC = options.tempC ?? 35;
  }

  read(): ProbeReading {
    if (this.reads > 0) {
      this.batteryPct = Math.max(0, this.batteryPct - this.drainPerRead);
    }
    this.reads++;
    return {
      batteryPct: this.batteryPct,
      voltage: NOMINAL_VOLTAGE,
      cpuPct: this.cpuPct,
      tempC: this.tempC,
    };
  }
}

/**
 * Pick the system probe when the battery interface is readable,
 * otherwise fall back to simulation
 */
export async function detectProbe(
  options: SystemProbeOptions & { simulate?: boolean },
  logger: Logger = console
): Promise<ResourceProbe> {
  if (!options.simulate) {
    const capacity = await readNumber(join(options.batteryPath, "capacity"));
    if (capacity !== null) {
      logger.info(`[Probe] Using system battery at ${options.batteryPath}`);
      return new SystemResourceProbe(options);
    }
    logger.warn(`[Probe] No battery at ${options.batteryPath}, using simulated readings`);
  }
  return new SimulatedResourceProbe();
}
