import { errorMessage } from "../shared/errors.js";
import type { Logger, PressureLevel } from "../types.js";
import type { AnswerStream } from "./answer-stream.js";

export interface PreloadTarget {
  isCached(prompt: string): boolean;
  currentPressure(): PressureLevel;
  /** Ask quietly; the answer lands in the cache */
  warm(prompt: string): AnswerStream;
}

/**
 * Warms the cache with common queries, one at a time,
 * only while the device is under no pressure.
 */
export class Preloader {
  private stopped = false;
  private current: AnswerStream | null = null;
  private pass: Promise<number> | null = null;

  constructor(
    private readonly queries: string[],
    private readonly target: PreloadTarget,
    private readonly logger: Logger = console
  ) {}

  start(): void {
    if (this.pass || this.queries.length === 0) {
      return;
    }
    this.stopped = false;
    this.pass = this.run()
      .catch((error: unknown) => {
        this.logger.error(`[Preload] Failed: ${errorMessage(error)}`);
        return 0;
      })
      .finally(() => {
        this.pass = null;
      });
  }

  stop(): void {
    this.stopped = true;
    this.current?.cancel("preload stopped");
  }

  /**
   * One pass over the queries. Resolves with the number of answers cached.
   */
  async run(): Promise<number> {
    let warmed = 0;
    for (const prompt of this.queries) {
      if (this.stopped) {
        break;
      }
      if (this.target.currentPressure() !== "normal") {
        this.logger.debug(`[Preload] Skipping "${prompt}" under ${this.target.currentPressure()} pressure`);
        continue;
      }
      if (this.target.isCached(prompt)) {
        continue;
      }

      this.logger.debug(`[Preload] Warming "${prompt}"`);
      this.current = this.target.warm(prompt);
      const result = await this.current.result;
      this.current = null;
      if (result.status === "completed") {
        warmed++;
      }
    }
    this.logger.info(`[Preload] Cached ${warmed}/${this.queries.length} common queries`);
    return warmed;
  }
}
