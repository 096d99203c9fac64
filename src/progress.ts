// src/progress.ts
import type { Logger } from "./logger.js";

export type ScanStatus =
  | "scan-applications"
  | "generate-package-list"
  | "finished";

/** Reported when the amount of remaining work is unknown. */
export const PERCENTAGE_INVALID = 101;

export interface ProgressReporter {
  setStatus(status: ScanStatus): void;
  /** 0..100, or PERCENTAGE_INVALID. */
  setPercentage(percentage: number): void;
}

export class NullProgress implements ProgressReporter {
  setStatus(): void {}
  setPercentage(): void {}
}

export class LoggingProgress implements ProgressReporter {
  private lastPercentage = -1;

  constructor(private readonly logger: Logger) {}

  setStatus(status: ScanStatus): void {
    this.logger.debug("status", { status });
  }

  setPercentage(percentage: number): void {
    const pct =
      percentage === PERCENTAGE_INVALID
        ? percentage
        : Math.max(0, Math.min(100, Math.floor(percentage)));
    // whole-number steps only, scans report once per file
    if (pct === this.lastPercentage) return;
    this.lastPercentage = pct;
    this.logger.debug("progress", {
      percentage: pct === PERCENTAGE_INVALID ? "unknown" : pct,
    });
  }
}

/** Keeps everything it is told; handy for asserting phase order. */
export class RecordingProgress implements ProgressReporter {
  readonly statuses: ScanStatus[] = [];
  readonly percentages: number[] = [];

  setStatus(status: ScanStatus): void {
    this.statuses.push(status);
  }

  setPercentage(percentage: number): void {
    this.percentages.push(percentage);
  }
}
