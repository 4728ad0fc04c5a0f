import type { Logger } from "pino";
import type { ProgressAggregator, ProgressState } from "./aggregator.js";

export interface ProgressReport extends ProgressState {
  total: number;
  percent: number;
  ratePerSecond: number;
  etaMs: number | null;
}

export interface ProgressReporterOptions {
  progress: ProgressAggregator;
  total: number;
  /** Polling interval in milliseconds (default: 2_000) */
  intervalMs?: number;
  logger: Logger;
  onReport?: (report: ProgressReport) => void;
}

export interface ProgressReporter {
  /** Build a report from the current snapshot without logging it. */
  report(): ProgressReport;
  /** Stop polling and emit one final report. Idempotent. */
  stop(): ProgressReport;
}

/**
 * Polls the aggregator on a fixed interval and logs a progress line.
 * This is the throttle: the aggregator itself never limits readers.
 */
export function startProgressReporter(
  options: ProgressReporterOptions,
): ProgressReporter {
  const { progress, total, logger, onReport } = options;
  const intervalMs = options.intervalMs ?? 2_000;

  let intervalId: ReturnType<typeof setInterval> | null = null;
  let finalReport: ProgressReport | null = null;

  function report(): ProgressReport {
    const snapshot = progress.snapshot();
    const processed = snapshot.completed + snapshot.errors;
    return {
      ...snapshot,
      total,
      percent: total === 0 ? 100 : Math.min(100, (processed / total) * 100),
      ratePerSecond: progress.rate(),
      etaMs: progress.eta(total),
    };
  }

  function emit(): ProgressReport {
    const current = report();
    logger.info(
      {
        completed: current.completed,
        errors: current.errors,
        total,
        percent: Math.round(current.percent * 10) / 10,
        ratePerSecond: Math.round(current.ratePerSecond * 10) / 10,
        etaMs: current.etaMs,
      },
      "Progress",
    );
    onReport?.(current);
    return current;
  }

  intervalId = setInterval(emit, intervalMs);
  // Never holds the event loop open on its own
  intervalId.unref();

  return {
    report,

    stop() {
      if (finalReport) return finalReport;
      if (intervalId !== null) {
        clearInterval(intervalId);
        intervalId = null;
      }
      finalReport = emit();
      return finalReport;
    },
  };
}
