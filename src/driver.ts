import type { MetricsEngine } from "./engine.js";
import type { Sink } from "./sink.js";

export interface PeriodicFlushOptions {
  sink: Sink;
  onError?: (error: unknown) => void; // Called when the sink throws. Defaults to console.error.
  unref?: boolean; // Let the process exit while the schedule is running. Defaults to false.
}

export interface PeriodicFlushHandle {
  stop(): void;
}

/**
 * Calls `engine.flush()` every `engine.tickSeconds` and hands each snapshot
 * to the sink. A throwing sink does not stop the schedule.
 *
 * The interval keeps the process alive until `stop()` is called, unless
 * `unref` is set.
 * @returns A handle whose `stop()` clears the interval.
 * @example
 * const engine = new MetricsEngine({ flushInterval: 10 });
 * const flusher = startPeriodicFlush(engine, { sink: callbackSink(console.log) });
 * // on shutdown
 * flusher.stop();
 */
export const startPeriodicFlush = (
  engine: MetricsEngine,
  {
    sink,
    onError = (error) => console.error("Metric sink failed:", error),
    unref = false,
  }: PeriodicFlushOptions
): PeriodicFlushHandle => {
  const timer = setInterval(() => {
    for (const snapshot of engine.flush()) {
      try {
        sink.write(snapshot);
      } catch (error) {
        onError(error);
      }
    }
  }, engine.tickSeconds * 1000);

  if (unref) timer.unref();

  return {
    stop: () => clearInterval(timer),
  };
};
