import type { Clock, EngineConfig } from "./config.js";
import type { RateWindow } from "./estimator.js";
import type { MeterState } from "./meter.js";
import type { MetricRegistry } from "./registry.js";

export type RateField = `rate_${RateWindow}m`;

/**
 * Record emitted for one key when its flush interval elapses.
 */
export interface MetricSnapshot extends Partial<Record<RateField, number>> {
  message: "metric";
  name: string;
  count: number;
  host: string;
  timestamp: number; // epoch milliseconds
}

type SchedulerConfig = Pick<
  EngineConfig,
  "tickSeconds" | "flushInterval" | "clearInterval" | "rateUnit" | "hostname"
>;

/**
 * Advances, ticks, flushes and clears every meter of a registry once per
 * call. The caller must invoke {@link FlushClearScheduler.runCycle} every
 * `tickSeconds`.
 */
export class FlushClearScheduler {
  private readonly registry: MetricRegistry;
  private readonly config: SchedulerConfig;
  private readonly clock: Clock;

  constructor(registry: MetricRegistry, config: SchedulerConfig, clock: Clock) {
    this.registry = registry;
    this.config = config;
    this.clock = clock;
  }

  /**
   * Runs one flush/clear cycle.
   * @returns Snapshots of the keys whose flush interval elapsed, possibly none.
   */
  runCycle(): MetricSnapshot[] {
    const timestamp = this.clock();
    const snapshots: MetricSnapshot[] = [];

    this.registry.forEach((meter) => {
      meter.advance(this.config.tickSeconds);
      meter.tick();

      if (this.shouldFlush(meter)) {
        snapshots.push(this.buildSnapshot(meter, timestamp));
        meter.markFlushed();
      }

      // After the snapshot: a key flushed and cleared in the same cycle reports pre-clear values.
      if (this.shouldClear(meter)) {
        meter.clear();
      }
    });

    return snapshots;
  }

  private shouldFlush(meter: MeterState): boolean {
    return meter.getSecondsSinceFlush() >= this.config.flushInterval;
  }

  private shouldClear(meter: MeterState): boolean {
    return (
      this.config.clearInterval > 0 &&
      meter.getSecondsSinceClear() >= this.config.clearInterval
    );
  }

  private buildSnapshot(meter: MeterState, timestamp: number): MetricSnapshot {
    const snapshot: MetricSnapshot = {
      message: "metric",
      name: meter.key,
      count: meter.getCount(),
      host: this.config.hostname,
      timestamp,
    };

    for (const window of meter.getRateWindows()) {
      const rate =
        this.config.rateUnit === "minute"
          ? meter.getRatePerMinute(window)
          : meter.getRate(window);
      const field: RateField = `rate_${window}m`;
      if (rate !== undefined) snapshot[field] = rate;
    }

    return snapshot;
  }
}
