import {
  DecayingRateEstimator,
  DEFAULT_TICK_SECONDS,
  RATE_WINDOWS,
  type RateWindow,
} from "./estimator.js";

export interface MeterStateOptions {
  rates?: readonly RateWindow[]; // Defaults to [1, 5, 15].
  tickSeconds?: number; // Defaults to 5.
}

/**
 * Count and decayed rates for one metric key, plus the time elapsed since
 * the key was last flushed and last cleared.
 */
export class MeterState {
  readonly key: string;
  private count = 0;
  private readonly estimators: Map<RateWindow, DecayingRateEstimator>;
  private secondsSinceFlush = 0;
  private secondsSinceClear = 0;

  constructor(key: string, options: MeterStateOptions = {}) {
    const { rates = RATE_WINDOWS, tickSeconds = DEFAULT_TICK_SECONDS } =
      options;

    this.key = key;
    this.estimators = new Map(
      rates.map((window): [RateWindow, DecayingRateEstimator] => [
        window,
        new DecayingRateEstimator(window, tickSeconds),
      ])
    );
  }

  /**
   * Records `n` events against the count and every estimator.
   */
  mark(n = 1): void {
    this.count += n;
    for (const estimator of this.estimators.values()) {
      estimator.mark(n);
    }
  }

  getCount(): number {
    return this.count;
  }

  /** Windows with an estimator, in configuration order. */
  getRateWindows(): RateWindow[] {
    return Array.from(this.estimators.keys());
  }

  /**
   * @returns Events per second for `window`, or `undefined` when that rate is not tracked.
   */
  getRate(window: RateWindow): number | undefined {
    return this.estimators.get(window)?.getRate();
  }

  getRatePerMinute(window: RateWindow): number | undefined {
    return this.estimators.get(window)?.getRatePerMinute();
  }

  getEstimator(window: RateWindow): DecayingRateEstimator | undefined {
    return this.estimators.get(window);
  }

  getSecondsSinceFlush(): number {
    return this.secondsSinceFlush;
  }

  getSecondsSinceClear(): number {
    return this.secondsSinceClear;
  }

  /**
   * Moves both interval counters forward. Only the scheduler calls this.
   */
  advance(seconds: number): void {
    this.secondsSinceFlush += seconds;
    this.secondsSinceClear += seconds;
  }

  tick(): void {
    for (const estimator of this.estimators.values()) {
      estimator.tick();
    }
  }

  markFlushed(): void {
    this.secondsSinceFlush = 0;
  }

  /**
   * Zeroes the count, resets every estimator and restarts the clear interval.
   */
  clear(): void {
    this.count = 0;
    for (const estimator of this.estimators.values()) {
      estimator.clear();
    }
    this.secondsSinceClear = 0;
  }
}
