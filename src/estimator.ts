import {
  applyDecay,
  calculateAlpha,
  calculateInstantaneousRate,
} from "./stats.js";

export type RateWindow = 1 | 5 | 15; // minutes

export const RATE_WINDOWS: readonly RateWindow[] = [1, 5, 15];

export const DEFAULT_TICK_SECONDS = 5;

export const isRateWindow = (value: number): value is RateWindow =>
  value === 1 || value === 5 || value === 15;

/**
 * Turns a stream of marks into an exponentially decayed per-second rate.
 *
 * Marks only accumulate; the rate moves exclusively on `tick()`, which the
 * owner must call every `tickSeconds`. Bursts between two ticks therefore
 * weigh the same as evenly spread marks.
 *
 * @example
 * const estimator = new DecayingRateEstimator(1);
 * estimator.mark(10);
 * estimator.tick();
 * estimator.getRate(); // 2 (10 marks over 5 seconds)
 */
export class DecayingRateEstimator {
  readonly windowMinutes: RateWindow;
  readonly tickSeconds: number;
  private readonly alpha: number;
  private uncounted = 0;
  private ewma: number | null = null; // per second, null until the first tick

  constructor(windowMinutes: RateWindow, tickSeconds = DEFAULT_TICK_SECONDS) {
    this.windowMinutes = windowMinutes;
    this.tickSeconds = tickSeconds;
    this.alpha = calculateAlpha(tickSeconds, windowMinutes);
  }

  /**
   * Adds `n` events to the current tick.
   */
  mark(n = 1): void {
    this.uncounted += n;
  }

  /**
   * Folds the events accumulated since the previous tick into the rate.
   * The first tick seeds the rate with the instantaneous value.
   */
  tick(): void {
    const instantaneous = calculateInstantaneousRate(
      this.uncounted,
      this.tickSeconds
    );
    this.uncounted = 0;

    this.ewma =
      this.ewma === null
        ? instantaneous
        : applyDecay(this.ewma, instantaneous, this.alpha);
  }

  /**
   * @returns Events per second, 0 before the first tick.
   */
  getRate(): number {
    return this.ewma ?? 0;
  }

  /**
   * @returns Events per minute, 0 before the first tick.
   */
  getRatePerMinute(): number {
    return this.getRate() * 60;
  }

  getUncounted(): number {
    return this.uncounted;
  }

  isSeeded(): boolean {
    return this.ewma !== null;
  }

  /**
   * Returns the estimator to its pre-first-tick state.
   */
  clear(): void {
    this.uncounted = 0;
    this.ewma = null;
  }
}
