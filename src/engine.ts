import { throttle } from "throttle-debounce";
import {
  resolveEngineConfig,
  type Clock,
  type EngineConfig,
  type Logger,
  type MetricsEngineOptions,
} from "./config.js";
import type { RateWindow } from "./estimator.js";
import type { MeterState } from "./meter.js";
import { MetricRegistry } from "./registry.js";
import { FlushClearScheduler, type MetricSnapshot } from "./scheduler.js";

/**
 * Counts events per metric key and keeps 1, 5 and 15 minute decayed rates
 * for each, emitting a snapshot per key every flush interval.
 */
export class MetricsEngine {
  private readonly config: EngineConfig;
  private readonly registry: MetricRegistry;
  private readonly scheduler: FlushClearScheduler;
  private readonly clock: Clock;
  private readonly debug: boolean;
  private readonly logger: Logger;
  private throttledLogSkipped = (key: string, ageSeconds: number) =>
    this.logSkipped(key, ageSeconds);
  private cancelThrottledLog = () => {};

  /**
   * Constructs an instance of the class.
   *
   * @param ratesOrOptions - Either an array of rates or a configuration options object:
   *                         - If an array is provided, it is treated as `rates`, a subset of
   *                           `[1, 5, 15]` (minutes). Defaults to all three.
   *                         - If an object is provided, it may contain the following options:
   *                           - `flushInterval` (number | string): Seconds, or a duration such as `"10s"`, between
   *                             two snapshots of a key. Must be a positive multiple of `tickSeconds`. Defaults to `5`.
   *                           - `clearInterval` (number | string): Seconds between two resets of a key. `-1` never
   *                             clears. Defaults to `-1`.
   *                           - `ignoreOlderThan` (number | string): Records older than this many seconds are not
   *                             counted. `0` counts everything. Defaults to `0`.
   *                           - `rates` (Array<number>): Which decayed rates to keep. Defaults to `[1, 5, 15]`.
   *                           - `tickSeconds` (number): Cadence at which `flush()` is called. Defaults to `5`.
   *                           - `rateUnit` ("second" | "minute"): Unit of snapshot rates. Defaults to `"second"`.
   *                           - `hostname` (string): `host` of every snapshot. Defaults to the machine name.
   *                           - `clock` (() => number): Source of the current epoch milliseconds.
   *                           - `debug` (boolean): Enables logging for debugging. Defaults to `false`.
   *                           - `logger` (function): Receives debug output. Defaults to `console.log`.
   *                           - `skippedLogThrottlingMS` (number | false): Minimum time between two "skipped stale
   *                             record" messages, or `false` to log every one. Defaults to `1000` ms.
   * @throws {ConfigurationError} If any option is invalid.
   * @example
   * const engine = new MetricsEngine({ flushInterval: 10, rates: [1, 5], debug: true });
   */
  constructor(ratesOrOptions?: readonly number[] | MetricsEngineOptions) {
    const options: MetricsEngineOptions = isRateList(ratesOrOptions)
      ? { rates: ratesOrOptions }
      : ratesOrOptions ?? {};

    const {
      clock = () => Date.now(),
      debug = false,
      logger = console.log,
      skippedLogThrottlingMS = 1000,
    } = options;

    this.config = resolveEngineConfig(options);
    this.clock = clock;
    this.debug = debug;
    this.logger = logger;
    this.registry = new MetricRegistry({
      rates: this.config.rates,
      tickSeconds: this.config.tickSeconds,
    });
    this.scheduler = new FlushClearScheduler(
      this.registry,
      this.config,
      this.clock
    );

    if (skippedLogThrottlingMS !== false) {
      const throttled = throttle(
        skippedLogThrottlingMS,
        (key: string, ageSeconds: number) => this.logSkipped(key, ageSeconds),
        { noTrailing: true }
      );
      this.throttledLogSkipped = throttled;
      this.cancelThrottledLog = () => throttled.cancel();
    }

    if (this.debug)
      this.logger("Metrics engine configured:", JSON.stringify(this.config));
  }

  private logSkipped(key: string, ageSeconds: number) {
    this.logger(
      `Skipping metrics for old event: ${key} is ${ageSeconds}s old (limit ${this.config.ignoreOlderThan}s)`
    );
  }

  /**
   * Counts one record against `key`, unless it is older than `ignoreOlderThan`.
   * @param key - Metric key, as produced by the key resolver.
   * @param eventTime - Record timestamp in epoch milliseconds. Without it the age gate does not apply.
   * @param now - Current epoch milliseconds. Defaults to the engine clock.
   * @returns `false` if the record was skipped by the age gate.
   * @example
   * const engine = new MetricsEngine({ ignoreOlderThan: 10 });
   * engine.mark("http_200", Date.now() - 11_000); // false
   * engine.mark("http_200", Date.now()); // true
   */
  mark(key: string, eventTime?: number, now: number = this.clock()): boolean {
    const { ignoreOlderThan } = this.config;
    if (ignoreOlderThan > 0 && eventTime !== undefined) {
      const ageSeconds = (now - eventTime) / 1000;
      if (ageSeconds > ignoreOlderThan) {
        if (this.debug) this.throttledLogSkipped(key, ageSeconds);
        return false;
      }
    }

    this.registry.getOrCreate(key).mark(1);
    return true;
  }

  /**
   * Ticks every meter once and collects the snapshots that are due.
   * Must be called every `tickSeconds`.
   * @returns Snapshot records for the keys whose flush interval elapsed.
   * @example
   * const engine = new MetricsEngine();
   * engine.mark("events");
   * engine.flush(); // [{ message: "metric", name: "events", count: 1, rate_1m: 0.2, ... }]
   */
  flush(): MetricSnapshot[] {
    if (this.debug) this.logger(`Flushing ${this.registry.size} meters...`);

    const snapshots = this.scheduler.runCycle();

    if (this.debug)
      this.logger("Snapshots emitted:", JSON.stringify(snapshots, null, 2));
    return snapshots;
  }

  getMeter(key: string): MeterState | undefined {
    return this.registry.get(key);
  }

  keys(): string[] {
    return this.registry.keys();
  }

  get size(): number {
    return this.registry.size;
  }

  get tickSeconds(): number {
    return this.config.tickSeconds;
  }

  get rates(): RateWindow[] {
    return [...this.config.rates];
  }

  getConfig(): EngineConfig {
    return { ...this.config, rates: [...this.config.rates] };
  }

  /**
   * Drops any pending throttled diagnostic.
   */
  close(): void {
    this.cancelThrottledLog();
  }
}

const isRateList = (
  value: readonly number[] | MetricsEngineOptions | undefined
): value is readonly number[] => Array.isArray(value);
