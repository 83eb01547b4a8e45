import { MeterState, type MeterStateOptions } from "./meter.js";

/**
 * Lazily populated map of metric key to {@link MeterState}. Keys are never
 * removed.
 *
 * All methods are synchronous, so an insert-on-miss cannot interleave with
 * another caller: exactly one MeterState exists per key.
 */
export class MetricRegistry {
  private readonly meters = new Map<string, MeterState>();
  private readonly meterOptions: MeterStateOptions;

  constructor(meterOptions: MeterStateOptions = {}) {
    this.meterOptions = meterOptions;
  }

  /**
   * Returns the meter for `key`, creating it on first access.
   */
  getOrCreate(key: string): MeterState {
    let meter = this.meters.get(key);
    if (!meter) {
      meter = new MeterState(key, this.meterOptions);
      this.meters.set(key, meter);
    }
    return meter;
  }

  get(key: string): MeterState | undefined {
    return this.meters.get(key);
  }

  has(key: string): boolean {
    return this.meters.has(key);
  }

  keys(): string[] {
    return Array.from(this.meters.keys());
  }

  get size(): number {
    return this.meters.size;
  }

  /**
   * Visits every meter present when the call starts. Meters created by
   * `fn` itself are left for the next pass.
   */
  forEach(fn: (meter: MeterState, key: string) => void): void {
    for (const meter of Array.from(this.meters.values())) {
      fn(meter, meter.key);
    }
  }
}
