import { z } from "zod";
import type { MetricsEngineOptions } from "./config.js";
import { MetricsEngine } from "./engine.js";
import { ConfigurationError } from "./errors.js";
import type { MetricSnapshot } from "./scheduler.js";
import { getField, interpolate } from "./utils.js";

// Set by the engine or by `add_tag`; `add_field` may not overwrite them.
const RESERVED_FIELDS = new Set([
  "message",
  "name",
  "count",
  "host",
  "timestamp",
  "rate_1m",
  "rate_5m",
  "rate_15m",
  "tags",
]);

/**
 * Pipeline-style configuration, e.g. `{ meter: "http_%{response}", flush_interval: 10 }`.
 */
export const filterConfigSchema = z
  .object({
    meter: z.string().min(1),
    flush_interval: z.number().default(5),
    clear_interval: z.number().default(-1),
    ignore_older_than: z.number().default(0),
    rates: z.array(z.number()).default([1, 5, 15]),
    add_tag: z
      .union([z.string(), z.array(z.string())])
      .default([])
      .transform((tags) => (typeof tags === "string" ? [tags] : tags)),
    add_field: z
      .record(z.string())
      .superRefine((fields, ctx) => {
        const reserved = Object.keys(fields).filter((field) =>
          RESERVED_FIELDS.has(field)
        );
        if (reserved.length > 0) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Reserved field names cannot be set: ${reserved.join(", ")}`,
          });
        }
      })
      .default({}),
  })
  .strict();

export type FilterConfig = z.infer<typeof filterConfigSchema>;

type EngineOverrides = Pick<
  MetricsEngineOptions,
  | "tickSeconds"
  | "rateUnit"
  | "hostname"
  | "clock"
  | "debug"
  | "logger"
  | "skippedLogThrottlingMS"
>;

export interface MetricEvent extends MetricSnapshot {
  tags?: string[];
  [field: string]: unknown;
}

const readTimestamp = (value: unknown): number | undefined => {
  if (typeof value === "number") return value;
  if (value instanceof Date) return value.getTime();
  if (typeof value === "string") {
    const ms = Date.parse(value);
    return Number.isNaN(ms) ? undefined : ms;
  }
  return undefined;
};

/**
 * Meters records flowing through a pipeline: each record is counted under
 * the key its `meter` template resolves to, and `flush()` turns due meters
 * into metric events.
 * @example
 * const filter = new MetricsFilter({ meter: "http_%{response}", add_tag: "metric" });
 * filter.filter({ response: 200, "@timestamp": new Date() });
 * filter.flush(); // [{ message: "metric", name: "http_200", count: 1, tags: ["metric"], ... }]
 */
export class MetricsFilter {
  readonly config: FilterConfig;
  readonly engine: MetricsEngine;
  readonly periodicFlush = true;

  /**
   * @throws {ConfigurationError} If the configuration does not match {@link filterConfigSchema}
   * or describes an invalid engine.
   */
  constructor(rawConfig: unknown, overrides: EngineOverrides = {}) {
    const parsed = filterConfigSchema.safeParse(rawConfig);
    if (!parsed.success) {
      const reasons = parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
        .join("; ");
      throw new ConfigurationError(`Invalid metrics filter configuration: ${reasons}`);
    }

    this.config = parsed.data;
    this.engine = new MetricsEngine({
      ...overrides,
      flushInterval: this.config.flush_interval,
      clearInterval: this.config.clear_interval,
      ignoreOlderThan: this.config.ignore_older_than,
      rates: this.config.rates,
    });
  }

  /**
   * Counts a record under its resolved meter key.
   * @returns `false` if the record was too old to be counted.
   */
  filter(record: Record<string, unknown>): boolean {
    const key = interpolate(this.config.meter, record);
    return this.engine.mark(key, readTimestamp(getField(record, "@timestamp")));
  }

  /**
   * Runs one engine cycle and decorates the resulting snapshots.
   */
  flush(): MetricEvent[] {
    return this.engine.flush().map((snapshot) => this.decorate(snapshot));
  }

  close(): void {
    this.engine.close();
  }

  private decorate(snapshot: MetricSnapshot): MetricEvent {
    const event: MetricEvent = { ...snapshot };
    for (const [field, template] of Object.entries(this.config.add_field)) {
      event[field] = interpolate(template, event);
    }
    if (this.config.add_tag.length > 0) {
      event.tags = [...this.config.add_tag];
    }
    return event;
  }
}
