import { MetricsEngine } from "./engine.js";

export { MetricsEngine };
export {
  DecayingRateEstimator,
  DEFAULT_TICK_SECONDS,
  RATE_WINDOWS,
  isRateWindow,
  type RateWindow,
} from "./estimator.js";
export { MeterState, type MeterStateOptions } from "./meter.js";
export { MetricRegistry } from "./registry.js";
export {
  FlushClearScheduler,
  type MetricSnapshot,
  type RateField,
} from "./scheduler.js";
export {
  resolveEngineConfig,
  type Clock,
  type EngineConfig,
  type Logger,
  type MetricsEngineOptions,
  type RateUnit,
} from "./config.js";
export { ConfigurationError } from "./errors.js";
export { applyDecay, calculateAlpha, calculateInstantaneousRate } from "./stats.js";
export { getField, interpolate, parseDuration, type Duration } from "./utils.js";
export { QueueSink, callbackSink, type Sink, type QueueSinkOptions } from "./sink.js";
export {
  startPeriodicFlush,
  type PeriodicFlushHandle,
  type PeriodicFlushOptions,
} from "./driver.js";
export {
  MetricsFilter,
  filterConfigSchema,
  type FilterConfig,
  type MetricEvent,
} from "./filter.js";

export default MetricsEngine;
