import { hostname } from "node:os";
import {
  DEFAULT_TICK_SECONDS,
  isRateWindow,
  RATE_WINDOWS,
  type RateWindow,
} from "./estimator.js";
import { ConfigurationError } from "./errors.js";
import { isMultipleOf, parseDuration, type Duration } from "./utils.js";

export type RateUnit = "second" | "minute";

export type Clock = () => number; // epoch milliseconds

export type Logger = (message: string, ...details: unknown[]) => void;

export interface MetricsEngineOptions {
  flushInterval?: number | Duration; // Defaults to 5 seconds.
  clearInterval?: number | Duration; // Defaults to -1 (never clear).
  ignoreOlderThan?: number | Duration; // Defaults to 0 (count every record).
  rates?: readonly number[]; // Subset of [1, 5, 15], defaults to all three.
  tickSeconds?: number; // Defaults to 5.
  rateUnit?: RateUnit; // Unit of snapshot rates, defaults to "second".
  hostname?: string; // Defaults to the machine host name.
  clock?: Clock; // Defaults to Date.now.
  debug?: boolean; // Enable or disable debug logging.
  logger?: Logger; // Defaults to console.log.
  skippedLogThrottlingMS?: number | false; // Throttle for the stale-record diagnostic, defaults to 1000 ms.
}

/**
 * Validated, fully defaulted engine settings. All intervals are in seconds;
 * the tick and the flush and clear intervals are whole seconds.
 */
export interface EngineConfig {
  tickSeconds: number;
  flushInterval: number;
  clearInterval: number; // -1 when clearing is disabled
  ignoreOlderThan: number; // 0 when the age gate is disabled
  rates: RateWindow[];
  rateUnit: RateUnit;
  hostname: string;
}

const DEFAULT_FLUSH_INTERVAL = 5;
const NEVER_CLEAR = -1;

const validateRates = (rates: readonly number[]): RateWindow[] => {
  const windows = rates.filter(isRateWindow);
  if (rates.length === 0 || windows.length !== rates.length) {
    throw new ConfigurationError(
      `Invalid rates configuration. Possible rates are ${RATE_WINDOWS.join(
        ", "
      )}. Rates: ${rates.join(", ")}.`
    );
  }
  return Array.from(new Set(windows));
};

/**
 * Applies defaults to the engine options and rejects invalid combinations.
 * @throws {ConfigurationError} On the first invalid option.
 * @example
 * resolveEngineConfig({ flushInterval: "10s", rates: [1] });
 * // { tickSeconds: 5, flushInterval: 10, clearInterval: -1, ignoreOlderThan: 0, rates: [1], ... }
 */
export const resolveEngineConfig = (
  options: MetricsEngineOptions = {}
): EngineConfig => {
  const tickSeconds = options.tickSeconds ?? DEFAULT_TICK_SECONDS;
  if (!Number.isInteger(tickSeconds) || tickSeconds <= 0) {
    throw new ConfigurationError(
      `Invalid tick interval: ${tickSeconds}. Must be a positive whole number of seconds.`
    );
  }

  const flushInterval = parseDuration(
    options.flushInterval ?? DEFAULT_FLUSH_INTERVAL
  );
  if (
    !Number.isInteger(flushInterval) ||
    flushInterval <= 0 ||
    !isMultipleOf(flushInterval, tickSeconds)
  ) {
    throw new ConfigurationError(
      `Invalid flush interval: ${flushInterval}. Must be a positive multiple of ${tickSeconds}s.`
    );
  }

  let clearInterval = parseDuration(options.clearInterval ?? NEVER_CLEAR);
  if (clearInterval <= 0) {
    clearInterval = NEVER_CLEAR;
  } else if (
    !Number.isInteger(clearInterval) ||
    !isMultipleOf(clearInterval, tickSeconds)
  ) {
    throw new ConfigurationError(
      `Invalid clear interval: ${clearInterval}. Must be -1 or a positive multiple of ${tickSeconds}s.`
    );
  }

  const ignoreOlderThan = parseDuration(options.ignoreOlderThan ?? 0);
  if (!(ignoreOlderThan >= 0)) {
    throw new ConfigurationError(
      `Invalid ignore_older_than: ${ignoreOlderThan}. Must not be negative.`
    );
  }

  const rateUnit = options.rateUnit ?? "second";
  if (rateUnit !== "second" && rateUnit !== "minute") {
    throw new ConfigurationError(`Invalid rate unit: ${String(rateUnit)}`);
  }

  return {
    tickSeconds,
    flushInterval,
    clearInterval,
    ignoreOlderThan,
    rates: validateRates(options.rates ?? RATE_WINDOWS),
    rateUnit,
    hostname: options.hostname ?? hostname(),
  };
};
