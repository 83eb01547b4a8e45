import { ConfigurationError } from "./errors.js";

export type Duration = `${number}${"s" | "m" | "h"}`; // e.g., "15s", "1m", "2h"

/**
 * Converts a duration into seconds.
 * @param duration Number of seconds, or a duration string such as "10s" or "1m"
 * @returns Seconds equivalent
 * @throws {ConfigurationError} If the string is not `<integer><unit>`.
 */
export const parseDuration = (duration: number | string): number => {
  if (typeof duration === "number") return duration;

  const match = duration.match(/^(\d+)([smh])$/);
  if (!match) {
    throw new ConfigurationError(`Invalid duration format: ${duration}`);
  }

  const [, value = "", unit = ""] = match;
  const multipliers: Record<string, number> = { s: 1, m: 60, h: 60 * 60 };
  return parseInt(value, 10) * (multipliers[unit] ?? 1);
};

/**
 * Tells whether `value` is a whole multiple of `step`, tolerating float noise.
 */
export const isMultipleOf = (value: number, step: number): boolean => {
  const ratio = value / step;
  return Math.abs(ratio - Math.round(ratio)) < 1e-9;
};

/**
 * Resolves a field reference against a record.
 * @param record Record to read from
 * @param reference Either a top-level name (`response`) or a bracketed path (`[http][status]`)
 * @returns The referenced value, or `undefined` if any segment is missing
 */
export const getField = (
  record: Record<string, unknown>,
  reference: string
): unknown => {
  const segments = reference.startsWith("[")
    ? Array.from(reference.matchAll(/\[([^\]]+)\]/g), (m) => m[1] ?? "")
    : [reference];

  let current: unknown = record;
  for (const segment of segments) {
    if (current === null || typeof current !== "object") return undefined;
    current = Reflect.get(current, segment);
  }
  return current;
};

const stringifyField = (value: unknown): string => {
  if (Array.isArray(value)) return value.map(stringifyField).join(",");
  if (value instanceof Date) return value.toISOString();
  if (typeof value === "object" && value !== null) return JSON.stringify(value);
  return String(value);
};

/**
 * Replaces every `%{reference}` in a template with the referenced field.
 * Unresolved references are left in place.
 * @example
 * interpolate("http_%{response}", { response: 404 }); // "http_404"
 * interpolate("%{[req][verb]}", { req: { verb: "GET" } }); // "GET"
 */
export const interpolate = (
  template: string,
  record: Record<string, unknown>
): string =>
  template.replace(/%\{([^}]+)\}/g, (placeholder, reference: string) => {
    const value = getField(record, reference);
    return value === undefined || value === null
      ? placeholder
      : stringifyField(value);
  });
