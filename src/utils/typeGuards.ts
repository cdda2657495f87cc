/**
 * Type Guards - SSOT for Runtime Type Checking
 *
 * Every JSON value the proxy inspects (request bodies, stream units) is
 * `unknown` until one of these guards narrows it.
 */

export type UnknownRecord = Record<string, unknown>;

/**
 * Type guard to check if value is a plain object (not array, not null)
 */
export const isRecord = (value: unknown): value is UnknownRecord =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export const isString = (value: unknown): value is string =>
  typeof value === "string";

export const isBoolean = (value: unknown): value is boolean =>
  typeof value === "boolean";

export const isNonNegativeInteger = (value: unknown): value is number =>
  typeof value === "number" && Number.isSafeInteger(value) && value >= 0;

/**
 * Token counters are reported as JSON numbers; anything that is not a
 * non-negative integer is treated as absent.
 */
export const toTokenCount = (value: unknown): number | null =>
  isNonNegativeInteger(value) ? value : null;
