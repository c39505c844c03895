import { ValidationError } from "./errors";

export const DEFAULT_TOP_K = 10;
export const MAX_TOP_K = 100;

/**
 * Parse and validate a positive integer parameter.
 * Missing values take the default, values above `max` are clamped.
 */
export function parsePositiveInt(
  value: unknown,
  name: string,
  defaultValue: number,
  max?: number
): number {
  if (value === undefined || value === null || value === "") return defaultValue;

  const parsed =
    typeof value === "number"
      ? value
      : typeof value === "string" && /^\s*-?\d+\s*$/.test(value)
        ? parseInt(value, 10)
        : NaN;

  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new ValidationError(`${name} must be a positive integer`);
  }
  return max ? Math.min(parsed, max) : parsed;
}

export function parseTopK(value: unknown): number {
  return parsePositiveInt(value, "top_k", DEFAULT_TOP_K, MAX_TOP_K);
}

/**
 * Single string query parameter; repeated parameters keep the first value
 */
export function queryString(value: unknown): string | undefined {
  if (typeof value === "string") return value;
  if (Array.isArray(value) && typeof value[0] === "string") return value[0];
  return undefined;
}
