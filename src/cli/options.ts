import { ConfigError } from "../utils/errors";

export function numberOption(raw: string | undefined, fallback: number, name: string): number {
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (raw.trim() === "" || !Number.isFinite(value) || value < 0) {
    throw new ConfigError(`--${name} expects a non-negative number, got "${raw}"`);
  }
  return value;
}

/**
 * Counts such as the page size must be whole and at least 1.
 */
export function positiveIntOption(raw: string | undefined, fallback: number, name: string): number {
  const value = numberOption(raw, fallback, name);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`--${name} expects a positive integer, got "${raw ?? value}"`);
  }
  return value;
}
