import { InvalidArgumentError } from "commander";

/**
 * Commander argument parser for positive integers (fan IDs, timeouts)
 */
export function parsePositiveInteger(value: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value) || !Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return parsed;
}
