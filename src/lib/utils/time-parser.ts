import { DateTime } from "luxon";

/**
 * Parse an RFC 2822 date-time (e.g. "Mon, 02 Jan 2006 15:04:05 -0700" or
 * "16 Oct 2021 17:46:42 GMT") into a UTC instant.
 *
 * @returns The parsed date, or null when the string is not valid RFC 2822
 */
export function parseRfc2822(value: string): Date | null {
  const parsed = DateTime.fromRFC2822(value, { zone: "utc" });
  if (!parsed.isValid) {
    return null;
  }
  return parsed.toJSDate();
}

/**
 * Convert epoch milliseconds to whole Unix seconds
 */
export function toUnixSeconds(epochMs: number): number {
  return Math.floor(epochMs / 1000);
}
