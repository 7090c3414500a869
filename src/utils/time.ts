import { TZDate, tz } from "@date-fns/tz";
import { format, isValid, parseISO } from "date-fns";

export const MOSCOW_TZ = "Europe/Moscow";

const CANONICAL_PATTERN = "yyyy-MM-dd'T'HH:mm:ss.SSSxxx";

/** ISO-8601 in Moscow time, with milliseconds. */
export function toCanonicalIso(date: Date): string {
  return format(new TZDate(date.getTime(), MOSCOW_TZ), CANONICAL_PATTERN);
}

export function formatMoscow(date: Date, pattern: string): string {
  return format(new TZDate(date.getTime(), MOSCOW_TZ), pattern);
}

/**
 * Parses ISO-ish timestamps ("2024-05-06 10:00:00", "...T10:00:00+03:00").
 * Values without an offset are wall-clock Moscow time, as the ISS API sends them.
 */
export function parseTimestamp(raw: string): Date | null {
  const text = raw.trim().replace(" ", "T");
  if (!text) return null;

  const parsed = parseISO(text, { in: tz(MOSCOW_TZ) });
  if (!isValid(parsed)) return null;
  return new Date(parsed.getTime());
}
