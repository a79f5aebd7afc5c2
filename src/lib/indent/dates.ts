// src/lib/indent/dates.ts
import { format, isValid, parse, startOfDay, subDays } from "date-fns";

export const ISO_DATE = "yyyy-MM-dd";
/** Required-date layout written to the log. */
export const LOG_DATE = "dd-MM-yyyy";
export const LOG_TIMESTAMP = "yyyy-MM-dd HH:mm:ss";

export const REQUIRED_DATE_FORMATS = [LOG_DATE, ISO_DATE, "dd/MM/yyyy"] as const;
export const TIMESTAMP_FORMATS = [LOG_TIMESTAMP, "yyyy-MM-dd HH:mm", "dd/MM/yyyy HH:mm:ss", ISO_DATE] as const;

/** First format that fully parses the text wins; anything else is null. */
export function parseWithFormats(text: string, formats: readonly string[]): Date | null {
  const s = text.trim();
  if (!s) return null;
  const ref = new Date(2000, 0, 1);
  for (const f of formats) {
    const d = parse(s, f, ref);
    if (isValid(d)) return d;
  }
  return null;
}

export function parseIsoDate(text: string): Date | null {
  return parseWithFormats(text, [ISO_DATE]);
}

export function isoDay(d: Date): string {
  return format(d, ISO_DATE);
}

export function logDay(d: Date): string {
  return format(d, LOG_DATE);
}

export function logTimestamp(d: Date): string {
  return format(d, LOG_TIMESTAMP);
}

export function today(now: Date = new Date()): Date {
  return startOfDay(now);
}

export function daysAgo(now: Date, days: number): Date {
  return subDays(startOfDay(now), days);
}

/** Lifts a yyyy-MM-dd date to `todayIso` when it falls before it; both strings are in the same layout. */
export function notBefore(dateIso: string, todayIso: string): string {
  return !dateIso || dateIso < todayIso ? todayIso : dateIso;
}
