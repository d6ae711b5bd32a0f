// packages/pipeline/src/calendar.ts
//
// Calendar-day helpers. Days are handled as "yyyy-MM-dd" strings everywhere;
// Date objects only exist transiently at local midnight inside date-fns calls.

import {
  addDays,
  differenceInCalendarDays,
  eachDayOfInterval,
  format,
  getDayOfYear,
  isValid,
  parse,
} from "date-fns";
import type { SeasonV1 } from "@wxlens/contracts";

const DAY_FORMAT = "yyyy-MM-dd";
const ACCEPTED_FORMATS = ["yyyy-MM-dd", "yyyy/MM/dd", "MM/dd/yyyy"] as const;
const REFERENCE_DATE = new Date(2000, 0, 1);
const ISO_TIMESTAMP_RE = /^(\d{4}-\d{2}-\d{2})T/;

export const DAYS_PER_YEAR = 365.25;

/**
 * Normalize a raw date cell to "yyyy-MM-dd", or null when it cannot be read.
 * Timestamps keep their calendar-date prefix; no timezone shifting is applied.
 */
export function parseDayInput(value: unknown): string | null {
  if (value instanceof Date) return isValid(value) ? format(value, DAY_FORMAT) : null;
  if (typeof value !== "string") return null;

  const s = value.trim();
  if (!s) return null;

  const ts = ISO_TIMESTAMP_RE.exec(s);
  const candidate = ts ? ts[1] : s;

  for (const fmt of ACCEPTED_FORMATS) {
    const d = parse(candidate, fmt, REFERENCE_DATE);
    if (isValid(d)) return format(d, DAY_FORMAT);
  }
  return null;
}

function toDate(day: string): Date {
  const d = parse(day, DAY_FORMAT, REFERENCE_DATE);
  if (!isValid(d)) throw new Error(`invalid day ${day}`);
  return d;
}

export function addDaysIso(day: string, n: number): string {
  return format(addDays(toDate(day), n), DAY_FORMAT);
}

/** Signed number of calendar days from `from` to `to`. */
export function daysBetween(from: string, to: string): number {
  return differenceInCalendarDays(toDate(to), toDate(from));
}

/** Every calendar day of [start, end], inclusive. */
export function eachDayIso(start: string, end: string): string[] {
  return eachDayOfInterval({ start: toDate(start), end: toDate(end) }).map((d) => format(d, DAY_FORMAT));
}

export function dayOfYear(day: string): number {
  return getDayOfYear(toDate(day));
}

/** Meteorological seasons (northern hemisphere): MAM, JJA, SON, DJF. */
export function seasonOf(day: string): SeasonV1 {
  const month = Number(day.slice(5, 7));
  if (month >= 3 && month <= 5) return "spring";
  if (month >= 6 && month <= 8) return "summer";
  if (month >= 9 && month <= 11) return "autumn";
  return "winter";
}
