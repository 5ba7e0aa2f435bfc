import { AppError, ErrorKind } from "../errors.js";

/** A calendar day with no timezone attached. `month` is 1-based. */
export interface CalendarDate {
  year: number;
  month: number;
  day: number;
}

interface ZonedParts extends CalendarDate {
  hour: number;
  minute: number;
  second: number;
}

const MS_PER_SECOND = 1000;
const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

const partsFormatters = new Map<string, Intl.DateTimeFormat>();
const clockFormatters = new Map<string, Intl.DateTimeFormat>();

const monthFormatter = new Intl.DateTimeFormat("en-US", {
  timeZone: "UTC",
  month: "long",
});

/** `Date.UTC` without its mapping of years 0-99 onto 1900-1999. */
function utcMs(
  year: number,
  monthIndex: number,
  day: number,
  hour = 0,
  minute = 0,
  second = 0,
): number {
  const date = new Date(0);
  date.setUTCFullYear(year, monthIndex, day);
  date.setUTCHours(hour, minute, second, 0);
  return date.getTime();
}

export function assertTimeZone(timeZone: string): string {
  try {
    return new Intl.DateTimeFormat("en-US", { timeZone }).resolvedOptions().timeZone;
  } catch (error) {
    throw new AppError(ErrorKind.ENVIRONMENT, `Unknown timezone: ${timeZone}`, {
      cause: error,
      details: { timeZone },
    });
  }
}

export function parseCalendarDate(value: string): CalendarDate {
  const match = DATE_PATTERN.exec(value.trim());
  if (!match) {
    throw new AppError(
      ErrorKind.USER_INPUT,
      `Invalid date format: ${value}. Please use YYYY-MM-DD.`,
    );
  }

  const date: CalendarDate = {
    year: Number(match[1]),
    month: Number(match[2]),
    day: Number(match[3]),
  };

  // 2025-02-30 rolls over into March; a real date survives the round trip.
  const probe = new Date(utcMs(date.year, date.month - 1, date.day));
  if (
    probe.getUTCFullYear() !== date.year ||
    probe.getUTCMonth() !== date.month - 1 ||
    probe.getUTCDate() !== date.day
  ) {
    throw new AppError(ErrorKind.USER_INPUT, `Invalid date: ${value} is not a calendar date.`);
  }
  return date;
}

export function addDays(date: CalendarDate, days: number): CalendarDate {
  const shifted = new Date(utcMs(date.year, date.month - 1, date.day + days));
  return {
    year: shifted.getUTCFullYear(),
    month: shifted.getUTCMonth() + 1,
    day: shifted.getUTCDate(),
  };
}

export function formatIsoDate(date: CalendarDate): string {
  const month = String(date.month).padStart(2, "0");
  const day = String(date.day).padStart(2, "0");
  return `${String(date.year).padStart(4, "0")}-${month}-${day}`;
}

/** "January 05, 2025" */
export function formatLongDate(date: CalendarDate): string {
  const monthName = monthFormatter.format(utcMs(date.year, date.month - 1, 1));
  return `${monthName} ${String(date.day).padStart(2, "0")}, ${date.year}`;
}

function getPartsFormatter(timeZone: string): Intl.DateTimeFormat {
  let formatter = partsFormatters.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat("en-US", {
      timeZone,
      hourCycle: "h23",
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
      hour: "2-digit",
      minute: "2-digit",
      second: "2-digit",
    });
    partsFormatters.set(timeZone, formatter);
  }
  return formatter;
}

function zonedParts(instantMs: number, timeZone: string): ZonedParts {
  const values: Partial<Record<Intl.DateTimeFormatPartTypes, number>> = {};
  for (const part of getPartsFormatter(timeZone).formatToParts(instantMs)) {
    if (part.type !== "literal") {
      values[part.type] = Number(part.value);
    }
  }
  return {
    year: values.year ?? 0,
    month: values.month ?? 1,
    day: values.day ?? 1,
    hour: values.hour ?? 0,
    minute: values.minute ?? 0,
    second: values.second ?? 0,
  };
}

/** Offset of the zone's wall clock from UTC at the given instant, in milliseconds. */
export function timeZoneOffsetMs(instantMs: number, timeZone: string): number {
  const wholeSeconds = Math.floor(instantMs / MS_PER_SECOND) * MS_PER_SECOND;
  const parts = zonedParts(wholeSeconds, timeZone);
  const wallAsUtc = utcMs(
    parts.year,
    parts.month - 1,
    parts.day,
    parts.hour,
    parts.minute,
    parts.second,
  );
  return wallAsUtc - wholeSeconds;
}

function sameCalendarDate(a: CalendarDate, b: CalendarDate): boolean {
  return a.year === b.year && a.month === b.month && a.day === b.day;
}

/**
 * UTC instant of 00:00 local time on `date` in `timeZone`.
 *
 * The offset is sampled twice: once at the naive guess and once at the
 * corrected instant, which settles days that start on the far side of a
 * DST transition. Where the clocks jump over midnight the corrected
 * instant falls on the previous local day, and the day starts at the
 * jump instead.
 */
export function zonedMidnightToUtc(date: CalendarDate, timeZone: string): number {
  const wallMs = utcMs(date.year, date.month - 1, date.day);
  const firstGuess = wallMs - timeZoneOffsetMs(wallMs, timeZone);
  const corrected = wallMs - timeZoneOffsetMs(firstGuess, timeZone);
  if (sameCalendarDate(zonedCalendarDate(corrected, timeZone), date)) {
    return corrected;
  }
  return firstGuess;
}

/** Local calendar date of an instant. */
export function zonedCalendarDate(instantMs: number, timeZone: string): CalendarDate {
  const { year, month, day } = zonedParts(instantMs, timeZone);
  return { year, month, day };
}

function getClockFormatter(timeZone: string): Intl.DateTimeFormat {
  let formatter = clockFormatters.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat("en-US", {
      timeZone,
      hour: "numeric",
      minute: "2-digit",
      hour12: true,
    });
    clockFormatters.set(timeZone, formatter);
  }
  return formatter;
}

/** 12-hour local time without a leading zero, e.g. "9:30 PM". */
export function formatClockTime(instantMs: number, timeZone: string): string {
  let hour = "";
  let minute = "";
  let dayPeriod = "";
  for (const part of getClockFormatter(timeZone).formatToParts(instantMs)) {
    if (part.type === "hour") hour = part.value;
    else if (part.type === "minute") minute = part.value;
    else if (part.type === "dayPeriod") dayPeriod = part.value.toUpperCase();
  }
  return `${hour}:${minute} ${dayPeriod}`;
}
