import type { Bucket, TimeRange } from "../core/types.js";
import {
  addDays,
  assertTimeZone,
  formatIsoDate,
  zonedMidnightToUtc,
  type CalendarDate,
} from "../utils/timezone.js";

export interface DayWindows {
  date: CalendarDate;
  timeZone: string;
  prev: TimeRange;
  current: TimeRange;
  next: TimeRange;
}

/**
 * Previous, target and next local days as half-open UTC ranges. Each boundary
 * is its own local midnight, so 23- and 25-hour DST days keep their length.
 */
export function resolveDayWindows(date: CalendarDate, timeZone: string): DayWindows {
  const zone = assertTimeZone(timeZone);
  const [prevStart, currentStart, nextStart, nextEnd] = [-1, 0, 1, 2].map((offset) =>
    zonedMidnightToUtc(addDays(date, offset), zone),
  );
  return {
    date,
    timeZone: zone,
    prev: { startMs: prevStart, endMs: currentStart },
    current: { startMs: currentStart, endMs: nextStart },
    next: { startMs: nextStart, endMs: nextEnd },
  };
}

/** The single range a store query has to cover. */
export function windowSpan(windows: DayWindows): TimeRange {
  return { startMs: windows.prev.startMs, endMs: windows.next.endMs };
}

export function inRange(instantMs: number, range: TimeRange): boolean {
  return instantMs >= range.startMs && instantMs < range.endMs;
}

export function bucketFor(instantMs: number, windows: DayWindows): Bucket | null {
  if (inRange(instantMs, windows.current)) return "current";
  if (inRange(instantMs, windows.prev)) return "prev";
  if (inRange(instantMs, windows.next)) return "next";
  return null;
}

export function describeWindows(windows: DayWindows): Record<string, string> {
  const iso = (ms: number) => new Date(ms).toISOString();
  return {
    date: formatIsoDate(windows.date),
    timeZone: windows.timeZone,
    prevStart: iso(windows.prev.startMs),
    currentStart: iso(windows.current.startMs),
    nextStart: iso(windows.next.startMs),
    nextEnd: iso(windows.next.endMs),
  };
}
