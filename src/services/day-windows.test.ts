import { describe, expect, it } from "vitest";
import { ErrorKind } from "../errors.js";
import { bucketFor, describeWindows, resolveDayWindows, windowSpan } from "./day-windows.js";

const at = (iso: string) => Date.parse(iso);

describe("resolveDayWindows", () => {
  const windows = resolveDayWindows({ year: 2025, month: 3, day: 9 }, "America/Chicago");

  it("builds three consecutive half-open local days across a DST change", () => {
    expect(describeWindows(windows)).toEqual({
      date: "2025-03-09",
      timeZone: "America/Chicago",
      prevStart: "2025-03-08T06:00:00.000Z",
      currentStart: "2025-03-09T06:00:00.000Z",
      nextStart: "2025-03-10T05:00:00.000Z",
      nextEnd: "2025-03-11T05:00:00.000Z",
    });
    expect(windows.prev.endMs).toBe(windows.current.startMs);
    expect(windows.current.endMs).toBe(windows.next.startMs);
  });

  it("spans from the previous day's start to the next day's end", () => {
    expect(windowSpan(windows)).toEqual({
      startMs: at("2025-03-08T06:00:00Z"),
      endMs: at("2025-03-11T05:00:00Z"),
    });
  });

  it("puts local midnight of the target day in current, not prev", () => {
    expect(bucketFor(at("2025-03-09T06:00:00Z"), windows)).toBe("current");
    expect(bucketFor(at("2025-03-09T05:59:59.999Z"), windows)).toBe("prev");
  });

  it("puts local midnight of the next day in next, not current", () => {
    expect(bucketFor(at("2025-03-10T05:00:00Z"), windows)).toBe("next");
    expect(bucketFor(at("2025-03-10T04:59:59.999Z"), windows)).toBe("current");
  });

  it("leaves instants outside the three days unbucketed", () => {
    expect(bucketFor(at("2025-03-08T05:59:59Z"), windows)).toBeNull();
    expect(bucketFor(at("2025-03-11T05:00:00Z"), windows)).toBeNull();
  });

  it("keeps the last hour before a skipped midnight in prev", () => {
    const santiago = resolveDayWindows({ year: 2024, month: 9, day: 8 }, "America/Santiago");
    expect(describeWindows(santiago)).toEqual({
      date: "2024-09-08",
      timeZone: "America/Santiago",
      prevStart: "2024-09-07T04:00:00.000Z",
      currentStart: "2024-09-08T04:00:00.000Z",
      nextStart: "2024-09-09T03:00:00.000Z",
      nextEnd: "2024-09-10T03:00:00.000Z",
    });
    expect(bucketFor(at("2024-09-08T03:30:00Z"), santiago)).toBe("prev");
    expect(bucketFor(at("2024-09-08T04:00:00Z"), santiago)).toBe("current");
  });

  it("rejects an unknown timezone", () => {
    let caught: unknown;
    try {
      resolveDayWindows({ year: 2025, month: 3, day: 9 }, "Nowhere/Special");
    } catch (error) {
      caught = error;
    }
    expect(caught).toMatchObject({ kind: ErrorKind.ENVIRONMENT });
  });
});
