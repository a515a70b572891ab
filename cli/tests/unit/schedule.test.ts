/**
 * Unit tests for business-day scheduling
 */

import { describe, it, expect } from "vitest";
import {
  backProject,
  computeActualDurations,
  computeDueDates,
  reconcileWithActuals,
  subtractBusinessDays,
  type ScheduleStage,
} from "../../src/schedule.js";
import { toDateString } from "../../src/clock.js";

function day(value: string, time = "00:00"): Date {
  const [y, m, d] = value.split("-").map(Number);
  const [hh, mm] = time.split(":").map(Number);
  return new Date(y, m - 1, d, hh, mm);
}

function dates(values: (Date | null)[]): (string | null)[] {
  return values.map((v) => (v ? toDateString(v) : null));
}

function stage(
  plannedDurationDays: number,
  actualStart: Date | null = null,
  completedAt: Date | null = null
): ScheduleStage {
  return { plannedDurationDays, actualStart, completedAt };
}

describe("subtractBusinessDays", () => {
  it("should count back three weekdays from a Friday to Tuesday", () => {
    expect(toDateString(subtractBusinessDays(day("2025-11-14"), 3))).toBe(
      "2025-11-11"
    );
  });

  it("should skip the weekend when stepping back from Monday", () => {
    expect(toDateString(subtractBusinessDays(day("2025-11-10"), 1))).toBe(
      "2025-11-07"
    );
    expect(toDateString(subtractBusinessDays(day("2025-11-17"), 5))).toBe(
      "2025-11-10"
    );
  });

  it("should leave the date unchanged for zero or negative durations", () => {
    expect(toDateString(subtractBusinessDays(day("2025-11-12"), 0))).toBe(
      "2025-11-12"
    );
    expect(toDateString(subtractBusinessDays(day("2025-11-12"), -2))).toBe(
      "2025-11-12"
    );
  });

  it("should round fractional durations up", () => {
    expect(toDateString(subtractBusinessDays(day("2025-11-14"), 1.5))).toBe(
      "2025-11-12"
    );
  });

  it("should drop the time of day", () => {
    const result = subtractBusinessDays(day("2025-11-14", "15:45"), 1);
    expect(result.getHours()).toBe(0);
    expect(toDateString(result)).toBe("2025-11-13");
  });
});

describe("backProject", () => {
  it("should anchor the last stage on the project due date", () => {
    expect(dates(backProject(day("2025-11-14"), [3]))).toEqual(["2025-11-14"]);
  });

  it("should step each stage back by its successor's duration", () => {
    expect(dates(backProject(day("2025-11-14"), [2, 3]))).toEqual([
      "2025-11-11",
      "2025-11-14",
    ]);
  });

  it("should give a zero-duration successor the same due date", () => {
    expect(dates(backProject(day("2025-11-14"), [1, 0]))).toEqual([
      "2025-11-14",
      "2025-11-14",
    ]);
  });

  it("should return nothing for no stages", () => {
    expect(backProject(day("2025-11-14"), [])).toEqual([]);
  });
});

describe("computeDueDates", () => {
  it("should return all nulls without a project due date", () => {
    expect(computeDueDates(null, [stage(1), stage(2)])).toEqual([null, null]);
  });

  it("should use the successor's actual start instead of the projection", () => {
    const result = computeDueDates(day("2025-11-14"), [
      stage(1),
      stage(2, day("2025-11-05", "10:30")),
      stage(3),
    ]);
    expect(dates(result)).toEqual(["2025-11-05", "2025-11-11", "2025-11-14"]);
  });

  it("should re-project earlier stages from a substituted date", () => {
    const result = computeDueDates(day("2025-11-14"), [
      stage(1),
      stage(1),
      stage(2, day("2025-11-03", "08:00")),
      stage(1),
    ]);
    expect(dates(result)).toEqual([
      "2025-10-31",
      "2025-11-03",
      "2025-11-13",
      "2025-11-14",
    ]);
  });

  it("should ignore the first stage's own start", () => {
    const result = computeDueDates(day("2025-11-14"), [
      stage(1, day("2025-11-01")),
      stage(3),
    ]);
    expect(dates(result)).toEqual(["2025-11-11", "2025-11-14"]);
  });
});

describe("reconcileWithActuals", () => {
  it("should reject mismatched lengths", () => {
    expect(() => reconcileWithActuals([day("2025-11-14")], [])).toThrow(
      "Projection has 1 dates for 0 stages"
    );
  });

  it("should schedule earlier stages back from a fixed due date", () => {
    const projected = backProject(day("2025-12-05"), [2, 2]);
    const result = reconcileWithActuals(projected, [
      stage(2),
      { ...stage(2), fixedDueDate: day("2025-11-14") },
    ]);
    expect(dates(result)).toEqual(["2025-11-12", "2025-11-14"]);
  });

  it("should keep a fixed date ahead of a successor's actual start", () => {
    const result = computeDueDates(day("2025-11-21"), [
      { ...stage(1), fixedDueDate: day("2025-11-07") },
      stage(2, day("2025-11-10", "09:00")),
      stage(3),
    ]);
    expect(dates(result)).toEqual(["2025-11-07", "2025-11-18", "2025-11-21"]);
  });
});

describe("computeActualDurations", () => {
  it("should count business days from start to completion", () => {
    const result = computeActualDurations([
      stage(3, day("2025-11-10", "09:00"), day("2025-11-14", "16:00")),
    ]);
    expect(result).toEqual([4]);
  });

  it("should fall back to the previous stage's completion", () => {
    const result = computeActualDurations([
      stage(3, day("2025-11-10", "09:00"), day("2025-11-14", "16:00")),
      stage(2, null, day("2025-11-18", "11:00")),
      stage(1),
    ]);
    expect(result).toEqual([4, 2, null]);
  });

  it("should be null without any start reference", () => {
    expect(computeActualDurations([stage(1, null, day("2025-11-14"))])).toEqual([
      null,
    ]);
  });

  it("should never be negative", () => {
    const result = computeActualDurations([
      stage(1, day("2025-11-14"), day("2025-11-12")),
    ]);
    expect(result).toEqual([0]);
  });
});
