/**
 * Business-day schedule calculation for workflow stages
 *
 * Due dates are back-scheduled from a single project due date: the last stage is
 * due on the project due date and each earlier stage is due when its successor
 * has to start. Recorded start timestamps replace the projection once they exist.
 *
 * Everything here is pure; callers persist the results.
 */

import {
  differenceInBusinessDays,
  isWeekend,
  startOfDay,
  subDays,
} from "date-fns";

export interface ScheduleStage {
  plannedDurationDays: number;
  /** Recorded start of the stage, if any */
  actualStart: Date | null;
  /** Recorded completion of the stage, if any */
  completedAt?: Date | null;
  /** Due date that must not move, such as that of a completed stage */
  fixedDueDate?: Date | null;
}

export interface ScheduleResult {
  plannedDueDates: (Date | null)[];
  actualDurations: (number | null)[];
}

/**
 * Step back `days` weekdays from `date`. Fractional days round up; zero or
 * negative durations leave the date unchanged.
 */
export function subtractBusinessDays(date: Date, days: number): Date {
  let remaining = days > 0 ? Math.ceil(days) : 0;
  let current = startOfDay(date);
  while (remaining > 0) {
    current = subDays(current, 1);
    if (!isWeekend(current)) {
      remaining -= 1;
    }
  }
  return current;
}

/**
 * First pass: project due dates backward from the anchor using planned durations only.
 */
export function backProject(anchor: Date, durations: number[]): Date[] {
  const n = durations.length;
  if (n === 0) {
    return [];
  }

  const due = new Array<Date>(n);
  due[n - 1] = startOfDay(anchor);
  for (let i = n - 2; i >= 0; i--) {
    due[i] = subtractBusinessDays(due[i + 1], durations[i + 1]);
  }
  return due;
}

/**
 * Second pass: a stage with a fixed due date keeps it, and a stage whose
 * successor has actually started is due on that start date. Stages before a
 * substitution are re-projected from the substituted date.
 */
export function reconcileWithActuals(
  projected: Date[],
  stages: ScheduleStage[]
): Date[] {
  if (projected.length !== stages.length) {
    throw new Error(
      `Projection has ${projected.length} dates for ${stages.length} stages`
    );
  }

  const result = projected.slice();
  let shifted = false;
  for (let i = result.length - 1; i >= 0; i--) {
    const fixed = stages[i].fixedDueDate;
    const successor = i + 1 < stages.length ? stages[i + 1] : null;
    if (fixed) {
      result[i] = startOfDay(fixed);
      shifted = true;
    } else if (successor?.actualStart) {
      result[i] = startOfDay(successor.actualStart);
      shifted = true;
    } else if (shifted && successor) {
      result[i] = subtractBusinessDays(
        result[i + 1],
        successor.plannedDurationDays
      );
    }
  }
  return result;
}

/**
 * Planned due date for every stage, or all nulls when the project has no due date.
 */
export function computeDueDates(
  anchorDate: Date | null,
  stages: ScheduleStage[]
): (Date | null)[] {
  if (!anchorDate) {
    return stages.map(() => null);
  }
  const projected = backProject(
    anchorDate,
    stages.map((s) => s.plannedDurationDays)
  );
  return reconcileWithActuals(projected, stages);
}

/**
 * Business days each completed stage took. A stage without its own start is
 * measured from the previous stage's completion.
 */
export function computeActualDurations(
  stages: ScheduleStage[]
): (number | null)[] {
  return stages.map((stage, i) => {
    if (!stage.completedAt) {
      return null;
    }
    const start = stage.actualStart ?? stages[i - 1]?.completedAt ?? null;
    if (!start) {
      return null;
    }
    const days = differenceInBusinessDays(
      startOfDay(stage.completedAt),
      startOfDay(start)
    );
    return Math.max(0, days);
  });
}

export function computeSchedule(
  anchorDate: Date | null,
  stages: ScheduleStage[]
): ScheduleResult {
  return {
    plannedDueDates: computeDueDates(anchorDate, stages),
    actualDurations: computeActualDurations(stages),
  };
}
