/**
 * Per-project workflow instances
 *
 * An instance is a snapshot of one template version taken when the project is
 * first saved. Step timestamps are audit markers: once stamped they are never
 * cleared, even when the paired flag is toggled off.
 */

import type Database from "better-sqlite3";
import type {
  DateString,
  ProjectStepState,
  ProjectWorkflowInstance,
  StepEventPayload,
  StepTask,
} from "@draftline/types";
import { NotFoundError, ValidationError } from "../errors.js";
import {
  parseDateString,
  parseTimestamp,
  systemClock,
  toDateString,
  toTimestamp,
  type Clock,
} from "../clock.js";
import { computeSchedule, type ScheduleStage } from "../schedule.js";
import { getActiveTemplate, getTemplateStepTasks } from "./templates.js";
import { getProject } from "./projects.js";

export const DEFAULT_TEMPLATE_NAME = "Standard";

interface InstanceRow {
  project_id: number;
  template_id: number;
  template_version: number;
  seeded_at: string;
}

interface ProjectStepRow
  extends Omit<ProjectStepState, "start_flag" | "completed_flag"> {
  start_flag: number;
  completed_flag: number;
}

interface StepTaskRow extends Omit<StepTask, "is_checked"> {
  is_checked: number;
}

export interface SeedOptions {
  templateName?: string;
  now?: Clock;
}

const FLAG_COLUMNS = {
  start: { flag: "start_flag", ts: "start_ts" },
  complete: { flag: "completed_flag", ts: "completed_ts" },
} as const;

const ACTOR_COLUMNS = {
  transfer: { name: "transfer_to_name", ts: "transfer_to_ts" },
  receive: { name: "received_from_name", ts: "received_from_ts" },
} as const;

function rowToStep(row: ProjectStepRow): ProjectStepState {
  return {
    ...row,
    start_flag: row.start_flag === 1,
    completed_flag: row.completed_flag === 1,
  };
}

function rowToTask(row: StepTaskRow): StepTask {
  return { ...row, is_checked: row.is_checked === 1 };
}

function getInstanceRow(
  db: Database.Database,
  projectId: number
): InstanceRow | undefined {
  return db
    .prepare(`SELECT * FROM project_workflow_instances WHERE project_id = ?`)
    .get(projectId) as InstanceRow | undefined;
}

function getStepRows(db: Database.Database, projectId: number): ProjectStepRow[] {
  return db
    .prepare(
      `SELECT * FROM project_workflow_steps WHERE project_id = ? ORDER BY order_index`
    )
    .all(projectId) as ProjectStepRow[];
}

export function hasInstance(db: Database.Database, projectId: number): boolean {
  return getInstanceRow(db, projectId) !== undefined;
}

/**
 * Get a project's workflow instance with its steps in order
 */
export function getInstance(
  db: Database.Database,
  projectId: number
): ProjectWorkflowInstance {
  const row = getInstanceRow(db, projectId);
  if (!row) {
    throw new NotFoundError("Workflow instance for project", projectId);
  }
  return {
    ...row,
    steps: getStepRows(db, projectId).map(rowToStep),
  };
}

/**
 * Get one step of a project's instance by order index
 */
export function getStep(
  db: Database.Database,
  projectId: number,
  orderIndex: number
): ProjectStepState {
  const row = db
    .prepare(
      `SELECT * FROM project_workflow_steps WHERE project_id = ? AND order_index = ?`
    )
    .get(projectId, orderIndex) as ProjectStepRow | undefined;
  if (!row) {
    if (!hasInstance(db, projectId)) {
      throw new NotFoundError("Workflow instance for project", projectId);
    }
    throw new NotFoundError(`Step ${orderIndex} of project`, projectId);
  }
  return rowToStep(row);
}

/**
 * Seed a project's instance from the active template. A project that already
 * has an instance is left untouched.
 */
export function seedInstance(
  db: Database.Database,
  projectId: number,
  options: SeedOptions = {}
): ProjectWorkflowInstance {
  const templateName = options.templateName ?? DEFAULT_TEMPLATE_NAME;
  const now = options.now ?? systemClock;

  const seed = db.transaction(() => {
    if (hasInstance(db, projectId)) {
      return;
    }
    if (!getProject(db, projectId)) {
      throw new NotFoundError("Project", projectId);
    }

    const template = getActiveTemplate(db, templateName);

    db.prepare(
      `
      INSERT INTO project_workflow_instances (project_id, template_id, template_version, seeded_at)
      VALUES (?, ?, ?, ?)
    `
    ).run(projectId, template.id, template.version, toTimestamp(now()));

    const insertStep = db.prepare(`
      INSERT INTO project_workflow_steps
        (project_id, template_id, template_step_id, order_index, department,
         group_name, title, planned_duration_days)
      VALUES (@project_id, @template_id, @template_step_id, @order_index, @department,
              @group_name, @title, @planned_duration_days)
    `);
    const insertTask = db.prepare(`
      INSERT INTO project_step_tasks (project_step_id, template_task_id, order_index, title)
      VALUES (?, ?, ?, ?)
    `);

    for (const step of template.steps) {
      const result = insertStep.run({
        project_id: projectId,
        template_id: template.id,
        template_step_id: step.id,
        order_index: step.order_index,
        department: step.department,
        group_name: step.group_name,
        title: step.title,
        planned_duration_days: step.planned_duration_days,
      });
      const projectStepId = Number(result.lastInsertRowid);
      for (const task of getTemplateStepTasks(db, step.id)) {
        insertTask.run(projectStepId, task.id, task.order_index, task.title);
      }
    }
  });

  seed.immediate();
  return getInstance(db, projectId);
}

/**
 * Record a start, complete, transfer or receive event on one step
 */
export function recordEvent(
  db: Database.Database,
  projectId: number,
  stepOrderIndex: number,
  event: StepEventPayload,
  now: Clock = systemClock
): ProjectStepState {
  const record = db.transaction(() => {
    const step = getStep(db, projectId, stepOrderIndex);
    const stamp = toTimestamp(now());

    switch (event.kind) {
      case "start":
      case "complete": {
        const { flag, ts } = FLAG_COLUMNS[event.kind];
        if (event.value) {
          db.prepare(
            `UPDATE project_workflow_steps SET ${flag} = 1, ${ts} = COALESCE(${ts}, ?) WHERE id = ?`
          ).run(stamp, step.id);
        } else {
          db.prepare(
            `UPDATE project_workflow_steps SET ${flag} = 0 WHERE id = ?`
          ).run(step.id);
        }
        break;
      }
      case "transfer":
      case "receive": {
        const actor = event.actor.trim();
        if (actor === "") {
          throw new ValidationError(`A person is required to ${event.kind} a step`);
        }
        const { name, ts } = ACTOR_COLUMNS[event.kind];
        db.prepare(
          `UPDATE project_workflow_steps SET ${name} = ?, ${ts} = COALESCE(${ts}, ?) WHERE id = ?`
        ).run(actor, stamp, step.id);
        break;
      }
    }

    return getStep(db, projectId, stepOrderIndex);
  });

  return record.immediate();
}

/** A step that is currently marked complete keeps the due date it had */
function frozenDueDate(step: ProjectStepState): DateString | null {
  return step.completed_flag ? step.planned_due_date : null;
}

function toScheduleStage(step: ProjectStepState): ScheduleStage {
  const frozen = frozenDueDate(step);
  return {
    plannedDurationDays: step.planned_duration_days,
    actualStart: step.start_ts ? parseTimestamp(step.start_ts) : null,
    completedAt: step.completed_ts ? parseTimestamp(step.completed_ts) : null,
    fixedDueDate: frozen ? parseDateString(frozen) : null,
  };
}

/**
 * Recompute planned due dates and actual durations from the stored timestamps.
 * A step marked complete keeps the due date it already had, and earlier steps
 * are scheduled back from it.
 */
export function recomputeSchedule(
  db: Database.Database,
  projectId: number,
  projectDueDate: DateString | null
): ProjectStepState[] {
  const recompute = db.transaction(() => {
    const { steps } = getInstance(db, projectId);
    const anchor = projectDueDate ? parseDateString(projectDueDate) : null;
    const { plannedDueDates, actualDurations } = computeSchedule(
      anchor,
      steps.map(toScheduleStage)
    );

    const update = db.prepare(`
      UPDATE project_workflow_steps
      SET planned_due_date = ?, actual_duration_days = ?
      WHERE id = ?
    `);
    steps.forEach((step, i) => {
      const computed = plannedDueDates[i];
      const due =
        frozenDueDate(step) ?? (computed ? toDateString(computed) : null);
      update.run(due, actualDurations[i], step.id);
    });

    return getInstance(db, projectId).steps;
  });

  return recompute.immediate();
}

/**
 * Give the target project the source's step shape with no progress. A target
 * that already has an instance is left untouched.
 */
export function duplicateInstance(
  db: Database.Database,
  sourceProjectId: number,
  targetProjectId: number,
  now: Clock = systemClock
): ProjectWorkflowInstance {
  const duplicate = db.transaction(() => {
    const source = getInstance(db, sourceProjectId);
    if (hasInstance(db, targetProjectId)) {
      return;
    }
    if (!getProject(db, targetProjectId)) {
      throw new NotFoundError("Project", targetProjectId);
    }

    db.prepare(
      `
      INSERT INTO project_workflow_instances (project_id, template_id, template_version, seeded_at)
      VALUES (?, ?, ?, ?)
    `
    ).run(
      targetProjectId,
      source.template_id,
      source.template_version,
      toTimestamp(now())
    );

    const insertStep = db.prepare(`
      INSERT INTO project_workflow_steps
        (project_id, template_id, template_step_id, order_index, department,
         group_name, title, planned_duration_days)
      VALUES (@project_id, @template_id, @template_step_id, @order_index, @department,
              @group_name, @title, @planned_duration_days)
    `);
    const insertTask = db.prepare(`
      INSERT INTO project_step_tasks (project_step_id, template_task_id, order_index, title)
      SELECT ?, template_task_id, order_index, title
      FROM project_step_tasks
      WHERE project_step_id = ?
      ORDER BY order_index
    `);

    for (const step of source.steps) {
      const result = insertStep.run({
        project_id: targetProjectId,
        template_id: step.template_id,
        template_step_id: step.template_step_id,
        order_index: step.order_index,
        department: step.department,
        group_name: step.group_name,
        title: step.title,
        planned_duration_days: step.planned_duration_days,
      });
      insertTask.run(Number(result.lastInsertRowid), step.id);
    }
  });

  duplicate.immediate();
  return getInstance(db, targetProjectId);
}

// ============================================================================
// Step tasks
// ============================================================================

export function listStepTasks(
  db: Database.Database,
  projectStepId: number
): StepTask[] {
  const rows = db
    .prepare(
      `SELECT * FROM project_step_tasks WHERE project_step_id = ? ORDER BY order_index, id`
    )
    .all(projectStepId) as StepTaskRow[];
  return rows.map(rowToTask);
}

export function getStepTask(db: Database.Database, taskId: number): StepTask {
  const row = db
    .prepare(`SELECT * FROM project_step_tasks WHERE id = ?`)
    .get(taskId) as StepTaskRow | undefined;
  if (!row) {
    throw new NotFoundError("Step task", taskId);
  }
  return rowToTask(row);
}

/**
 * Append a project-specific task to a step's checklist
 */
export function addStepTask(
  db: Database.Database,
  projectId: number,
  stepOrderIndex: number,
  title: string
): StepTask {
  const trimmed = title.trim();
  if (trimmed === "") {
    throw new ValidationError("Task title is required");
  }

  const add = db.transaction(() => {
    const step = getStep(db, projectId, stepOrderIndex);
    const { next_order } = db
      .prepare(
        `SELECT COALESCE(MAX(order_index), -1) + 1 as next_order FROM project_step_tasks WHERE project_step_id = ?`
      )
      .get(step.id) as { next_order: number };
    const result = db
      .prepare(
        `INSERT INTO project_step_tasks (project_step_id, order_index, title) VALUES (?, ?, ?)`
      )
      .run(step.id, next_order, trimmed);
    return Number(result.lastInsertRowid);
  });

  return getStepTask(db, add.immediate());
}

/**
 * Check or uncheck a task; the first check time is kept
 */
export function setStepTaskChecked(
  db: Database.Database,
  taskId: number,
  checked: boolean,
  now: Clock = systemClock
): StepTask {
  const result = checked
    ? db
        .prepare(
          `UPDATE project_step_tasks SET is_checked = 1, checked_ts = COALESCE(checked_ts, ?) WHERE id = ?`
        )
        .run(toTimestamp(now()), taskId)
    : db
        .prepare(`UPDATE project_step_tasks SET is_checked = 0 WHERE id = ?`)
        .run(taskId);
  if (result.changes === 0) {
    throw new NotFoundError("Step task", taskId);
  }
  return getStepTask(db, taskId);
}
