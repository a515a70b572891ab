/**
 * Versioned workflow templates
 *
 * Templates are append-only: publishing always inserts a new version and moves
 * the active flag to it. Published steps are never updated or deleted.
 */

import type Database from "better-sqlite3";
import type {
  TemplateStep,
  TemplateStepInput,
  WorkflowTemplate,
} from "@draftline/types";
import { NotFoundError, ValidationError } from "../errors.js";
import { systemClock, toTimestamp, type Clock } from "../clock.js";

interface TemplateRow {
  id: number;
  name: string;
  version: number;
  is_active: number;
  created_date: string;
}

type TemplateStepRow = Omit<TemplateStep, "tasks">;

export interface TemplateTaskRow {
  id: number;
  template_step_id: number;
  order_index: number;
  title: string;
}

export interface PublishOptions {
  now?: Clock;
}

/**
 * Check a step list before it is published
 */
export function validateTemplateSteps(steps: TemplateStepInput[]): void {
  if (steps.length === 0) {
    throw new ValidationError("Template must have at least one step");
  }

  const issues: string[] = [];
  const seen = new Set<number>();

  steps.forEach((step, position) => {
    const label = `step ${position}`;
    if (!Number.isInteger(step.order_index) || step.order_index < 0) {
      issues.push(`${label}: order_index must be a non-negative integer`);
    } else if (seen.has(step.order_index)) {
      issues.push(`${label}: duplicate order_index ${step.order_index}`);
    } else {
      seen.add(step.order_index);
    }
    if (!step.department || step.department.trim() === "") {
      issues.push(`${label}: department is required`);
    }
    if (!step.title || step.title.trim() === "") {
      issues.push(`${label}: title is required`);
    }
    if (
      !Number.isFinite(step.planned_duration_days) ||
      step.planned_duration_days < 0
    ) {
      issues.push(`${label}: planned_duration_days must be zero or more`);
    }
    if (step.tasks?.some((task) => task.trim() === "")) {
      issues.push(`${label}: task titles must not be empty`);
    }
  });

  // With no duplicates, any index outside 0..n-1 implies a gap
  if (seen.size === steps.length) {
    for (let expected = 0; expected < steps.length; expected++) {
      if (!seen.has(expected)) {
        issues.push(
          `order_index ${expected} is missing; indices must run 0..${steps.length - 1}`
        );
        break;
      }
    }
  }

  if (issues.length > 0) {
    throw new ValidationError(`Invalid template steps: ${issues[0]}`, {
      issues,
    });
  }
}

/**
 * Tasks of a template step with their ids, for copying into projects
 */
export function getTemplateStepTasks(
  db: Database.Database,
  templateStepId: number
): TemplateTaskRow[] {
  const stmt = db.prepare(`
    SELECT id, template_step_id, order_index, title
    FROM workflow_step_tasks
    WHERE template_step_id = ?
    ORDER BY order_index
  `);
  return stmt.all(templateStepId) as TemplateTaskRow[];
}

function loadTemplate(db: Database.Database, row: TemplateRow): WorkflowTemplate {
  const stepRows = db
    .prepare(
      `
    SELECT id, template_id, order_index, department, group_name, title, planned_duration_days
    FROM workflow_template_steps
    WHERE template_id = ?
    ORDER BY order_index
  `
    )
    .all(row.id) as TemplateStepRow[];

  return {
    id: row.id,
    name: row.name,
    version: row.version,
    is_active: row.is_active === 1,
    created_at: row.created_date,
    steps: stepRows.map((step) => ({
      ...step,
      tasks: getTemplateStepTasks(db, step.id).map((t) => t.title),
    })),
  };
}

/**
 * Get a template by its row id
 */
export function getTemplate(
  db: Database.Database,
  id: number
): WorkflowTemplate | null {
  const row = db
    .prepare(`SELECT * FROM workflow_templates WHERE id = ?`)
    .get(id) as TemplateRow | undefined;
  return row ? loadTemplate(db, row) : null;
}

/**
 * Get the active version of a named template
 */
export function getActiveTemplate(
  db: Database.Database,
  name: string
): WorkflowTemplate {
  const row = db
    .prepare(
      `SELECT * FROM workflow_templates WHERE name = ? AND is_active = 1`
    )
    .get(name) as TemplateRow | undefined;
  if (!row) {
    throw new NotFoundError("Active workflow template", name);
  }
  return loadTemplate(db, row);
}

export function hasActiveTemplate(db: Database.Database, name: string): boolean {
  return (
    db
      .prepare(`SELECT 1 FROM workflow_templates WHERE name = ? AND is_active = 1`)
      .get(name) !== undefined
  );
}

/**
 * Get a specific published version
 */
export function getTemplateVersion(
  db: Database.Database,
  name: string,
  version: number
): WorkflowTemplate {
  const row = db
    .prepare(`SELECT * FROM workflow_templates WHERE name = ? AND version = ?`)
    .get(name, version) as TemplateRow | undefined;
  if (!row) {
    throw new NotFoundError("Workflow template", `${name} v${version}`);
  }
  return loadTemplate(db, row);
}

/**
 * List every version of a template, newest first
 */
export function listTemplateVersions(
  db: Database.Database,
  name: string
): WorkflowTemplate[] {
  const rows = db
    .prepare(
      `SELECT * FROM workflow_templates WHERE name = ? ORDER BY version DESC`
    )
    .all(name) as TemplateRow[];
  return rows.map((row) => loadTemplate(db, row));
}

/**
 * Publish a new immutable version and make it the active one
 */
export function publishNewVersion(
  db: Database.Database,
  name: string,
  steps: TemplateStepInput[],
  options: PublishOptions = {}
): WorkflowTemplate {
  const templateName = name.trim();
  if (templateName === "") {
    throw new ValidationError("Template name is required");
  }
  validateTemplateSteps(steps);

  const now = options.now ?? systemClock;
  const ordered = [...steps].sort((a, b) => a.order_index - b.order_index);

  const publish = db.transaction((): number => {
    const previous = db
      .prepare(
        `SELECT * FROM workflow_templates WHERE name = ? AND is_active = 1`
      )
      .get(templateName) as TemplateRow | undefined;

    const { max_version } = db
      .prepare(
        `SELECT COALESCE(MAX(version), 0) as max_version FROM workflow_templates WHERE name = ?`
      )
      .get(templateName) as { max_version: number };

    // Deactivate first: at most one active row per name is enforced by index
    db.prepare(
      `UPDATE workflow_templates SET is_active = 0 WHERE name = ? AND is_active = 1`
    ).run(templateName);

    const inserted = db
      .prepare(
        `
      INSERT INTO workflow_templates (name, version, is_active, created_date)
      VALUES (?, ?, 1, ?)
    `
      )
      .run(templateName, max_version + 1, toTimestamp(now()));
    const templateId = Number(inserted.lastInsertRowid);

    const insertStep = db.prepare(`
      INSERT INTO workflow_template_steps
        (template_id, order_index, department, group_name, title, planned_duration_days)
      VALUES (@template_id, @order_index, @department, @group_name, @title, @planned_duration_days)
    `);
    const insertTask = db.prepare(`
      INSERT INTO workflow_step_tasks (template_step_id, order_index, title)
      VALUES (?, ?, ?)
    `);
    const previousStepId = db.prepare(`
      SELECT id FROM workflow_template_steps WHERE template_id = ? AND order_index = ?
    `);

    for (const step of ordered) {
      const result = insertStep.run({
        template_id: templateId,
        order_index: step.order_index,
        department: step.department.trim(),
        group_name: step.group_name?.trim() ?? "",
        title: step.title.trim(),
        planned_duration_days: step.planned_duration_days,
      });
      const stepId = Number(result.lastInsertRowid);

      let tasks = step.tasks;
      if (tasks === undefined && previous) {
        const match = previousStepId.get(previous.id, step.order_index) as
          | { id: number }
          | undefined;
        tasks = match
          ? getTemplateStepTasks(db, match.id).map((t) => t.title)
          : [];
      }
      (tasks ?? []).forEach((title, i) => {
        insertTask.run(stepId, i, title.trim());
      });
    }

    return templateId;
  });

  const templateId = publish.immediate();
  const template = getTemplate(db, templateId);
  if (!template) {
    throw new Error(`Failed to publish template ${templateName}`);
  }
  return template;
}
