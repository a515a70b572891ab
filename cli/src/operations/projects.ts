/**
 * Hosting project records: job number, customer, job directory and due date
 */

import type Database from "better-sqlite3";
import type { DateString, ProjectRecord } from "@draftline/types";
import { ConflictError, NotFoundError, ValidationError } from "../errors.js";
import { assertDateString, systemClock, toTimestamp, type Clock } from "../clock.js";

export interface CreateProjectInput {
  job_number: string;
  customer_name?: string;
  job_directory?: string;
  due_date?: DateString;
}

/**
 * Supplies the due date that anchors a project's schedule
 */
export interface DueDateProvider {
  getDueDate(projectId: number): DateString | null;
}

export function createProject(
  db: Database.Database,
  input: CreateProjectInput,
  now: Clock = systemClock
): ProjectRecord {
  const jobNumber = input.job_number.trim();
  if (jobNumber === "") {
    throw new ValidationError("Job number is required");
  }
  if (input.due_date !== undefined) {
    assertDateString(input.due_date, "due_date");
  }
  if (getProjectByJobNumber(db, jobNumber)) {
    throw new ConflictError(`Project ${jobNumber} already exists`);
  }

  const result = db
    .prepare(
      `
    INSERT INTO projects (job_number, customer_name, job_directory, due_date, created_at)
    VALUES (@job_number, @customer_name, @job_directory, @due_date, @created_at)
  `
    )
    .run({
      job_number: jobNumber,
      customer_name: input.customer_name ?? null,
      job_directory: input.job_directory ?? null,
      due_date: input.due_date ?? null,
      created_at: toTimestamp(now()),
    });

  const project = getProject(db, Number(result.lastInsertRowid));
  if (!project) throw new Error(`Failed to create project ${jobNumber}`);
  return project;
}

export function getProject(
  db: Database.Database,
  id: number
): ProjectRecord | null {
  const stmt = db.prepare(`SELECT * FROM projects WHERE id = ?`);
  return (stmt.get(id) as ProjectRecord | undefined) ?? null;
}

export function getProjectByJobNumber(
  db: Database.Database,
  jobNumber: string
): ProjectRecord | null {
  const stmt = db.prepare(`SELECT * FROM projects WHERE job_number = ?`);
  return (stmt.get(jobNumber) as ProjectRecord | undefined) ?? null;
}

/**
 * Resolve a job number, failing when the project does not exist
 */
export function requireProjectByJobNumber(
  db: Database.Database,
  jobNumber: string
): ProjectRecord {
  const project = getProjectByJobNumber(db, jobNumber);
  if (!project) {
    throw new NotFoundError("Project", jobNumber);
  }
  return project;
}

export function listProjects(db: Database.Database): ProjectRecord[] {
  const stmt = db.prepare(`SELECT * FROM projects ORDER BY job_number`);
  return stmt.all() as ProjectRecord[];
}

export function setProjectDueDate(
  db: Database.Database,
  id: number,
  dueDate: DateString | null
): ProjectRecord {
  if (dueDate !== null) {
    assertDateString(dueDate, "due_date");
  }
  const result = db
    .prepare(`UPDATE projects SET due_date = ? WHERE id = ?`)
    .run(dueDate, id);
  if (result.changes === 0) {
    throw new NotFoundError("Project", id);
  }
  const project = getProject(db, id);
  if (!project) throw new NotFoundError("Project", id);
  return project;
}

/**
 * Due dates read from the projects table
 */
export class SqliteProjectRecords implements DueDateProvider {
  constructor(private db: Database.Database) {}

  getDueDate(projectId: number): DateString | null {
    return getProject(this.db, projectId)?.due_date ?? null;
  }
}
