/**
 * Unit tests for schema migrations
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import Database from "better-sqlite3";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { closeDatabase, getDatabaseInfo, initDatabase } from "../../src/db.js";
import { runMigrations } from "../../src/migrations.js";
import { getInstance } from "../../src/operations/project-workflow.js";

/**
 * Tables as the desktop tool left them: project steps without their own
 * durations and no instance headers.
 */
const LEGACY_SCHEMA = `
CREATE TABLE projects (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    job_number TEXT NOT NULL UNIQUE,
    customer_name TEXT,
    job_directory TEXT,
    due_date TEXT,
    created_at TEXT NOT NULL
);
CREATE TABLE workflow_templates (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL,
    version INTEGER NOT NULL,
    is_active INTEGER NOT NULL DEFAULT 0,
    created_date TEXT NOT NULL
);
CREATE TABLE workflow_template_steps (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    template_id INTEGER NOT NULL,
    order_index INTEGER NOT NULL,
    department TEXT NOT NULL,
    group_name TEXT NOT NULL DEFAULT '',
    title TEXT NOT NULL,
    planned_duration_days REAL NOT NULL DEFAULT 0
);
CREATE TABLE project_workflow_steps (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    project_id INTEGER NOT NULL,
    template_id INTEGER NOT NULL,
    template_step_id INTEGER,
    order_index INTEGER NOT NULL,
    department TEXT NOT NULL,
    group_name TEXT NOT NULL DEFAULT '',
    title TEXT NOT NULL,
    start_flag INTEGER NOT NULL DEFAULT 0,
    start_ts TEXT,
    completed_flag INTEGER NOT NULL DEFAULT 0,
    completed_ts TEXT,
    transfer_to_name TEXT,
    transfer_to_ts TEXT,
    received_from_name TEXT,
    received_from_ts TEXT,
    planned_due_date TEXT,
    actual_duration_days INTEGER
);
INSERT INTO projects (id, job_number, created_at) VALUES (1, 'J-0900', '2025-06-01 08:00:00');
INSERT INTO workflow_templates (id, name, version, is_active, created_date)
  VALUES (1, 'Standard', 1, 1, '2025-05-01 08:00:00');
INSERT INTO workflow_template_steps (id, template_id, order_index, department, title, planned_duration_days)
  VALUES (1, 1, 0, 'Engineering', 'Selections', 2), (2, 1, 1, 'Drafting', 'Drawings', 4);
INSERT INTO project_workflow_steps (project_id, template_id, template_step_id, order_index, department, title)
  VALUES (1, 1, 1, 0, 'Engineering', 'Selections'), (1, 1, 2, 1, 'Drafting', 'Drawings');
`;

describe("Migrations", () => {
  let tempDir: string;
  let dbPath: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "draftline-test-"));
    dbPath = path.join(tempDir, "draftline.db");
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("should record every migration on a new database", () => {
    const db = initDatabase({ path: ":memory:" });
    expect(getDatabaseInfo(db).migrationVersion).toBe(3);
    expect(runMigrations(db)).toBe(0);
  });

  it("should upgrade a database written by the desktop tool", () => {
    const legacy = new Database(dbPath);
    legacy.exec(LEGACY_SCHEMA);
    legacy.close();

    const db = initDatabase({ path: dbPath });
    try {
      const instance = getInstance(db, 1);
      expect(instance.template_version).toBe(1);
      expect(instance.seeded_at).toBe("2025-05-01 08:00:00");
      expect(instance.steps.map((s) => s.planned_duration_days)).toEqual([2, 4]);
      expect(getDatabaseInfo(db).migrationVersion).toBe(3);
      expect(console.log).toHaveBeenCalledWith(
        "  Applying migration 1: snapshot-step-durations"
      );
    } finally {
      closeDatabase(db);
    }
  });

  it("should add a notes column to review stages that lack one", () => {
    const legacy = new Database(dbPath);
    legacy.exec(`
      CREATE TABLE print_package_workflow (
          review_id TEXT NOT NULL,
          job_number TEXT NOT NULL,
          stage_index INTEGER NOT NULL,
          stage_name TEXT NOT NULL,
          department TEXT NOT NULL,
          status TEXT NOT NULL DEFAULT 'not_started',
          reviewer TEXT,
          timestamp TEXT,
          started_date TEXT,
          completed_date TEXT,
          PRIMARY KEY (review_id, stage_index)
      );
    `);
    legacy.close();

    const db = initDatabase({ path: dbPath });
    try {
      const columns = db.prepare(`PRAGMA table_info(print_package_workflow)`).all() as {
        name: string;
      }[];
      expect(columns.map((c) => c.name)).toContain("notes");
      expect(console.log).toHaveBeenCalledWith("  Applying migration 3: add-stage-notes");
    } finally {
      closeDatabase(db);
    }
  });

  it("should not rerun applied migrations", () => {
    closeDatabase(initDatabase({ path: dbPath }));
    const db = initDatabase({ path: dbPath });
    try {
      expect(runMigrations(db)).toBe(0);
    } finally {
      closeDatabase(db);
    }
  });
});
