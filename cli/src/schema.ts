/**
 * SQLite schema definition for draftline
 */

export const SCHEMA_VERSION = "1.0";

/**
 * Core table schemas
 */

export const PROJECTS_TABLE = `
CREATE TABLE IF NOT EXISTS projects (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    job_number TEXT NOT NULL UNIQUE,
    customer_name TEXT,
    job_directory TEXT,
    due_date TEXT,
    created_at TEXT NOT NULL
);
`;

export const PEOPLE_TABLES = `
CREATE TABLE IF NOT EXISTS designers (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL UNIQUE
);

CREATE TABLE IF NOT EXISTS engineers (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL UNIQUE
);
`;

export const WORKFLOW_TEMPLATES_TABLE = `
CREATE TABLE IF NOT EXISTS workflow_templates (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL,
    version INTEGER NOT NULL CHECK(version >= 1),
    is_active INTEGER NOT NULL DEFAULT 0 CHECK(is_active IN (0, 1)),
    created_date TEXT NOT NULL,
    UNIQUE (name, version)
);
`;

export const WORKFLOW_TEMPLATE_STEPS_TABLE = `
CREATE TABLE IF NOT EXISTS workflow_template_steps (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    template_id INTEGER NOT NULL,
    order_index INTEGER NOT NULL CHECK(order_index >= 0),
    department TEXT NOT NULL,
    group_name TEXT NOT NULL DEFAULT '',
    title TEXT NOT NULL,
    planned_duration_days REAL NOT NULL DEFAULT 0 CHECK(planned_duration_days >= 0),
    UNIQUE (template_id, order_index),
    FOREIGN KEY (template_id) REFERENCES workflow_templates(id)
);
`;

export const WORKFLOW_STEP_TASKS_TABLE = `
CREATE TABLE IF NOT EXISTS workflow_step_tasks (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    template_step_id INTEGER NOT NULL,
    order_index INTEGER NOT NULL,
    title TEXT NOT NULL,
    FOREIGN KEY (template_step_id) REFERENCES workflow_template_steps(id)
);
`;

export const PROJECT_WORKFLOW_INSTANCES_TABLE = `
CREATE TABLE IF NOT EXISTS project_workflow_instances (
    project_id INTEGER PRIMARY KEY,
    template_id INTEGER NOT NULL,
    template_version INTEGER NOT NULL,
    seeded_at TEXT NOT NULL,
    FOREIGN KEY (project_id) REFERENCES projects(id) ON DELETE CASCADE,
    FOREIGN KEY (template_id) REFERENCES workflow_templates(id)
);
`;

export const PROJECT_WORKFLOW_STEPS_TABLE = `
CREATE TABLE IF NOT EXISTS project_workflow_steps (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    project_id INTEGER NOT NULL,
    template_id INTEGER NOT NULL,
    template_step_id INTEGER,
    order_index INTEGER NOT NULL,
    department TEXT NOT NULL,
    group_name TEXT NOT NULL DEFAULT '',
    title TEXT NOT NULL,
    planned_duration_days REAL NOT NULL DEFAULT 0,
    start_flag INTEGER NOT NULL DEFAULT 0,
    start_ts TEXT,
    completed_flag INTEGER NOT NULL DEFAULT 0,
    completed_ts TEXT,
    transfer_to_name TEXT,
    transfer_to_ts TEXT,
    received_from_name TEXT,
    received_from_ts TEXT,
    planned_due_date TEXT,
    actual_duration_days INTEGER,
    UNIQUE (project_id, order_index),
    FOREIGN KEY (project_id) REFERENCES project_workflow_instances(project_id) ON DELETE CASCADE,
    FOREIGN KEY (template_step_id) REFERENCES workflow_template_steps(id)
);
`;

export const PROJECT_STEP_TASKS_TABLE = `
CREATE TABLE IF NOT EXISTS project_step_tasks (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    project_step_id INTEGER NOT NULL,
    template_task_id INTEGER,
    order_index INTEGER NOT NULL,
    title TEXT NOT NULL,
    is_checked INTEGER NOT NULL DEFAULT 0,
    checked_ts TEXT,
    FOREIGN KEY (project_step_id) REFERENCES project_workflow_steps(id) ON DELETE CASCADE
);
`;

export const PRINT_PACKAGE_REVIEWS_TABLE = `
CREATE TABLE IF NOT EXISTS print_package_reviews (
    review_id TEXT PRIMARY KEY,
    job_number TEXT NOT NULL UNIQUE,
    base_path TEXT NOT NULL,
    status TEXT NOT NULL DEFAULT 'in_progress' CHECK(status IN ('in_progress', 'completed')),
    current_stage INTEGER NOT NULL DEFAULT 0 CHECK(current_stage >= 0 AND current_stage <= 7),
    initialized_by TEXT,
    created_date TEXT NOT NULL,
    completed_date TEXT
);
`;

export const PRINT_PACKAGE_WORKFLOW_TABLE = `
CREATE TABLE IF NOT EXISTS print_package_workflow (
    review_id TEXT NOT NULL,
    job_number TEXT NOT NULL,
    stage_index INTEGER NOT NULL CHECK(stage_index >= 0 AND stage_index <= 7),
    stage_name TEXT NOT NULL,
    department TEXT NOT NULL,
    status TEXT NOT NULL DEFAULT 'not_started' CHECK(status IN ('not_started', 'in_progress', 'completed')),
    reviewer TEXT,
    timestamp TEXT,
    started_date TEXT,
    completed_date TEXT,
    notes TEXT,
    PRIMARY KEY (review_id, stage_index),
    FOREIGN KEY (review_id) REFERENCES print_package_reviews(review_id) ON DELETE CASCADE
);
`;

export const PRINT_PACKAGE_FILES_TABLE = `
CREATE TABLE IF NOT EXISTS print_package_files (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    review_id TEXT NOT NULL,
    job_number TEXT NOT NULL,
    file_name TEXT NOT NULL,
    path TEXT NOT NULL,
    stage_index INTEGER NOT NULL CHECK(stage_index >= 0 AND stage_index <= 7),
    created_date TEXT NOT NULL,
    UNIQUE (review_id, file_name),
    FOREIGN KEY (review_id) REFERENCES print_package_reviews(review_id) ON DELETE CASCADE
);
`;

/**
 * Index definitions
 */

export const TEMPLATE_INDEXES = `
CREATE UNIQUE INDEX IF NOT EXISTS idx_templates_one_active ON workflow_templates(name) WHERE is_active = 1;
CREATE INDEX IF NOT EXISTS idx_template_steps_template ON workflow_template_steps(template_id, order_index);
CREATE INDEX IF NOT EXISTS idx_template_tasks_step ON workflow_step_tasks(template_step_id, order_index);
`;

export const PROJECT_WORKFLOW_INDEXES = `
CREATE INDEX IF NOT EXISTS idx_project_steps_project ON project_workflow_steps(project_id, order_index);
CREATE INDEX IF NOT EXISTS idx_project_tasks_step ON project_step_tasks(project_step_id, order_index);
`;

export const PRINT_PACKAGE_INDEXES = `
CREATE INDEX IF NOT EXISTS idx_pp_workflow_job ON print_package_workflow(job_number, stage_index);
CREATE INDEX IF NOT EXISTS idx_pp_workflow_status ON print_package_workflow(status, department);
CREATE INDEX IF NOT EXISTS idx_pp_files_stage ON print_package_files(review_id, stage_index);
`;

/**
 * Combined schema initialization
 */
export const ALL_TABLES = [
  PROJECTS_TABLE,
  PEOPLE_TABLES,
  WORKFLOW_TEMPLATES_TABLE,
  WORKFLOW_TEMPLATE_STEPS_TABLE,
  WORKFLOW_STEP_TASKS_TABLE,
  PROJECT_WORKFLOW_INSTANCES_TABLE,
  PROJECT_WORKFLOW_STEPS_TABLE,
  PROJECT_STEP_TASKS_TABLE,
  PRINT_PACKAGE_REVIEWS_TABLE,
  PRINT_PACKAGE_WORKFLOW_TABLE,
  PRINT_PACKAGE_FILES_TABLE,
];

export const ALL_INDEXES = [
  TEMPLATE_INDEXES,
  PROJECT_WORKFLOW_INDEXES,
  PRINT_PACKAGE_INDEXES,
];
