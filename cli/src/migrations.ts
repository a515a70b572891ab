/**
 * Database migration utilities for draftline
 */

import type Database from "better-sqlite3";

export interface Migration {
  version: number;
  name: string;
  up: (db: Database.Database) => void;
  down?: (db: Database.Database) => void;
}

function hasColumn(
  db: Database.Database,
  table: string,
  column: string
): boolean {
  const columns = db.prepare(`PRAGMA table_info(${table})`).all() as {
    name: string;
  }[];
  return columns.some((c) => c.name === column);
}

/**
 * All migrations in order
 */
const MIGRATIONS: Migration[] = [
  {
    // Databases written by the desktop tool read durations live from the
    // template; project steps now carry their own copy.
    version: 1,
    name: "snapshot-step-durations",
    up: (db) => {
      if (!hasColumn(db, "project_workflow_steps", "planned_duration_days")) {
        db.exec(
          "ALTER TABLE project_workflow_steps ADD COLUMN planned_duration_days REAL NOT NULL DEFAULT 0"
        );
      }
      db.exec(`
        UPDATE project_workflow_steps
        SET planned_duration_days = COALESCE((
          SELECT w.planned_duration_days
          FROM workflow_template_steps w
          WHERE w.id = project_workflow_steps.template_step_id
        ), planned_duration_days)
        WHERE template_step_id IS NOT NULL
      `);
    },
  },
  {
    version: 2,
    name: "backfill-instance-headers",
    up: (db) => {
      db.exec(`
        INSERT OR IGNORE INTO project_workflow_instances (project_id, template_id, template_version, seeded_at)
        SELECT s.project_id, s.template_id, COALESCE(t.version, 1), COALESCE(t.created_date, datetime('now', 'localtime'))
        FROM project_workflow_steps s
        LEFT JOIN workflow_templates t ON t.id = s.template_id
        GROUP BY s.project_id
      `);
    },
  },
  {
    version: 3,
    name: "add-stage-notes",
    up: (db) => {
      if (!hasColumn(db, "print_package_workflow", "notes")) {
        db.exec("ALTER TABLE print_package_workflow ADD COLUMN notes TEXT");
      }
    },
  },
];

/**
 * Get the current migration version from the database
 */
export function getCurrentMigrationVersion(db: Database.Database): number {
  // Create migrations table if it doesn't exist
  db.exec(`
    CREATE TABLE IF NOT EXISTS migrations (
      version INTEGER PRIMARY KEY,
      name TEXT NOT NULL,
      applied_at DATETIME NOT NULL DEFAULT CURRENT_TIMESTAMP
    )
  `);

  const stmt = db.prepare("SELECT MAX(version) as version FROM migrations");
  const result = stmt.get() as { version: number | null };
  return result.version ?? 0;
}

/**
 * Record a migration as applied
 */
export function recordMigration(
  db: Database.Database,
  migration: Migration
): void {
  const stmt = db.prepare(`
    INSERT OR REPLACE INTO migrations (version, name)
    VALUES (?, ?)
  `);
  stmt.run(migration.version, migration.name);
}

/**
 * Run all pending migrations
 */
export function runMigrations(
  db: Database.Database,
  options: { quiet?: boolean } = {}
): number {
  const currentVersion = getCurrentMigrationVersion(db);

  const pendingMigrations = MIGRATIONS.filter(
    (m) => m.version > currentVersion
  );

  if (pendingMigrations.length === 0) {
    return 0;
  }

  const log: (message: string) => void = options.quiet ? () => {} : console.log;
  log(`Running ${pendingMigrations.length} pending migration(s)...`);

  for (const migration of pendingMigrations) {
    log(`  Applying migration ${migration.version}: ${migration.name}`);
    try {
      db.transaction(() => {
        migration.up(db);
        recordMigration(db, migration);
      })();
      log(`  ✓ Migration ${migration.version} applied successfully`);
    } catch (error) {
      console.error(`  ✗ Migration ${migration.version} failed:`, error);
      throw error;
    }
  }

  return pendingMigrations.length;
}
