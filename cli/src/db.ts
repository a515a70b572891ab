/**
 * Database connection and schema setup
 */

import Database from "better-sqlite3";
import * as path from "path";
import * as fs from "fs";
import { ALL_INDEXES, ALL_TABLES } from "./schema.js";
import { runMigrations } from "./migrations.js";

/**
 * Database configuration
 */
export interface DatabaseConfig {
  path: string;
  readOnly?: boolean;
  /** Milliseconds to wait on a lock held by another client (default: 5000) */
  busyTimeout?: number;
}

/**
 * Open the database and make sure the schema exists
 */
export function initDatabase(config: DatabaseConfig): Database.Database {
  const { path: dbPath, readOnly = false, busyTimeout = 5000 } = config;
  const inMemory = dbPath === ":memory:";

  // Ensure directory exists
  if (!inMemory && !readOnly) {
    const dir = path.dirname(dbPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  const db = new Database(dbPath, {
    readonly: readOnly,
    fileMustExist: readOnly,
    timeout: busyTimeout,
  });

  // Don't modify schema if read-only
  if (readOnly) {
    return db;
  }

  // Configure database (WAL is unavailable for in-memory databases)
  if (!inMemory) {
    db.pragma("journal_mode = WAL");
  }
  db.pragma("foreign_keys = ON");
  db.pragma("synchronous = NORMAL");
  db.pragma("temp_store = MEMORY");

  for (const table of ALL_TABLES) {
    db.exec(table);
  }
  for (const indexes of ALL_INDEXES) {
    db.exec(indexes);
  }

  runMigrations(db, { quiet: inMemory });

  return db;
}

/**
 * Get database info
 */
export function getDatabaseInfo(db: Database.Database) {
  const tables = db
    .prepare(
      `
    SELECT name
    FROM sqlite_master
    WHERE type='table' AND name NOT LIKE 'sqlite_%'
    ORDER BY name
  `
    )
    .all() as { name: string }[];

  const migration = db
    .prepare("SELECT MAX(version) as version FROM migrations")
    .get() as { version: number | null };

  return {
    tables: tables.map((t) => t.name),
    migrationVersion: migration.version ?? 0,
  };
}

/**
 * Close database connection
 */
export function closeDatabase(db: Database.Database): void {
  db.close();
}
