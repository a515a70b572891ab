/**
 * Designers and engineers offered as transfer/receive actors
 */

import type Database from "better-sqlite3";
import type { PersonKind } from "@draftline/types";
import { ValidationError } from "../errors.js";

export const DEFAULT_PRODUCTION_ACTOR = "Production";

const TABLES: Record<PersonKind, string> = {
  designer: "designers",
  engineer: "engineers",
};

/**
 * Resolves the names a step may be transferred to or received from
 */
export interface PersonDirectory {
  listPeople(): string[];
}

export function isPersonKind(value: string): value is PersonKind {
  return value === "designer" || value === "engineer";
}

/**
 * Add a person; returns false if the name is already listed
 */
export function addPerson(
  db: Database.Database,
  kind: PersonKind,
  name: string
): boolean {
  const trimmed = name.trim();
  if (trimmed === "") {
    throw new ValidationError("Person name is required");
  }
  const result = db
    .prepare(`INSERT OR IGNORE INTO ${TABLES[kind]} (name) VALUES (?)`)
    .run(trimmed);
  return result.changes > 0;
}

export function removePerson(
  db: Database.Database,
  kind: PersonKind,
  name: string
): boolean {
  const result = db
    .prepare(`DELETE FROM ${TABLES[kind]} WHERE name = ?`)
    .run(name.trim());
  return result.changes > 0;
}

export function listPeopleByKind(
  db: Database.Database,
  kind: PersonKind
): string[] {
  const rows = db
    .prepare(`SELECT name FROM ${TABLES[kind]} ORDER BY name`)
    .all() as { name: string }[];
  return rows.map((r) => r.name);
}

/**
 * Union of designers and engineers plus the fixed production actor
 */
export function listPeople(
  db: Database.Database,
  productionActor: string = DEFAULT_PRODUCTION_ACTOR
): string[] {
  const names = new Set<string>([
    ...listPeopleByKind(db, "designer"),
    ...listPeopleByKind(db, "engineer"),
  ]);
  names.add(productionActor);
  return [...names].sort((a, b) => a.localeCompare(b));
}

export class SqlitePersonDirectory implements PersonDirectory {
  constructor(
    private db: Database.Database,
    private productionActor: string = DEFAULT_PRODUCTION_ACTOR
  ) {}

  listPeople(): string[] {
    return listPeople(this.db, this.productionActor);
  }
}
