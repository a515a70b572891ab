/**
 * State shared by every command handler
 */

import chalk from "chalk";
import type Database from "better-sqlite3";
import type { Config, RelocationFailure } from "@draftline/types";
import type { Clock } from "../clock.js";
import { errorMessage, ValidationError } from "../errors.js";
import { WorkflowCoordinator } from "../orchestration.js";
import { SqliteProjectRecords } from "../operations/projects.js";
import { SqlitePersonDirectory } from "../operations/people.js";
import { FsFileRelocator, type FileRelocator } from "../relocation.js";

export interface CommandContext {
  db: Database.Database;
  configDir: string;
  config: Config;
  jsonOutput: boolean;
  relocator?: FileRelocator;
  now?: Clock;
}

export function createCoordinator(ctx: CommandContext): WorkflowCoordinator {
  return new WorkflowCoordinator(ctx.db, {
    dueDates: new SqliteProjectRecords(ctx.db),
    people: new SqlitePersonDirectory(ctx.db, ctx.config.productionActor),
    relocator: ctx.relocator ?? new FsFileRelocator(),
    templateName: ctx.config.templateName,
    printPackageRoot: ctx.config.printPackageRoot,
    now: ctx.now,
  });
}

/**
 * Print a failure and exit with status 1
 */
export function failCommand(action: string, error: unknown): void {
  console.error(chalk.red(`✗ Failed to ${action}`));
  console.error(errorMessage(error));
  process.exit(1);
}

export function printRelocationFailures(failures: RelocationFailure[]): void {
  if (failures.length === 0) return;
  console.log(
    chalk.yellow(`\n⚠ ${failures.length} file(s) could not be copied:`)
  );
  for (const failure of failures) {
    console.log(chalk.yellow(`  • ${failure.file_name}: ${failure.error}`));
  }
  console.log(chalk.gray("  Run 'draftline review retry <job>' once the files are available"));
}

/**
 * Parse a non-negative integer argument such as a step or stage index
 */
export function parseIndex(value: string, label: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value) || !Number.isSafeInteger(parsed)) {
    throw new ValidationError(`${label} must be a non-negative integer, got '${value}'`);
  }
  return parsed;
}
