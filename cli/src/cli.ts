#!/usr/bin/env node

/**
 * draftline command-line entry point
 */

import { Command } from "commander";
import { databasePath, findConfigDir, readConfig } from "./config.js";
import { closeDatabase, initDatabase } from "./db.js";
import { failCommand, type CommandContext } from "./cli/context.js";
import { handleInit } from "./cli/init-commands.js";
import {
  handleTemplatePublish,
  handleTemplateShow,
  handleTemplateVersions,
  type TemplatePublishOptions,
  type TemplateShowOptions,
} from "./cli/template-commands.js";
import {
  handleProjectAdd,
  handleProjectDue,
  handleProjectDuplicate,
  handleProjectList,
  type ProjectAddOptions,
} from "./cli/project-commands.js";
import {
  handleWorkflowActor,
  handleWorkflowCheck,
  handleWorkflowFlag,
  handleWorkflowShow,
  handleWorkflowTask,
  type WorkflowCheckOptions,
  type WorkflowFlagOptions,
} from "./cli/workflow-commands.js";
import {
  handlePeopleAdd,
  handlePeopleList,
  handlePeopleRemove,
} from "./cli/people-commands.js";
import {
  handleReviewAdvance,
  handleReviewAttach,
  handleReviewCreate,
  handleReviewPending,
  handleReviewRetry,
  handleReviewShow,
  type ReviewAdvanceOptions,
  type ReviewCreateOptions,
  type ReviewPendingOptions,
} from "./cli/review-commands.js";

interface GlobalOptions {
  dir?: string;
  json?: boolean;
}

const program = new Command();

program
  .name("draftline")
  .description("Drafting workflow templates, schedules and print package reviews")
  .version("0.1.0")
  .option("--dir <path>", "Path to the .draftline directory")
  .option("--json", "Output machine-readable JSON");

function globals(): GlobalOptions {
  return program.opts<GlobalOptions>();
}

/**
 * Open the database for one command and close it afterwards
 */
async function withContext(
  run: (ctx: CommandContext) => Promise<void>
): Promise<void> {
  const opts = globals();
  let ctx: CommandContext;
  try {
    const configDir = findConfigDir(opts.dir);
    const config = readConfig(configDir);
    const db = initDatabase({ path: databasePath(configDir, config) });
    ctx = { db, configDir, config, jsonOutput: opts.json ?? false };
  } catch (error) {
    failCommand("open the .draftline directory", error);
    return;
  }
  try {
    await run(ctx);
  } finally {
    closeDatabase(ctx.db);
  }
}

program
  .command("init")
  .description("Create the .draftline directory, database and Standard template")
  .option("--template <file>", "Template file to publish instead of the bundled one")
  .action(async (options: { template?: string }) => {
    const opts = globals();
    await handleInit({
      configDir: findConfigDir(opts.dir),
      jsonOutput: opts.json ?? false,
      templateFile: options.template,
    });
  });

// Templates
const template = program.command("template").description("Manage workflow templates");

template
  .command("publish <file>")
  .description("Publish a new template version from a JSON file")
  .option("--name <name>", "Template name")
  .action(async (file: string, options: TemplatePublishOptions) => {
    await withContext((ctx) => handleTemplatePublish(ctx, file, options));
  });

template
  .command("show [name]")
  .description("Show the active (or a given) template version")
  .option("--template-version <n>", "Version number")
  .action(async (name: string | undefined, options: TemplateShowOptions) => {
    await withContext((ctx) => handleTemplateShow(ctx, name, options));
  });

template
  .command("versions [name]")
  .description("List published versions of a template")
  .action(async (name: string | undefined) => {
    await withContext((ctx) => handleTemplateVersions(ctx, name));
  });

// Projects
const project = program.command("project").description("Manage projects");

project
  .command("add <job>")
  .description("Add a project and seed its workflow")
  .option("--customer <name>", "Customer name")
  .option("--job-dir <path>", "Job directory")
  .option("--due <date>", "Due date (yyyy-MM-dd)")
  .action(async (job: string, options: ProjectAddOptions) => {
    await withContext((ctx) => handleProjectAdd(ctx, job, options));
  });

project
  .command("list")
  .description("List projects")
  .action(async () => {
    await withContext((ctx) => handleProjectList(ctx));
  });

project
  .command("due <job> <date>")
  .description("Set the due date (yyyy-MM-dd, or 'none') and reschedule")
  .action(async (job: string, date: string) => {
    await withContext((ctx) => handleProjectDue(ctx, job, date));
  });

project
  .command("duplicate <source> <target>")
  .description("Copy a project's workflow steps to another job")
  .action(async (source: string, target: string) => {
    await withContext((ctx) => handleProjectDuplicate(ctx, source, target));
  });

// Workflow steps
const workflow = program.command("workflow").description("Record workflow progress");

workflow
  .command("show <job>")
  .description("Show a project's workflow and schedule")
  .action(async (job: string) => {
    await withContext((ctx) => handleWorkflowShow(ctx, job));
  });

for (const kind of ["start", "complete"] as const) {
  workflow
    .command(`${kind} <job> <step>`)
    .description(`Mark a step as ${kind === "start" ? "started" : "completed"}`)
    .option("--undo", "Clear the flag (the timestamp is kept)")
    .action(async (job: string, step: string, options: WorkflowFlagOptions) => {
      await withContext((ctx) => handleWorkflowFlag(ctx, kind, job, step, options));
    });
}

for (const kind of ["transfer", "receive"] as const) {
  workflow
    .command(`${kind} <job> <step> <person>`)
    .description(kind === "transfer" ? "Transfer a step to a person" : "Receive a step from a person")
    .action(async (job: string, step: string, person: string) => {
      await withContext((ctx) => handleWorkflowActor(ctx, kind, job, step, person));
    });
}

workflow
  .command("task <job> <step> <title>")
  .description("Add a checklist task to a step")
  .action(async (job: string, step: string, title: string) => {
    await withContext((ctx) => handleWorkflowTask(ctx, job, step, title));
  });

workflow
  .command("check <taskId>")
  .description("Check off a task")
  .option("--undo", "Uncheck the task")
  .action(async (taskId: string, options: WorkflowCheckOptions) => {
    await withContext((ctx) => handleWorkflowCheck(ctx, taskId, options));
  });

// People
const people = program.command("people").description("Manage designers and engineers");

people
  .command("add <kind> <name>")
  .description("Add a designer or engineer")
  .action(async (kind: string, name: string) => {
    await withContext((ctx) => handlePeopleAdd(ctx, kind, name));
  });

people
  .command("remove <kind> <name>")
  .description("Remove a designer or engineer")
  .action(async (kind: string, name: string) => {
    await withContext((ctx) => handlePeopleRemove(ctx, kind, name));
  });

people
  .command("list")
  .description("List designers, engineers and the production actor")
  .action(async () => {
    await withContext((ctx) => handlePeopleList(ctx));
  });

// Print package reviews
const review = program.command("review").description("Print package reviews");

review
  .command("create <job>")
  .description("Start a print package review and create its stage folders")
  .option("--by <name>", "Who started the review")
  .action(async (job: string, options: ReviewCreateOptions) => {
    await withContext((ctx) => handleReviewCreate(ctx, job, options));
  });

review
  .command("attach <job> <file>")
  .description("Attach a file at the current stage")
  .action(async (job: string, file: string) => {
    await withContext((ctx) => handleReviewAttach(ctx, job, file));
  });

review
  .command("advance <job> <stage>")
  .description("Complete an in-progress stage and move its files forward")
  .requiredOption("--reviewer <name>", "Reviewer name")
  .requiredOption("--department <dept>", "Reviewer department")
  .option("--notes <text>", "Remarks to keep with the completed stage")
  .action(async (job: string, stage: string, options: ReviewAdvanceOptions) => {
    await withContext((ctx) => handleReviewAdvance(ctx, job, stage, options));
  });

review
  .command("retry <job> [files...]")
  .description("Copy files left behind by failed moves into the current stage")
  .action(async (job: string, files: string[]) => {
    await withContext((ctx) => handleReviewRetry(ctx, job, files));
  });

review
  .command("show <job>")
  .description("Show review progress")
  .action(async (job: string) => {
    await withContext((ctx) => handleReviewShow(ctx, job));
  });

review
  .command("pending")
  .description("List in-progress stages across all jobs")
  .option("--department <dept>", "Only stages owned by this department")
  .action(async (options: ReviewPendingOptions) => {
    await withContext((ctx) => handleReviewPending(ctx, options));
  });

await program.parseAsync(process.argv);
