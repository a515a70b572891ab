/**
 * CLI handlers for project commands
 */

import chalk from "chalk";
import Table from "cli-table3";
import {
  createProject,
  getProjectByJobNumber,
  listProjects,
  requireProjectByJobNumber,
} from "../operations/projects.js";
import { hasActiveTemplate } from "../operations/templates.js";
import { createCoordinator, failCommand, type CommandContext } from "./context.js";

// ============================================================================
// Project Add
// ============================================================================

export interface ProjectAddOptions {
  customer?: string;
  jobDir?: string;
  due?: string;
}

export async function handleProjectAdd(
  ctx: CommandContext,
  jobNumber: string,
  options: ProjectAddOptions
): Promise<void> {
  try {
    const seeded = hasActiveTemplate(ctx.db, ctx.config.templateName);
    const result = ctx.db.transaction(() => {
      const project = createProject(
        ctx.db,
        {
          job_number: jobNumber,
          customer_name: options.customer,
          job_directory: options.jobDir,
          due_date: options.due,
        },
        ctx.now
      );
      const workflow = seeded
        ? createCoordinator(ctx).onProjectCreated(project.id)
        : null;
      return { project, workflow };
    }).immediate();

    if (ctx.jsonOutput) {
      console.log(JSON.stringify(result, null, 2));
      return;
    }

    console.log(chalk.green("✓ Added project"), chalk.cyan(result.project.job_number));
    if (result.workflow) {
      console.log(
        chalk.gray(
          `  Workflow seeded from ${ctx.config.templateName} v${result.workflow.template_version} (${result.workflow.steps.length} steps)`
        )
      );
    } else {
      console.log(
        chalk.yellow(
          `  No active ${ctx.config.templateName} template; workflow not seeded`
        )
      );
    }
  } catch (error) {
    failCommand("add project", error);
  }
}

// ============================================================================
// Project List
// ============================================================================

export async function handleProjectList(ctx: CommandContext): Promise<void> {
  try {
    const projects = listProjects(ctx.db);

    if (ctx.jsonOutput) {
      console.log(JSON.stringify(projects, null, 2));
      return;
    }

    if (projects.length === 0) {
      console.log(chalk.yellow("No projects found"));
      return;
    }

    const table = new Table({
      head: [
        chalk.cyan("Job"),
        chalk.cyan("Customer"),
        chalk.cyan("Due"),
        chalk.cyan("Directory"),
      ],
      wordWrap: true,
    });
    for (const project of projects) {
      table.push([
        project.job_number,
        project.customer_name ?? "",
        project.due_date ?? chalk.gray("none"),
        project.job_directory ?? "",
      ]);
    }

    console.log(table.toString());
    console.log(chalk.gray(`\nTotal: ${projects.length} project(s)`));
  } catch (error) {
    failCommand("list projects", error);
  }
}

// ============================================================================
// Project Due
// ============================================================================

export async function handleProjectDue(
  ctx: CommandContext,
  jobNumber: string,
  dueDate: string
): Promise<void> {
  try {
    const project = requireProjectByJobNumber(ctx.db, jobNumber);
    const due = dueDate === "none" ? null : dueDate;
    const workflow = createCoordinator(ctx).onDueDateChanged(project.id, due);

    if (ctx.jsonOutput) {
      console.log(JSON.stringify({ job_number: project.job_number, due_date: due, workflow }, null, 2));
      return;
    }

    console.log(
      chalk.green("✓ Due date of"),
      chalk.cyan(project.job_number),
      chalk.green("set to"),
      due ?? chalk.gray("none")
    );
  } catch (error) {
    failCommand("set due date", error);
  }
}

// ============================================================================
// Project Duplicate
// ============================================================================

/**
 * Copy a project's workflow shape to another job, creating that job if needed
 */
export async function handleProjectDuplicate(
  ctx: CommandContext,
  sourceJob: string,
  targetJob: string
): Promise<void> {
  try {
    const source = requireProjectByJobNumber(ctx.db, sourceJob);
    const workflow = ctx.db.transaction(() => {
      const target =
        getProjectByJobNumber(ctx.db, targetJob) ??
        createProject(
          ctx.db,
          {
            job_number: targetJob,
            customer_name: source.customer_name ?? undefined,
          },
          ctx.now
        );
      return createCoordinator(ctx).onProjectDuplicated(source.id, target.id);
    }).immediate();

    if (ctx.jsonOutput) {
      console.log(JSON.stringify(workflow, null, 2));
      return;
    }

    console.log(
      chalk.green("✓ Duplicated workflow of"),
      chalk.cyan(source.job_number),
      chalk.green("to"),
      chalk.cyan(targetJob)
    );
  } catch (error) {
    failCommand("duplicate project", error);
  }
}
