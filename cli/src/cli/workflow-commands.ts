/**
 * CLI handlers for project workflow commands
 */

import chalk from "chalk";
import Table from "cli-table3";
import type { ProjectStepState } from "@draftline/types";
import { requireProjectByJobNumber } from "../operations/projects.js";
import {
  addStepTask,
  listStepTasks,
  setStepTaskChecked,
} from "../operations/project-workflow.js";
import {
  createCoordinator,
  failCommand,
  parseIndex,
  type CommandContext,
} from "./context.js";

function stamp(flag: boolean, ts: string | null): string {
  if (!ts) return "";
  return flag ? chalk.green(ts) : chalk.gray(`${ts} (cleared)`);
}

function actor(name: string | null, ts: string | null): string {
  return name ? `${name}\n${chalk.gray(ts ?? "")}` : "";
}

// ============================================================================
// Workflow Show
// ============================================================================

export async function handleWorkflowShow(
  ctx: CommandContext,
  jobNumber: string
): Promise<void> {
  try {
    const project = requireProjectByJobNumber(ctx.db, jobNumber);
    const workflow = createCoordinator(ctx).getProjectWorkflow(project.id);
    const steps = workflow.steps.map((step) => ({
      ...step,
      tasks: listStepTasks(ctx.db, step.id),
    }));

    if (ctx.jsonOutput) {
      console.log(JSON.stringify({ ...workflow, steps }, null, 2));
      return;
    }

    console.log(
      chalk.bold(`\n${project.job_number}`),
      chalk.gray(
        `template v${workflow.template_version}, due ${project.due_date ?? "not set"}`
      )
    );

    const table = new Table({
      head: [
        chalk.cyan("#"),
        chalk.cyan("Department"),
        chalk.cyan("Title"),
        chalk.cyan("Due"),
        chalk.cyan("Started"),
        chalk.cyan("Completed"),
        chalk.cyan("Transfer To"),
        chalk.cyan("Received From"),
        chalk.cyan("Days"),
        chalk.cyan("Tasks"),
      ],
      wordWrap: true,
    });

    for (const step of steps) {
      const done = step.tasks.filter((t) => t.is_checked).length;
      table.push([
        step.order_index,
        step.department,
        step.title,
        step.planned_due_date ?? "",
        stamp(step.start_flag, step.start_ts),
        stamp(step.completed_flag, step.completed_ts),
        actor(step.transfer_to_name, step.transfer_to_ts),
        actor(step.received_from_name, step.received_from_ts),
        step.actual_duration_days ?? "",
        step.tasks.length > 0 ? `${done}/${step.tasks.length}` : "",
      ]);
    }

    console.log(table.toString());
  } catch (error) {
    failCommand("show workflow", error);
  }
}

// ============================================================================
// Workflow Start / Complete
// ============================================================================

export interface WorkflowFlagOptions {
  undo?: boolean;
}

function printStep(ctx: CommandContext, step: ProjectStepState | undefined, verb: string): void {
  if (!step) return;
  if (ctx.jsonOutput) {
    console.log(JSON.stringify(step, null, 2));
    return;
  }
  console.log(chalk.green(`✓ ${verb}`), chalk.cyan(`${step.order_index} ${step.title}`));
  if (step.planned_due_date) {
    console.log(chalk.gray(`  Due ${step.planned_due_date}`));
  }
}

export async function handleWorkflowFlag(
  ctx: CommandContext,
  kind: "start" | "complete",
  jobNumber: string,
  stepIndex: string,
  options: WorkflowFlagOptions
): Promise<void> {
  try {
    const project = requireProjectByJobNumber(ctx.db, jobNumber);
    const orderIndex = parseIndex(stepIndex, "Step");
    const value = !options.undo;
    const workflow = createCoordinator(ctx).onStepEvent(project.id, orderIndex, {
      kind,
      value,
    });

    const verb =
      kind === "start"
        ? value
          ? "Started"
          : "Unmarked start of"
        : value
          ? "Completed"
          : "Unmarked completion of";
    printStep(
      ctx,
      workflow.steps.find((s) => s.order_index === orderIndex),
      verb
    );
  } catch (error) {
    failCommand(`${kind} step`, error);
  }
}

// ============================================================================
// Workflow Transfer / Receive
// ============================================================================

export async function handleWorkflowActor(
  ctx: CommandContext,
  kind: "transfer" | "receive",
  jobNumber: string,
  stepIndex: string,
  person: string
): Promise<void> {
  try {
    const project = requireProjectByJobNumber(ctx.db, jobNumber);
    const orderIndex = parseIndex(stepIndex, "Step");
    const workflow = createCoordinator(ctx).onStepEvent(project.id, orderIndex, {
      kind,
      actor: person,
    });

    printStep(
      ctx,
      workflow.steps.find((s) => s.order_index === orderIndex),
      kind === "transfer" ? `Transferred to ${person.trim()}:` : `Received from ${person.trim()}:`
    );
  } catch (error) {
    failCommand(`${kind} step`, error);
  }
}

// ============================================================================
// Workflow Tasks
// ============================================================================

export async function handleWorkflowTask(
  ctx: CommandContext,
  jobNumber: string,
  stepIndex: string,
  title: string
): Promise<void> {
  try {
    const project = requireProjectByJobNumber(ctx.db, jobNumber);
    const task = addStepTask(ctx.db, project.id, parseIndex(stepIndex, "Step"), title);

    if (ctx.jsonOutput) {
      console.log(JSON.stringify(task, null, 2));
      return;
    }

    console.log(chalk.green("✓ Added task"), chalk.cyan(`#${task.id}`), task.title);
  } catch (error) {
    failCommand("add task", error);
  }
}

export interface WorkflowCheckOptions {
  undo?: boolean;
}

export async function handleWorkflowCheck(
  ctx: CommandContext,
  taskId: string,
  options: WorkflowCheckOptions
): Promise<void> {
  try {
    const task = setStepTaskChecked(
      ctx.db,
      parseIndex(taskId, "Task id"),
      !options.undo,
      ctx.now
    );

    if (ctx.jsonOutput) {
      console.log(JSON.stringify(task, null, 2));
      return;
    }

    console.log(
      task.is_checked ? chalk.green("✓ Checked") : chalk.yellow("○ Unchecked"),
      task.title
    );
  } catch (error) {
    failCommand("update task", error);
  }
}
