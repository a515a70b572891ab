/**
 * CLI handlers for print-package review commands
 */

import chalk from "chalk";
import * as path from "path";
import Table from "cli-table3";
import type { StageStatus } from "@draftline/types";
import {
  attachFile,
  listActiveStages,
  listStageFiles,
} from "../operations/reviews.js";
import {
  createCoordinator,
  failCommand,
  parseIndex,
  printRelocationFailures,
  type CommandContext,
} from "./context.js";

function statusLabel(status: StageStatus): string {
  switch (status) {
    case "completed":
      return chalk.green("✓ completed");
    case "in_progress":
      return chalk.yellow("● in progress");
    case "not_started":
      return chalk.gray("○ not started");
  }
}

// ============================================================================
// Review Create
// ============================================================================

export interface ReviewCreateOptions {
  by?: string;
}

export async function handleReviewCreate(
  ctx: CommandContext,
  jobNumber: string,
  options: ReviewCreateOptions
): Promise<void> {
  try {
    const review = createCoordinator(ctx).startReview(jobNumber, options.by);

    if (ctx.jsonOutput) {
      console.log(JSON.stringify(review, null, 2));
      return;
    }

    console.log(chalk.green("✓ Started print package review for"), chalk.cyan(review.job_number));
    console.log(chalk.gray(`  Folders: ${review.base_path}`));
  } catch (error) {
    failCommand("start review", error);
  }
}

// ============================================================================
// Review Attach
// ============================================================================

export async function handleReviewAttach(
  ctx: CommandContext,
  jobNumber: string,
  filePath: string
): Promise<void> {
  try {
    const file = attachFile(ctx.db, jobNumber, path.resolve(filePath), ctx.now);

    if (ctx.jsonOutput) {
      console.log(JSON.stringify(file, null, 2));
      return;
    }

    console.log(
      chalk.green("✓ Attached"),
      chalk.cyan(file.file_name),
      chalk.gray(`at stage ${file.stage_index}`)
    );
  } catch (error) {
    failCommand("attach file", error);
  }
}

// ============================================================================
// Review Advance
// ============================================================================

export interface ReviewAdvanceOptions {
  reviewer: string;
  department: string;
  notes?: string;
}

export async function handleReviewAdvance(
  ctx: CommandContext,
  jobNumber: string,
  stageIndex: string,
  options: ReviewAdvanceOptions
): Promise<void> {
  try {
    const result = createCoordinator(ctx).onReviewAdvance(
      jobNumber,
      parseIndex(stageIndex, "Stage"),
      options.reviewer,
      options.department,
      options.notes
    );

    if (ctx.jsonOutput) {
      console.log(JSON.stringify(result, null, 2));
      return;
    }

    console.log(
      chalk.green("✓ Completed"),
      chalk.cyan(`${result.completed_stage.stage_index}-${result.completed_stage.stage_name}`),
      chalk.gray(`by ${result.completed_stage.reviewer ?? ""}`)
    );
    if (result.next_stage) {
      console.log(
        chalk.gray("  Now at"),
        chalk.cyan(`${result.next_stage.stage_index}-${result.next_stage.stage_name}`)
      );
      console.log(chalk.gray(`  ${result.relocated.length} file(s) copied forward`));
    } else {
      console.log(chalk.green("  Print package approved"));
    }
    printRelocationFailures(result.failures);
  } catch (error) {
    failCommand("advance review", error);
  }
}

// ============================================================================
// Review Retry
// ============================================================================

export async function handleReviewRetry(
  ctx: CommandContext,
  jobNumber: string,
  fileNames: string[]
): Promise<void> {
  try {
    const report = createCoordinator(ctx).retryRelocation(
      jobNumber,
      fileNames.length > 0 ? fileNames : undefined
    );

    if (ctx.jsonOutput) {
      console.log(JSON.stringify(report, null, 2));
      return;
    }

    if (report.relocated.length === 0 && report.failures.length === 0) {
      console.log(chalk.yellow("No files left behind"));
      return;
    }
    for (const file of report.relocated) {
      console.log(chalk.green("✓ Copied"), chalk.cyan(file.file_name), chalk.gray(`to stage ${file.stage_index}`));
    }
    printRelocationFailures(report.failures);
  } catch (error) {
    failCommand("retry relocation", error);
  }
}

// ============================================================================
// Review Show
// ============================================================================

export async function handleReviewShow(
  ctx: CommandContext,
  jobNumber: string
): Promise<void> {
  try {
    const summary = createCoordinator(ctx).getReviewSummary(jobNumber);
    const files = listStageFiles(ctx.db, jobNumber);

    if (ctx.jsonOutput) {
      console.log(JSON.stringify({ ...summary, files }, null, 2));
      return;
    }

    const { review } = summary;
    console.log(chalk.bold(`\nPrint package review: ${review.job_number}`));
    console.log(chalk.gray("─".repeat(50)));
    console.log(chalk.cyan("Folders:"), review.base_path);
    console.log(chalk.cyan("Started:"), review.created_at, review.initialized_by ? `by ${review.initialized_by}` : "");
    console.log(
      chalk.cyan("Progress:"),
      `${summary.completed_stages}/${summary.total_stages} (${Math.round(summary.progress_percentage)}%)`
    );

    const table = new Table({
      head: [
        chalk.cyan("#"),
        chalk.cyan("Stage"),
        chalk.cyan("Department"),
        chalk.cyan("Status"),
        chalk.cyan("Reviewer"),
        chalk.cyan("Updated"),
        chalk.cyan("Files"),
      ],
      wordWrap: true,
    });
    for (const stage of review.stages) {
      const stageFiles = files.filter((f) => f.stage_index === stage.stage_index);
      table.push([
        stage.stage_index,
        stage.stage_name,
        stage.department,
        statusLabel(stage.status),
        stage.reviewer ?? "",
        stage.timestamp ?? "",
        stageFiles.map((f) => f.file_name).join("\n"),
      ]);
    }
    console.log(table.toString());

    const noted = review.stages.filter((s) => s.notes);
    if (noted.length > 0) {
      console.log(chalk.cyan("Notes:"));
      for (const stage of noted) {
        console.log(`  ${stage.stage_index}-${stage.stage_name}: ${stage.notes}`);
      }
    }
  } catch (error) {
    failCommand("show review", error);
  }
}

// ============================================================================
// Review Pending
// ============================================================================

export interface ReviewPendingOptions {
  department?: string;
}

export async function handleReviewPending(
  ctx: CommandContext,
  options: ReviewPendingOptions
): Promise<void> {
  try {
    const pending = listActiveStages(ctx.db, options.department);

    if (ctx.jsonOutput) {
      console.log(JSON.stringify(pending, null, 2));
      return;
    }

    if (pending.length === 0) {
      console.log(chalk.yellow("No pending reviews"));
      return;
    }

    const table = new Table({
      head: [
        chalk.cyan("Job"),
        chalk.cyan("Customer"),
        chalk.cyan("Stage"),
        chalk.cyan("Department"),
        chalk.cyan("Since"),
      ],
      wordWrap: true,
    });
    for (const stage of pending) {
      table.push([
        stage.job_number,
        stage.customer_name ?? "",
        `${stage.stage_index}-${stage.stage_name}`,
        stage.department,
        stage.started_at ?? "",
      ]);
    }

    console.log(table.toString());
    console.log(chalk.gray(`\nTotal: ${pending.length} pending review(s)`));
  } catch (error) {
    failCommand("list pending reviews", error);
  }
}
