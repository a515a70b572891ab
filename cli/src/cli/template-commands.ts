/**
 * CLI handlers for workflow template commands
 */

import chalk from "chalk";
import Table from "cli-table3";
import type { WorkflowTemplate } from "@draftline/types";
import {
  getActiveTemplate,
  getTemplateVersion,
  listTemplateVersions,
} from "../operations/templates.js";
import { readTemplateFile } from "../template-file.js";
import { createCoordinator, failCommand, parseIndex, type CommandContext } from "./context.js";

// ============================================================================
// Template Publish
// ============================================================================

export interface TemplatePublishOptions {
  name?: string;
}

export async function handleTemplatePublish(
  ctx: CommandContext,
  file: string,
  options: TemplatePublishOptions
): Promise<void> {
  try {
    const definition = readTemplateFile(file);
    const name = options.name ?? definition.name ?? ctx.config.templateName;
    const template = createCoordinator(ctx).publishTemplate(definition.steps, name);

    if (ctx.jsonOutput) {
      console.log(JSON.stringify(template, null, 2));
      return;
    }

    console.log(
      chalk.green("✓ Published template"),
      chalk.cyan(`${template.name} v${template.version}`),
      chalk.gray(`(${template.steps.length} steps)`)
    );
  } catch (error) {
    failCommand("publish template", error);
  }
}

// ============================================================================
// Template Show
// ============================================================================

export interface TemplateShowOptions {
  templateVersion?: string;
}

function printTemplate(template: WorkflowTemplate): void {
  console.log(
    chalk.bold(`\n${template.name} v${template.version}`),
    template.is_active ? chalk.green("(active)") : chalk.gray("(superseded)")
  );
  console.log(chalk.gray(`Published ${template.created_at}`));

  const table = new Table({
    head: [
      chalk.cyan("#"),
      chalk.cyan("Department"),
      chalk.cyan("Group"),
      chalk.cyan("Title"),
      chalk.cyan("Days"),
      chalk.cyan("Tasks"),
    ],
    wordWrap: true,
  });
  for (const step of template.steps) {
    table.push([
      step.order_index,
      step.department,
      step.group_name,
      step.title,
      step.planned_duration_days,
      step.tasks.join("\n"),
    ]);
  }
  console.log(table.toString());
}

export async function handleTemplateShow(
  ctx: CommandContext,
  name: string | undefined,
  options: TemplateShowOptions
): Promise<void> {
  try {
    const templateName = name ?? ctx.config.templateName;
    const template =
      options.templateVersion !== undefined
        ? getTemplateVersion(
            ctx.db,
            templateName,
            parseIndex(options.templateVersion, "Version")
          )
        : getActiveTemplate(ctx.db, templateName);

    if (ctx.jsonOutput) {
      console.log(JSON.stringify(template, null, 2));
      return;
    }

    printTemplate(template);
  } catch (error) {
    failCommand("show template", error);
  }
}

// ============================================================================
// Template Versions
// ============================================================================

export async function handleTemplateVersions(
  ctx: CommandContext,
  name: string | undefined
): Promise<void> {
  try {
    const templateName = name ?? ctx.config.templateName;
    const versions = listTemplateVersions(ctx.db, templateName);

    if (ctx.jsonOutput) {
      console.log(JSON.stringify(versions, null, 2));
      return;
    }

    if (versions.length === 0) {
      console.log(chalk.yellow(`No versions of template ${templateName}`));
      return;
    }

    const table = new Table({
      head: [
        chalk.cyan("Version"),
        chalk.cyan("Status"),
        chalk.cyan("Steps"),
        chalk.cyan("Published"),
      ],
    });
    for (const template of versions) {
      table.push([
        template.version,
        template.is_active ? chalk.green("active") : chalk.gray("superseded"),
        template.steps.length,
        template.created_at,
      ]);
    }

    console.log(table.toString());
    console.log(chalk.gray(`\nTotal: ${versions.length} version(s)`));
  } catch (error) {
    failCommand("list template versions", error);
  }
}
