/**
 * Reading template definitions from JSON files
 */

import * as fs from "fs";
import { fileURLToPath } from "url";
import type { TemplateStepInput } from "@draftline/types";
import { ValidationError, errorMessage } from "./errors.js";

export interface TemplateFile {
  name?: string;
  steps: TemplateStepInput[];
}

/** Template shipped with the package and published by `draftline init` */
export const STANDARD_TEMPLATE_PATH = fileURLToPath(
  new URL("../templates/standard.json", import.meta.url)
);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseStep(value: unknown, position: number): TemplateStepInput {
  const label = `steps[${position}]`;
  if (!isRecord(value)) {
    throw new ValidationError(`${label} must be an object`);
  }
  const { order_index, department, group_name, title, planned_duration_days, tasks } =
    value;

  if (typeof order_index !== "number") {
    throw new ValidationError(`${label}.order_index must be a number`);
  }
  if (typeof department !== "string") {
    throw new ValidationError(`${label}.department must be a string`);
  }
  if (typeof title !== "string") {
    throw new ValidationError(`${label}.title must be a string`);
  }
  if (typeof planned_duration_days !== "number") {
    throw new ValidationError(`${label}.planned_duration_days must be a number`);
  }
  if (group_name !== undefined && typeof group_name !== "string") {
    throw new ValidationError(`${label}.group_name must be a string`);
  }

  let taskTitles: string[] | undefined;
  if (tasks !== undefined) {
    if (!Array.isArray(tasks)) {
      throw new ValidationError(`${label}.tasks must be an array of strings`);
    }
    taskTitles = tasks.map((task: unknown, i) => {
      if (typeof task !== "string") {
        throw new ValidationError(`${label}.tasks[${i}] must be a string`);
      }
      return task;
    });
  }

  return {
    order_index,
    department,
    group_name,
    title,
    planned_duration_days,
    tasks: taskTitles,
  };
}

/**
 * Parse a template document: either `{ name?, steps: [...] }` or a bare step array
 */
export function parseTemplateFile(content: string): TemplateFile {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new ValidationError(
      `Template file is not valid JSON: ${errorMessage(error)}`
    );
  }

  if (Array.isArray(parsed)) {
    return { steps: parsed.map(parseStep) };
  }
  if (!isRecord(parsed)) {
    throw new ValidationError("Template file must contain a 'steps' array");
  }
  const { name, steps } = parsed;
  if (!Array.isArray(steps)) {
    throw new ValidationError("Template file must contain a 'steps' array");
  }
  if (name !== undefined && typeof name !== "string") {
    throw new ValidationError("Template 'name' must be a string");
  }
  return { name, steps: steps.map(parseStep) };
}

export function readTemplateFile(filePath: string): TemplateFile {
  return parseTemplateFile(fs.readFileSync(filePath, "utf8"));
}
