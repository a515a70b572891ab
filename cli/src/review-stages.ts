/**
 * The fixed print-package review sequence
 */

import * as path from "path";

export interface ReviewStageDefinition {
  index: number;
  name: string;
  description: string;
  /** Department that owns the stage until a reviewer records their own */
  department: string;
}

export const REVIEW_STAGES: readonly ReviewStageDefinition[] = [
  {
    index: 0,
    name: "Drafting-Print Package",
    description: "Original print package (never modified)",
    department: "Drafting",
  },
  {
    index: 1,
    name: "Engineer Review",
    description: "Engineering review and markups",
    department: "Engineering",
  },
  {
    index: 2,
    name: "Engineering QC Review",
    description: "Engineering quality control review",
    department: "Engineering",
  },
  {
    index: 3,
    name: "Drafting Updates (ENG)",
    description: "Drafting implements engineering changes",
    department: "Drafting",
  },
  {
    index: 4,
    name: "Lead Designer Review",
    description: "Lead designer review",
    department: "Drafting",
  },
  {
    index: 5,
    name: "Production OPS Review",
    description: "Production operations review",
    department: "Production",
  },
  {
    index: 6,
    name: "Drafting Updates (OPS)",
    description: "Drafting implements operations changes",
    department: "Drafting",
  },
  {
    index: 7,
    name: "FINAL Print Package (Approved)",
    description: "Final approved package",
    department: "Drafting",
  },
];

export const STAGE_COUNT = REVIEW_STAGES.length;
export const FINAL_STAGE = STAGE_COUNT - 1;

export function isStageIndex(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= FINAL_STAGE;
}

/**
 * Folder name of a stage, e.g. "1-Engineer Review"
 */
export function stageFolderName(index: number): string {
  return `${index}-${REVIEW_STAGES[index].name}`;
}

export function stageFolderPath(basePath: string, index: number): string {
  return path.join(basePath, stageFolderName(index));
}

/**
 * Where a job's stage folders live when it has a job directory
 */
export function printPackageBasePath(jobDirectory: string): string {
  return path.join(jobDirectory, "4. Drafting", "PP-Print Packages");
}
