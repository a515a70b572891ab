/**
 * Entry point for callers that drive workflows: the CLI, or any UI that embeds
 * the package. Each mutating call is one transaction; review advances commit
 * the stage change before files are copied.
 */

import type Database from "better-sqlite3";
import * as path from "path";
import type {
  AdvanceResult,
  DateString,
  ProjectWorkflowInstance,
  RelocationReport,
  ReviewPipelineInstance,
  ReviewSummary,
  StepEventPayload,
  TemplateStepInput,
  WorkflowTemplate,
} from "@draftline/types";
import { ValidationError } from "./errors.js";
import { systemClock, type Clock } from "./clock.js";
import type { FileRelocator } from "./relocation.js";
import type { PersonDirectory } from "./operations/people.js";
import {
  requireProjectByJobNumber,
  setProjectDueDate,
  type DueDateProvider,
} from "./operations/projects.js";
import {
  DEFAULT_TEMPLATE_NAME,
  duplicateInstance,
  getInstance,
  hasInstance,
  recomputeSchedule,
  recordEvent,
  seedInstance,
} from "./operations/project-workflow.js";
import { publishNewVersion } from "./operations/templates.js";
import {
  advanceStage,
  createReview,
  getReviewSummary,
  retryRelocation,
} from "./operations/reviews.js";
import { printPackageBasePath } from "./review-stages.js";

export interface WorkflowCoordinatorOptions {
  dueDates: DueDateProvider;
  people: PersonDirectory;
  relocator: FileRelocator;
  /** Template seeded into new projects */
  templateName?: string;
  /** Root for review folders of projects without a job directory */
  printPackageRoot?: string;
  now?: Clock;
}

export class WorkflowCoordinator {
  private readonly templateName: string;
  private readonly now: Clock;

  constructor(
    private readonly db: Database.Database,
    private readonly options: WorkflowCoordinatorOptions
  ) {
    this.templateName = options.templateName ?? DEFAULT_TEMPLATE_NAME;
    this.now = options.now ?? systemClock;
  }

  /**
   * Seed the project's workflow from the active template and schedule it
   */
  onProjectCreated(projectId: number): ProjectWorkflowInstance {
    return this.db.transaction(() => {
      seedInstance(this.db, projectId, {
        templateName: this.templateName,
        now: this.now,
      });
      this.recompute(projectId);
      return getInstance(this.db, projectId);
    }).immediate();
  }

  onProjectDuplicated(
    sourceProjectId: number,
    targetProjectId: number
  ): ProjectWorkflowInstance {
    return this.db.transaction(() => {
      duplicateInstance(this.db, sourceProjectId, targetProjectId, this.now);
      this.recompute(targetProjectId);
      return getInstance(this.db, targetProjectId);
    }).immediate();
  }

  /**
   * Record an event on one step and reschedule the project
   */
  onStepEvent(
    projectId: number,
    stepOrderIndex: number,
    event: StepEventPayload
  ): ProjectWorkflowInstance {
    if (event.kind === "transfer" || event.kind === "receive") {
      const actor = event.actor.trim();
      if (!this.options.people.listPeople().includes(actor)) {
        throw new ValidationError(`Unknown person: '${actor}'`, { actor });
      }
    }

    return this.db.transaction(() => {
      recordEvent(this.db, projectId, stepOrderIndex, event, this.now);
      this.recompute(projectId);
      return getInstance(this.db, projectId);
    }).immediate();
  }

  /**
   * Store a new project due date and reschedule. Projects without a workflow
   * only get the date.
   */
  onDueDateChanged(
    projectId: number,
    dueDate: DateString | null
  ): ProjectWorkflowInstance | null {
    return this.db.transaction(() => {
      setProjectDueDate(this.db, projectId, dueDate);
      if (!hasInstance(this.db, projectId)) {
        return null;
      }
      recomputeSchedule(this.db, projectId, dueDate);
      return getInstance(this.db, projectId);
    }).immediate();
  }

  publishTemplate(
    steps: TemplateStepInput[],
    name: string = this.templateName
  ): WorkflowTemplate {
    return publishNewVersion(this.db, name, steps, { now: this.now });
  }

  /**
   * Start a job's review in its job directory, or under the configured root
   */
  startReview(jobNumber: string, initializedBy?: string): ReviewPipelineInstance {
    const project = requireProjectByJobNumber(this.db, jobNumber);
    let basePath: string;
    if (project.job_directory) {
      basePath = printPackageBasePath(project.job_directory);
    } else if (this.options.printPackageRoot) {
      basePath = path.join(this.options.printPackageRoot, project.job_number);
    } else {
      throw new ValidationError(
        `Project ${jobNumber} has no job directory and no print package root is configured`
      );
    }

    return createReview(this.db, this.options.relocator, project.job_number, {
      basePath,
      initializedBy,
      now: this.now,
    });
  }

  onReviewAdvance(
    jobNumber: string,
    completingStageIndex: number,
    reviewerName: string,
    department: string,
    notes?: string
  ): AdvanceResult {
    return advanceStage(
      this.db,
      this.options.relocator,
      jobNumber,
      completingStageIndex,
      reviewerName,
      department,
      this.now,
      notes
    );
  }

  retryRelocation(jobNumber: string, fileNames?: string[]): RelocationReport {
    return retryRelocation(this.db, this.options.relocator, jobNumber, fileNames);
  }

  getProjectWorkflow(projectId: number): ProjectWorkflowInstance {
    return getInstance(this.db, projectId);
  }

  getReviewSummary(jobNumber: string): ReviewSummary {
    return getReviewSummary(this.db, jobNumber);
  }

  private recompute(projectId: number): void {
    recomputeSchedule(
      this.db,
      projectId,
      this.options.dueDates.getDueDate(projectId)
    );
  }
}
