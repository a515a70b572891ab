/**
 * Print-package review pipeline
 *
 * Every job runs the same eight stages, strictly in order. Completing a stage
 * starts the next one and copies the completed stage's files into the next
 * stage's folder. Copy failures are reported per file and never undo the
 * stage transition.
 */

import type Database from "better-sqlite3";
import * as path from "path";
import { v4 as uuidv4 } from "uuid";
import type {
  AdvanceResult,
  PendingStage,
  RelocationFailure,
  RelocationReport,
  ReviewPipelineInstance,
  ReviewSummary,
  StageFile,
  StageState,
} from "@draftline/types";
import {
  ConflictError,
  InvalidTransitionError,
  NotFoundError,
  RelocationError,
  ValidationError,
} from "../errors.js";
import { systemClock, toTimestamp, type Clock } from "../clock.js";
import type { FileRelocator } from "../relocation.js";
import {
  FINAL_STAGE,
  REVIEW_STAGES,
  STAGE_COUNT,
  isStageIndex,
  stageFolderPath,
} from "../review-stages.js";

interface ReviewRow {
  review_id: string;
  job_number: string;
  base_path: string;
  status: ReviewPipelineInstance["status"];
  current_stage: number;
  initialized_by: string | null;
  created_date: string;
  completed_date: string | null;
}

interface StageRow {
  stage_index: number;
  stage_name: string;
  department: string;
  status: StageState["status"];
  reviewer: string | null;
  timestamp: string | null;
  started_date: string | null;
  completed_date: string | null;
  notes: string | null;
}

interface StageFileRow extends Omit<StageFile, "created_at"> {
  created_date: string;
}

export interface CreateReviewOptions {
  /** Directory that holds the eight stage folders */
  basePath: string;
  initializedBy?: string;
  now?: Clock;
}

function rowToStage(row: StageRow): StageState {
  return {
    stage_index: row.stage_index,
    stage_name: row.stage_name,
    department: row.department,
    status: row.status,
    reviewer: row.reviewer,
    timestamp: row.timestamp,
    started_at: row.started_date,
    completed_at: row.completed_date,
    notes: row.notes,
  };
}

function rowToFile(row: StageFileRow): StageFile {
  const { created_date, ...rest } = row;
  return { ...rest, created_at: created_date };
}

function getReviewRow(
  db: Database.Database,
  jobNumber: string
): ReviewRow | undefined {
  return db
    .prepare(`SELECT * FROM print_package_reviews WHERE job_number = ?`)
    .get(jobNumber) as ReviewRow | undefined;
}

export function hasReview(db: Database.Database, jobNumber: string): boolean {
  return getReviewRow(db, jobNumber) !== undefined;
}

/**
 * Get a job's review with all eight stages
 */
export function getReview(
  db: Database.Database,
  jobNumber: string
): ReviewPipelineInstance {
  const row = getReviewRow(db, jobNumber);
  if (!row) {
    throw new NotFoundError("Print package review for job", jobNumber);
  }
  const stages = db
    .prepare(
      `SELECT * FROM print_package_workflow WHERE review_id = ? ORDER BY stage_index`
    )
    .all(row.review_id) as StageRow[];

  return {
    review_id: row.review_id,
    job_number: row.job_number,
    base_path: row.base_path,
    status: row.status,
    current_stage: row.current_stage,
    initialized_by: row.initialized_by,
    created_at: row.created_date,
    completed_at: row.completed_date,
    stages: stages.map(rowToStage),
  };
}

/**
 * Start a review: stage 0 in progress, the rest not started, all folders created
 */
export function createReview(
  db: Database.Database,
  relocator: FileRelocator,
  jobNumber: string,
  options: CreateReviewOptions
): ReviewPipelineInstance {
  const job = jobNumber.trim();
  if (job === "") {
    throw new ValidationError("Job number is required");
  }
  if (hasReview(db, job)) {
    throw new ConflictError(`Job ${job} already has a print package review`);
  }

  for (const stage of REVIEW_STAGES) {
    relocator.ensureDirectory(stageFolderPath(options.basePath, stage.index));
  }

  const stamp = toTimestamp((options.now ?? systemClock)());
  const reviewId = uuidv4();

  db.transaction(() => {
    db.prepare(
      `
      INSERT INTO print_package_reviews
        (review_id, job_number, base_path, status, current_stage, initialized_by, created_date)
      VALUES (?, ?, ?, 'in_progress', 0, ?, ?)
    `
    ).run(reviewId, job, options.basePath, options.initializedBy ?? null, stamp);

    const insertStage = db.prepare(`
      INSERT INTO print_package_workflow
        (review_id, job_number, stage_index, stage_name, department, status, timestamp, started_date)
      VALUES (@review_id, @job_number, @stage_index, @stage_name, @department, @status, @timestamp, @started_date)
    `);
    for (const stage of REVIEW_STAGES) {
      const first = stage.index === 0;
      insertStage.run({
        review_id: reviewId,
        job_number: job,
        stage_index: stage.index,
        stage_name: stage.name,
        department: stage.department,
        status: first ? "in_progress" : "not_started",
        timestamp: first ? stamp : null,
        started_date: first ? stamp : null,
      });
    }
  }).immediate();

  return getReview(db, job);
}

/**
 * List the files of a review, optionally only those at one stage
 */
export function listStageFiles(
  db: Database.Database,
  jobNumber: string,
  stageIndex?: number
): StageFile[] {
  const review = getReview(db, jobNumber);
  const rows =
    stageIndex === undefined
      ? db
          .prepare(
            `SELECT * FROM print_package_files WHERE review_id = ? ORDER BY stage_index, file_name`
          )
          .all(review.review_id)
      : db
          .prepare(
            `SELECT * FROM print_package_files WHERE review_id = ? AND stage_index = ? ORDER BY file_name`
          )
          .all(review.review_id, stageIndex);
  return (rows as StageFileRow[]).map(rowToFile);
}

function getStageFile(db: Database.Database, id: number): StageFile {
  const row = db
    .prepare(`SELECT * FROM print_package_files WHERE id = ?`)
    .get(id) as StageFileRow | undefined;
  if (!row) {
    throw new NotFoundError("Stage file", id);
  }
  return rowToFile(row);
}

/**
 * Register a file at the job's current active stage
 */
export function attachFile(
  db: Database.Database,
  jobNumber: string,
  filePath: string,
  now: Clock = systemClock
): StageFile {
  if (filePath.trim() === "") {
    throw new ValidationError("File path is required");
  }

  const attach = db.transaction(() => {
    const review = getReview(db, jobNumber);
    if (review.status === "completed") {
      throw new InvalidTransitionError(
        `Review for job ${jobNumber} is completed; files can no longer be attached`,
        review.status,
        "in_progress"
      );
    }

    const fileName = path.basename(filePath);
    const existing = db
      .prepare(
        `SELECT id FROM print_package_files WHERE review_id = ? AND file_name = ?`
      )
      .get(review.review_id, fileName);
    if (existing) {
      throw new ConflictError(
        `File ${fileName} is already attached to job ${jobNumber}`
      );
    }

    const result = db
      .prepare(
        `
      INSERT INTO print_package_files (review_id, job_number, file_name, path, stage_index, created_date)
      VALUES (?, ?, ?, ?, ?, ?)
    `
      )
      .run(
        review.review_id,
        review.job_number,
        fileName,
        filePath,
        review.current_stage,
        toTimestamp(now())
      );
    return Number(result.lastInsertRowid);
  });

  return getStageFile(db, attach.immediate());
}

/**
 * Copy files into a stage folder one at a time, moving each file's stage
 * pointer only when its copy succeeded.
 */
function relocateFiles(
  db: Database.Database,
  relocator: FileRelocator,
  review: ReviewPipelineInstance,
  files: StageFile[],
  targetStage: number
): RelocationReport {
  const targetDir = stageFolderPath(review.base_path, targetStage);
  const update = db.prepare(
    `UPDATE print_package_files SET path = ?, stage_index = ? WHERE id = ?`
  );
  const relocated: StageFile[] = [];
  const failures: RelocationFailure[] = [];

  for (const file of files) {
    try {
      const destination = relocator.copyInto(file.path, targetDir);
      update.run(destination, targetStage, file.id);
      relocated.push(getStageFile(db, file.id));
    } catch (error) {
      if (!(error instanceof RelocationError)) {
        throw error;
      }
      failures.push({
        file_name: file.file_name,
        path: file.path,
        stage_index: file.stage_index,
        error: error.message,
      });
    }
  }

  return { relocated, failures };
}

/**
 * Complete an in-progress stage, start the next one and carry the stage's files
 * forward. The final stage only completes. Blank notes are stored as null.
 */
export function advanceStage(
  db: Database.Database,
  relocator: FileRelocator,
  jobNumber: string,
  completingStageIndex: number,
  reviewerName: string,
  department: string,
  now: Clock = systemClock,
  notes?: string
): AdvanceResult {
  if (!isStageIndex(completingStageIndex)) {
    throw new ValidationError(
      `Stage must be between 0 and ${FINAL_STAGE}, got ${completingStageIndex}`
    );
  }
  const reviewer = reviewerName.trim();
  if (reviewer === "") {
    throw new ValidationError("Reviewer name is required");
  }
  const dept = department.trim();
  if (dept === "") {
    throw new ValidationError("Department is required");
  }
  const remarks = notes?.trim() || null;

  const nextIndex =
    completingStageIndex < FINAL_STAGE ? completingStageIndex + 1 : null;

  const transition = db.transaction((): ReviewPipelineInstance => {
    const review = getReview(db, jobNumber);
    const stage = review.stages[completingStageIndex];
    if (stage.status !== "in_progress") {
      throw new InvalidTransitionError(
        `Stage ${completingStageIndex} (${stage.stage_name}) is ${stage.status}; only an in-progress stage can be completed`,
        stage.status,
        "in_progress"
      );
    }

    const stamp = toTimestamp(now());

    // Re-checked in the UPDATE itself so a concurrent advance cannot win twice
    const completed = db
      .prepare(
        `
      UPDATE print_package_workflow
      SET status = 'completed', reviewer = ?, department = ?, timestamp = ?, completed_date = ?, notes = ?
      WHERE review_id = ? AND stage_index = ? AND status = 'in_progress'
    `
      )
      .run(reviewer, dept, stamp, stamp, remarks, review.review_id, completingStageIndex);
    if (completed.changes === 0) {
      throw new InvalidTransitionError(
        `Stage ${completingStageIndex} of job ${jobNumber} was advanced by another client`,
        "completed",
        "in_progress"
      );
    }

    if (nextIndex === null) {
      db.prepare(
        `UPDATE print_package_reviews SET status = 'completed', completed_date = ? WHERE review_id = ?`
      ).run(stamp, review.review_id);
    } else {
      const started = db
        .prepare(
          `
        UPDATE print_package_workflow
        SET status = 'in_progress', timestamp = ?, started_date = ?
        WHERE review_id = ? AND stage_index = ? AND status = 'not_started'
      `
        )
        .run(stamp, stamp, review.review_id, nextIndex);
      if (started.changes === 0) {
        throw new InvalidTransitionError(
          `Stage ${nextIndex} of job ${jobNumber} has already been started`,
          review.stages[nextIndex].status,
          "not_started"
        );
      }
      db.prepare(
        `UPDATE print_package_reviews SET current_stage = ? WHERE review_id = ?`
      ).run(nextIndex, review.review_id);
    }

    return getReview(db, jobNumber);
  });

  // BEGIN IMMEDIATE: the status is read under the write lock
  const advanced = transition.immediate();

  const report: RelocationReport =
    nextIndex === null
      ? { relocated: [], failures: [] }
      : relocateFiles(
          db,
          relocator,
          advanced,
          listStageFiles(db, jobNumber, completingStageIndex),
          nextIndex
        );

  return {
    review: getReview(db, jobNumber),
    completed_stage: advanced.stages[completingStageIndex],
    next_stage: nextIndex === null ? null : advanced.stages[nextIndex],
    relocated: report.relocated,
    failures: report.failures,
  };
}

/**
 * Copy files left behind at completed stages into the current stage folder
 */
export function retryRelocation(
  db: Database.Database,
  relocator: FileRelocator,
  jobNumber: string,
  fileNames?: string[]
): RelocationReport {
  const review = getReview(db, jobNumber);
  const allFiles = listStageFiles(db, jobNumber);

  if (fileNames && fileNames.length > 0) {
    const known = new Set(allFiles.map((f) => f.file_name));
    const unknown = fileNames.find((name) => !known.has(name));
    if (unknown !== undefined) {
      throw new NotFoundError(`File on job ${jobNumber}`, unknown);
    }
  }

  const wanted = fileNames && fileNames.length > 0 ? new Set(fileNames) : null;
  const stranded = allFiles.filter(
    (f) =>
      f.stage_index < review.current_stage &&
      (wanted === null || wanted.has(f.file_name))
  );

  return relocateFiles(db, relocator, review, stranded, review.current_stage);
}

/**
 * In-progress stages across all jobs, oldest first
 */
export function listActiveStages(
  db: Database.Database,
  department?: string
): PendingStage[] {
  const conditions = ["pw.status = 'in_progress'"];
  const params: string[] = [];
  if (department) {
    conditions.push("pw.department = ?");
    params.push(department);
  }

  const stmt = db.prepare(`
    SELECT pw.job_number, p.customer_name, pw.stage_index, pw.stage_name,
           pw.department, pw.started_date as started_at
    FROM print_package_workflow pw
    JOIN print_package_reviews pr ON pw.review_id = pr.review_id
    LEFT JOIN projects p ON p.job_number = pr.job_number
    WHERE ${conditions.join(" AND ")}
    ORDER BY pw.started_date ASC, pw.job_number ASC
  `);
  return stmt.all(...params) as PendingStage[];
}

export function getReviewSummary(
  db: Database.Database,
  jobNumber: string
): ReviewSummary {
  const review = getReview(db, jobNumber);
  const completedStages = review.stages.filter(
    (s) => s.status === "completed"
  ).length;

  return {
    review,
    completed_stages: completedStages,
    total_stages: STAGE_COUNT,
    progress_percentage: (completedStages / STAGE_COUNT) * 100,
    current_stage: review.stages[review.current_stage] ?? null,
    is_complete: review.status === "completed",
  };
}
