/**
 * Core entity types for draftline
 */

/**
 * Local timestamp string, `yyyy-MM-dd HH:mm:ss`
 */
export type Timestamp = string;

/**
 * Calendar date string, `yyyy-MM-dd`
 */
export type DateString = string;

// ============================================================================
// Workflow templates
// ============================================================================

export interface WorkflowTemplate {
  id: number;
  name: string;
  version: number;
  is_active: boolean;
  created_at: Timestamp;
  steps: TemplateStep[];
}

export interface TemplateStep {
  id: number;
  template_id: number;
  order_index: number;
  department: string;
  group_name: string;
  title: string;
  planned_duration_days: number;
  /** Checklist task titles, in order */
  tasks: string[];
}

/**
 * Step definition supplied when publishing a template version
 */
export interface TemplateStepInput {
  order_index: number;
  department: string;
  group_name?: string;
  title: string;
  planned_duration_days: number;
  /** Omit to carry the previous version's tasks forward for this order_index */
  tasks?: string[];
}

// ============================================================================
// Project workflow instances
// ============================================================================

export interface ProjectWorkflowInstance {
  project_id: number;
  template_id: number;
  template_version: number;
  seeded_at: Timestamp;
  steps: ProjectStepState[];
}

export interface ProjectStepState {
  id: number;
  project_id: number;
  template_id: number;
  template_step_id: number | null;
  order_index: number;
  department: string;
  group_name: string;
  title: string;
  planned_duration_days: number;
  start_flag: boolean;
  start_ts: Timestamp | null;
  completed_flag: boolean;
  completed_ts: Timestamp | null;
  transfer_to_name: string | null;
  transfer_to_ts: Timestamp | null;
  received_from_name: string | null;
  received_from_ts: Timestamp | null;
  planned_due_date: DateString | null;
  actual_duration_days: number | null;
}

export type StepEventKind = "start" | "complete" | "transfer" | "receive";

/**
 * Payload of a step event. Flag events carry `value`, actor events carry `actor`.
 */
export type StepEventPayload =
  | { kind: "start" | "complete"; value: boolean }
  | { kind: "transfer" | "receive"; actor: string };

export interface StepTask {
  id: number;
  project_step_id: number;
  order_index: number;
  title: string;
  is_checked: boolean;
  checked_ts: Timestamp | null;
}

// ============================================================================
// Print-package review pipeline
// ============================================================================

export type StageStatus = "not_started" | "in_progress" | "completed";

export type ReviewStatus = "in_progress" | "completed";

export interface StageState {
  stage_index: number;
  stage_name: string;
  department: string;
  status: StageStatus;
  reviewer: string | null;
  /** Time of the last status transition */
  timestamp: Timestamp | null;
  started_at: Timestamp | null;
  completed_at: Timestamp | null;
  /** Reviewer's remarks left when the stage was completed */
  notes: string | null;
}

export interface StageFile {
  id: number;
  review_id: string;
  job_number: string;
  file_name: string;
  path: string;
  stage_index: number;
  created_at: Timestamp;
}

export interface ReviewPipelineInstance {
  review_id: string;
  job_number: string;
  base_path: string;
  status: ReviewStatus;
  current_stage: number;
  initialized_by: string | null;
  created_at: Timestamp;
  completed_at: Timestamp | null;
  stages: StageState[];
}

export interface RelocationFailure {
  file_name: string;
  path: string;
  stage_index: number;
  error: string;
}

export interface RelocationReport {
  relocated: StageFile[];
  failures: RelocationFailure[];
}

export interface AdvanceResult extends RelocationReport {
  review: ReviewPipelineInstance;
  completed_stage: StageState;
  next_stage: StageState | null;
}

export interface ReviewSummary {
  review: ReviewPipelineInstance;
  completed_stages: number;
  total_stages: number;
  progress_percentage: number;
  current_stage: StageState | null;
  is_complete: boolean;
}

/**
 * One in-progress stage in the cross-job work queue
 */
export interface PendingStage {
  job_number: string;
  customer_name: string | null;
  stage_index: number;
  stage_name: string;
  department: string;
  started_at: Timestamp | null;
}

// ============================================================================
// Hosting records
// ============================================================================

export interface ProjectRecord {
  id: number;
  job_number: string;
  customer_name: string | null;
  job_directory: string | null;
  due_date: DateString | null;
  created_at: Timestamp;
}

export type PersonKind = "designer" | "engineer";

// ============================================================================
// Configuration
// ============================================================================

/**
 * Config file structure (.draftline/config.json)
 */
export interface Config {
  version: string;
  /** Database file name, relative to the config directory (default: "draftline.db") */
  database: string;
  /** Template seeded into new projects (default: "Standard") */
  templateName: string;
  /** Fixed actor offered alongside designers and engineers (default: "Production") */
  productionActor: string;
  /** Root for review folders of projects without a job directory */
  printPackageRoot: string;
}
